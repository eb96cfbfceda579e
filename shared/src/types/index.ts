/**
 * Shared TypeScript types for catalog-sync
 *
 * Source rows (as read from the relational store), the canonical Product,
 * the remote listing view and the change set / run summary shapes.
 */

import type { Decimal } from 'decimal.js';

// ============================================
// SOURCE ROWS
// ============================================

/** Numeric columns arrive as strings from pg (NUMERIC) or numbers from fixtures */
export type NumericInput = string | number;

export interface ProductRow {
  productId: string | null;
  title: string | null;
  descriptionShort: string | null;
  longDescription: string | null;
  manufacturer: string | null;
  category: string | null;
  /** Pipe-separated category path, e.g. "Hardware|Notebooks" */
  categoryPath: string | null;
  /** Warranty label used when the product has no warranty group */
  warranty: string | null;
  priceB2cInclVat: NumericInput | null;
  priceB2bRegular: NumericInput | null;
  priceB2bDiscounted: NumericInput | null;
  currency: string | null;
  vatRate: NumericInput | null;
  stock: NumericInput | null;
  stockNextDelivery: string | null;
  grossWeight: NumericInput | null;
  netWeight: NumericInput | null;
  nonReturnable: boolean | null;
  eol: boolean | null;
  promotion: boolean | null;
  /** 0 or null means "no warranty group" */
  warrantyGroup: number | null;
  /** Pipe-separated product identifiers */
  accessoryProducts: string | null;
}

/** Raw bytes, a hex string (optionally 0x-prefixed), base64 or a data URI */
export type ImagePayload = string | Uint8Array;

export interface ImageRow {
  productId: string | null;
  filename: string | null;
  payload: ImagePayload | null;
  isPrimary: boolean | null;
}

export interface WarrantyRuleRow {
  id: number;
  name: string;
  durationMonths: number | null;
  /** Fraction of the base price, e.g. 0.05 for 5 % */
  percentage: NumericInput | null;
  minimum: NumericInput | null;
  warrantyGroup: number | null;
}

// ============================================
// CANONICAL PRODUCT
// ============================================

export interface WarrantyRule {
  id: number;
  name: string;
  durationMonths: number | null;
  percentage: Decimal | null;
  minimum: Decimal | null;
  groupId: number;
}

export interface WarrantyTier {
  ruleId: number;
  name: string;
  durationMonths: number | null;
  addOnPrice: Decimal;
}

export interface WarrantyDescriptor {
  groupId: number | null;
  label: string | null;
  tiers: WarrantyTier[];
  /** false when the product names a group the rule set does not know */
  resolved: boolean;
}

export interface ProductImage {
  base64: string;
  sourceRef: string | null;
}

export interface ProductPricing {
  b2cGross: Decimal | null;
  b2bRegular: Decimal | null;
  b2bDiscounted: Decimal | null;
}

export interface ProductFlags {
  endOfLife: boolean | null;
  nonReturnable: boolean | null;
  promotion: boolean | null;
}

export interface Product {
  identifier: string;
  handle: string;
  title: string | null;
  descriptionShort: string | null;
  longDescription: string | null;
  manufacturer: string | null;
  category: string | null;
  categoryPath: string[];
  pricing: ProductPricing;
  currency: string | null;
  vatRate: Decimal | null;
  stock: number | null;
  stockNextDelivery: string | null;
  weight: { gross: Decimal | null; net: Decimal | null };
  warranty: WarrantyDescriptor;
  images: { primary: ProductImage | null; additional: ProductImage[] };
  flags: ProductFlags;
  accessories: string[];
}

export type MergeIssueCode =
  | 'missing_identifier'
  | 'duplicate_identifier'
  | 'unknown_warranty_group'
  | 'image_decode_failed'
  | 'invalid_number';

export interface MergeIssue {
  identifier: string | null;
  code: MergeIssueCode;
  message: string;
}

// ============================================
// REMOTE LISTING
// ============================================

export interface RemoteImage {
  src: string;
  alt: string | null;
}

export interface RemoteListing {
  remoteId: string;
  handle: string;
  title: string | null;
  bodyHtml: string | null;
  /** Price of the first variant */
  price: Decimal | null;
  /** Inventory of the first variant */
  stock: number | null;
  images: RemoteImage[];
  tags: string[];
  /** `custom` namespace metafields, keyed by metafield key */
  metafields: Record<string, string>;
}

// ============================================
// CHANGE SET
// ============================================

export type ComparedField =
  | 'title'
  | 'price'
  | 'priceB2bRegular'
  | 'priceB2bDiscounted'
  | 'stock'
  | 'descriptionShort'
  | 'primaryImage';

export interface FieldDelta {
  field: ComparedField;
  local: string | null;
  remote: string | null;
}

export type ChangeSetEntry =
  | { kind: 'create'; identifier: string; handle: string; product: Product }
  | { kind: 'update'; identifier: string; handle: string; product: Product; listing: RemoteListing; deltas: FieldDelta[] }
  | { kind: 'unchanged'; identifier: string; handle: string; product: Product; listing: RemoteListing }
  | { kind: 'remote_only'; identifier: string | null; handle: string; listing: RemoteListing }
  | { kind: 'delete'; identifier: string | null; handle: string; listing: RemoteListing };

export type ChangeKind = ChangeSetEntry['kind'];

export interface ChangeSet {
  readonly entries: readonly ChangeSetEntry[];
}

export type ChangeCounts = Record<ChangeKind, number>;

// ============================================
// RUN SUMMARY
// ============================================

export type ItemAction = 'create' | 'update' | 'delete';

/** Scheduler-level state of one change-set entry */
export type ItemState = 'pending' | 'in_flight' | 'succeeded' | 'failed';

/** Final outcome recorded in the summary */
export type ItemOutcome = 'succeeded' | 'failed' | 'skipped' | 'planned';

export type ItemErrorKind = 'permanent' | 'transient' | 'validation' | 'unknown';

export interface ItemError {
  message: string;
  kind: ItemErrorKind;
  remoteStatus: number | null;
  attempts: number | null;
}

export interface ItemResult {
  identifier: string | null;
  handle: string;
  action: ItemAction;
  outcome: ItemOutcome;
  remoteId: string | null;
  error: ItemError | null;
  deltas?: FieldDelta[];
  reason?: string;
}

export type RunStatus = 'completed' | 'completed_with_errors' | 'dry_run';

export interface RunSummary {
  status: RunStatus;
  message: string;
  total_products: number;
  successful_uploads: number;
  failed_uploads: number;
  skipped: number;
  /** Seconds */
  execution_time: number;
  dry_run: boolean;
  change_counts: ChangeCounts;
  missing_from_source: string[];
  merge_issues: MergeIssue[];
  per_item_results: ItemResult[];
}
