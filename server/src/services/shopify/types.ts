/**
 * Shopify client types
 *
 * REST payload shapes (snake_case, as the Admin API expects them), the
 * context handed to feature modules and the RemoteCatalogClient seam the
 * sync layer depends on.
 */

import type { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import type { z } from 'zod';
import type { MetafieldType, Product, RemoteListing } from '@catalog-sync/shared';

// ============================================
// CLIENT CONFIG & CONTEXT
// ============================================

export interface ShopifyClientConfig {
    shopDomain: string;
    accessToken: string;
    apiVersion: string;
    timeoutMs?: number;
    /** In-process transport for tests */
    adapter?: AxiosAdapter;
}

export interface ShopifyConfigStatus {
    shopDomain: string;
    apiVersion: string;
    baseURL: string;
}

/**
 * Context object passed to feature module functions
 */
export interface ShopifyClientContext {
    client: AxiosInstance;
    executeWithRetry: <T>(requestFn: () => Promise<AxiosResponse<T>>) => Promise<AxiosResponse<T>>;
    executeGraphQL: <T>(query: string, variables: Record<string, unknown>, schema: z.ZodType<T, z.ZodTypeDef, unknown>) => Promise<T>;
}

// ============================================
// REST PAYLOADS
// ============================================

export interface ShopifyVariantInput {
    option1: string;
    price: string;
    sku: string;
    inventory_management: 'shopify';
    inventory_policy: 'deny';
    inventory_quantity?: number;
    weight?: number;
    weight_unit: 'kg';
}

export interface ShopifyMetafieldInput {
    namespace: string;
    key: string;
    value: string;
    type: MetafieldType;
}

export interface ShopifyImageInput {
    attachment: string;
    filename: string;
    alt?: string;
    position: number;
}

export interface ShopifyOptionInput {
    name: string;
    values: string[];
}

export interface ShopifyProductInput {
    id?: number;
    title: string;
    handle: string;
    body_html: string;
    vendor?: string;
    product_type?: string;
    tags: string;
    options: ShopifyOptionInput[];
    variants: ShopifyVariantInput[];
    metafields: ShopifyMetafieldInput[];
    images?: ShopifyImageInput[];
}

export interface PayloadOptions {
    /** Images are heavy; updates carry them only when the primary image changed */
    includeImages: boolean;
}

// ============================================
// REMOTE CATALOG SEAM
// ============================================

export interface RemoteMutationResult {
    remoteId: string;
    handle: string;
}

/**
 * What the sync layer needs from the remote platform.
 * Implementations rate-limit and retry internally.
 */
export interface RemoteCatalogClient {
    listAll(): Promise<RemoteListing[]>;
    create(product: Product): Promise<RemoteMutationResult>;
    update(remoteId: string, product: Product, options: PayloadOptions): Promise<RemoteMutationResult>;
    delete(remoteId: string): Promise<void>;
    /** Authenticated round trip; resolves to the shop name */
    ping(): Promise<string>;
}
