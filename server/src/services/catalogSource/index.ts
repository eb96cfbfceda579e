export { KyselyRecordSource } from './kyselyRecordSource.js';
export { percentToFraction, toImageRow, toProductRow, toWarrantyRuleRow } from './mappers.js';
export type { FetchProductsOptions, RecordSource } from './types.js';
