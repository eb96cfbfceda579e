/**
 * Kysely Query Exports
 */

export {
    ID_CHUNK_SIZE,
    activeProductsQuery,
    productsByIdsQuery,
    productImagesQuery,
    warrantyOptionsQuery,
    connectionCheckQuery,
    checkConnectionKysely,
    fetchActiveProductsKysely,
    fetchProductsByIdsKysely,
    fetchProductImagesKysely,
    fetchWarrantyOptionsKysely,
    type ProductsQueryParams,
} from './catalogSourceKysely.js';
