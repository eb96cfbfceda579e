import { ShopifyClient } from './client.js';
import { TokenBucket } from '../../utils/tokenBucket.js';
import type { ShopifyConfig } from '../../config/index.js';

export { ShopifyClient, normalizeShopDomain, describeShopifyError } from './client.js';
export type { ShopifyClientDeps } from './client.js';
export { buildProductPayload } from './payload.js';
export { parseListingNode, remoteIdFromGid } from './listing.js';

export type {
    RemoteCatalogClient,
    RemoteMutationResult,
    PayloadOptions,
    ShopifyClientConfig,
    ShopifyConfigStatus,
    ShopifyProductInput,
    ShopifyVariantInput,
    ShopifyMetafieldInput,
    ShopifyImageInput,
} from './types.js';

/**
 * Client wired with its own token bucket from the loaded configuration
 */
export function createShopifyClient(config: ShopifyConfig): ShopifyClient {
    const rateLimiter = new TokenBucket(config.rateLimit);
    return new ShopifyClient(config.api, { rateLimiter, retryPolicy: config.retry });
}
