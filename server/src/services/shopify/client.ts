import type { AxiosInstance, AxiosResponse } from 'axios';
import axios from 'axios';
import type { z } from 'zod';
import type { Product, RemoteListing } from '@catalog-sync/shared';
import { shopifyLogger } from '../../utils/logger.js';
import { RemoteRequestError } from '../../utils/errors.js';
import { systemClock } from '../../utils/clock.js';
import type { Clock } from '../../utils/clock.js';
import { parseRetryAfter, resolveRetryDelay } from '../../utils/retry.js';
import type { RetryPolicy } from '../../utils/retry.js';
import type { TokenBucket } from '../../utils/tokenBucket.js';
import { SHOPIFY_REQUEST_TIMEOUT_MS } from '../../config/sync/shopify.js';
import { graphQLEnvelopeSchema } from './graphql.js';
import * as productsFn from './products.js';
import { fetchShopName } from './shop.js';
import type {
    PayloadOptions,
    RemoteCatalogClient,
    RemoteMutationResult,
    ShopifyClientConfig,
    ShopifyClientContext,
    ShopifyConfigStatus,
} from './types.js';

export interface ShopifyClientDeps {
    /** Shared limiter; every HTTP request takes one token */
    rateLimiter: TokenBucket;
    retryPolicy: RetryPolicy;
    clock?: Clock;
    /** Jitter source, injectable for deterministic tests */
    random?: () => number;
}

/**
 * Failure of one attempt, classified for the retry loop
 */
interface AttemptFailure {
    transient: boolean;
    status: number | null;
    retryAfterMs: number | null;
    message: string;
}

/**
 * Raised inside the retry loop when GraphQL reports THROTTLED with a 200
 */
class GraphQLThrottledError extends Error {
    readonly name = 'GraphQLThrottledError' as const;

    constructor(message: string) {
        super(message);
        Object.setPrototypeOf(this, GraphQLThrottledError.prototype);
    }
}

// ============================================
// HELPERS
// ============================================

/**
 * Clean and convert the configured domain to `<store>.myshopify.com`.
 * Accepts full URLs, `admin.shopify.com/store/<store>` and bare store names.
 */
export function normalizeShopDomain(shopDomain: string): string {
    let cleanDomain = shopDomain
        .trim()
        .replace(/^https?:\/\//, '')
        .replace(/\/$/, '');

    // Convert admin.shopify.com/store/xxx format to xxx.myshopify.com
    const adminMatch = cleanDomain.match(/admin\.shopify\.com\/store\/([^/]+)/);
    if (adminMatch) {
        cleanDomain = `${adminMatch[1]}.myshopify.com`;
    }

    // If it doesn't have .myshopify.com, assume it's just the store name
    if (!cleanDomain.includes('.myshopify.com') && !cleanDomain.includes('.')) {
        cleanDomain = `${cleanDomain}.myshopify.com`;
    }

    return cleanDomain;
}

/** Human-readable detail from a Shopify error body ({ errors: string | Record<string, string[]> }) */
export function describeShopifyError(data: unknown): string | null {
    if (typeof data === 'string') return data.trim() === '' ? null : data.slice(0, 500);
    if (typeof data !== 'object' || data === null || !('errors' in data)) return null;

    const { errors } = data;
    if (typeof errors === 'string') return errors;
    if (Array.isArray(errors)) return errors.map(String).join('; ');
    if (typeof errors === 'object' && errors !== null) {
        return Object.entries(errors)
            .map(([field, messages]) => `${field}: ${Array.isArray(messages) ? messages.join(', ') : String(messages)}`)
            .join('; ');
    }
    return null;
}

function classifyFailure(error: unknown, nowMs: number): AttemptFailure | null {
    if (error instanceof GraphQLThrottledError) {
        return { transient: true, status: 200, retryAfterMs: null, message: error.message };
    }
    if (!axios.isAxiosError(error)) return null;

    const response = error.response;
    if (!response) {
        // Network error or timeout: no response at all
        return { transient: true, status: null, retryAfterMs: null, message: error.message };
    }

    const status = response.status;
    const detail = describeShopifyError(response.data);
    return {
        transient: status === 429 || status >= 500,
        status,
        retryAfterMs: parseRetryAfter(response.headers['retry-after'], nowMs),
        message: `Shopify API ${status}${detail ? `: ${detail}` : ''}`,
    };
}

// ============================================
// CLIENT
// ============================================

/**
 * Shopify Admin API client for the product catalog
 *
 * Features:
 * - Shared token bucket in front of every request
 * - Retry on 429/5xx/network errors/GraphQL THROTTLED with exponential
 *   backoff and jitter; Retry-After honoured
 * - Permanent 4xx rejections fail immediately
 */
export class ShopifyClient implements RemoteCatalogClient {
    private readonly shopDomain: string;
    private readonly apiVersion: string;
    private readonly baseURL: string;
    private readonly _client: AxiosInstance;
    private readonly rateLimiter: TokenBucket;
    private readonly retryPolicy: RetryPolicy;
    private readonly clock: Clock;
    private readonly random: () => number;

    constructor(config: ShopifyClientConfig, deps: ShopifyClientDeps) {
        this.shopDomain = normalizeShopDomain(config.shopDomain);
        this.apiVersion = config.apiVersion;
        this.baseURL = `https://${this.shopDomain}/admin/api/${this.apiVersion}`;
        this.rateLimiter = deps.rateLimiter;
        this.retryPolicy = deps.retryPolicy;
        this.clock = deps.clock ?? systemClock;
        this.random = deps.random ?? Math.random;

        this._client = axios.create({
            baseURL: this.baseURL,
            headers: {
                'X-Shopify-Access-Token': config.accessToken,
                'Content-Type': 'application/json',
            },
            timeout: config.timeoutMs ?? SHOPIFY_REQUEST_TIMEOUT_MS,
            ...(config.adapter ? { adapter: config.adapter } : {}),
        });

        shopifyLogger.debug({ baseURL: this.baseURL }, 'Shopify API initialized');
    }

    getConfig(): ShopifyConfigStatus {
        return {
            shopDomain: this.shopDomain,
            apiVersion: this.apiVersion,
            baseURL: this.baseURL,
        };
    }

    // ============================================
    // RATE LIMITING & RETRY LOGIC
    // ============================================

    /**
     * Execute a request with rate limiting and automatic retry.
     * At most `maxRetries + 1` requests are sent.
     *
     * @throws RemoteRequestError (transient after exhaustion, permanent for other 4xx)
     */
    private async executeWithRetry<T>(
        requestFn: () => Promise<AxiosResponse<T>>
    ): Promise<AxiosResponse<T>> {
        const { maxRetries } = this.retryPolicy;

        for (let attempt = 0; ; attempt++) {
            await this.rateLimiter.acquire();

            try {
                return await requestFn();
            } catch (error: unknown) {
                const failure = classifyFailure(error, this.clock.now());
                if (!failure) throw error;

                const attempts = attempt + 1;
                if (!failure.transient) {
                    throw new RemoteRequestError(failure.message, {
                        status: failure.status,
                        attempts,
                        transient: false,
                    });
                }

                if (attempt >= maxRetries) {
                    shopifyLogger.error({ status: failure.status, attempts }, 'Retries exhausted');
                    throw new RemoteRequestError(`${failure.message} (gave up after ${attempts} attempts)`, {
                        status: failure.status,
                        attempts,
                        transient: true,
                    });
                }

                const waitMs = resolveRetryDelay(attempt, this.retryPolicy, failure.retryAfterMs, this.random);
                shopifyLogger.warn(
                    { status: failure.status, waitMs, attempt: attempts, maxRetries, error: failure.message },
                    failure.status === 429 ? 'Rate limited (429), retrying' : 'Transient error, retrying'
                );
                await this.clock.sleep(waitMs);
            }
        }
    }

    /**
     * Execute a GraphQL query against the Admin API and validate `data`
     */
    private async executeGraphQL<T>(
        query: string,
        variables: Record<string, unknown>,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>
    ): Promise<T> {
        const response = await this.executeWithRetry<unknown>(async () => {
            const res = await this._client.post<unknown>('/graphql.json', { query, variables });
            const envelope = graphQLEnvelopeSchema.parse(res.data);
            if (envelope.errors?.some(e => e.extensions?.code === 'THROTTLED')) {
                throw new GraphQLThrottledError('GraphQL request throttled');
            }
            return res;
        });

        const envelope = graphQLEnvelopeSchema.parse(response.data);
        if (envelope.errors && envelope.errors.length > 0) {
            const errorMessages = envelope.errors.map(e => e.message).join(', ');
            throw new RemoteRequestError(`GraphQL Error: ${errorMessages}`, {
                status: response.status,
                attempts: 1,
                transient: false,
            });
        }

        return schema.parse(envelope.data);
    }

    /**
     * Build the context object that feature modules need
     */
    private getContext(): ShopifyClientContext {
        return {
            client: this._client,
            executeWithRetry: this.executeWithRetry.bind(this),
            executeGraphQL: this.executeGraphQL.bind(this),
        };
    }

    // ============================================
    // PRODUCTS (delegates to products module)
    // ============================================

    async listAll(): Promise<RemoteListing[]> {
        return productsFn.listAllProducts(this.getContext());
    }

    async create(product: Product): Promise<RemoteMutationResult> {
        return productsFn.createProduct(this.getContext(), product);
    }

    async update(remoteId: string, product: Product, options: PayloadOptions): Promise<RemoteMutationResult> {
        return productsFn.updateProduct(this.getContext(), remoteId, product, options);
    }

    async delete(remoteId: string): Promise<void> {
        return productsFn.deleteProduct(this.getContext(), remoteId);
    }

    // ============================================
    // SHOP
    // ============================================

    async ping(): Promise<string> {
        return fetchShopName(this.getContext());
    }
}
