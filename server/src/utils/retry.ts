/**
 * Backoff helpers for remote calls
 *
 *   delay(retry) = min(maxDelayMs, baseDelayMs × 2^retry) ± jitterRatio
 *
 * A Retry-After header, when present, replaces the computed delay but is
 * still capped at maxDelayMs.
 */

export interface RetryPolicy {
    /** Retries after the first attempt */
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
    /** 0.2 = up to ±20 % */
    jitterRatio: number;
}

/**
 * @param retry - zero-based retry number (0 = first retry)
 * @param random - source in [0, 1); 0.5 means no jitter
 */
export function computeBackoff(retry: number, policy: RetryPolicy, random: () => number = Math.random): number {
    const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, retry));
    const jitter = exponential * policy.jitterRatio * (2 * random() - 1);
    return Math.round(Math.min(policy.maxDelayMs, Math.max(0, exponential + jitter)));
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds.
 * Returns null when absent or unreadable.
 */
export function parseRetryAfter(header: unknown, nowMs: number): number | null {
    if (typeof header === 'number') return header >= 0 ? header * 1000 : null;
    if (typeof header !== 'string' || header.trim() === '') return null;

    const seconds = Number(header.trim());
    if (Number.isFinite(seconds)) return seconds >= 0 ? Math.round(seconds * 1000) : null;

    const date = Date.parse(header);
    if (Number.isNaN(date)) return null;
    return Math.max(0, date - nowMs);
}

/** Delay before the next retry: Retry-After wins, capped at maxDelayMs */
export function resolveRetryDelay(
    retry: number,
    policy: RetryPolicy,
    retryAfterMs: number | null,
    random?: () => number,
): number {
    if (retryAfterMs !== null) return Math.min(policy.maxDelayMs, retryAfterMs);
    return computeBackoff(retry, policy, random);
}
