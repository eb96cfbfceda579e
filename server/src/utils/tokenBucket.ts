/**
 * Token bucket rate limiter
 *
 * Refills continuously at `tokensPerSecond` up to `capacity`. Every remote
 * request takes one token; callers wait for a token and are never dropped.
 * Acquisitions are served strictly in call order through a promise chain,
 * so concurrent callers cannot overtake each other.
 */

import { systemClock } from './clock.js';
import type { Clock } from './clock.js';

export interface TokenBucketOptions {
    tokensPerSecond: number;
    capacity: number;
}

export class TokenBucket {
    private readonly ratePerMs: number;
    private readonly capacity: number;
    private readonly clock: Clock;
    private tokens: number;
    private lastRefill: number;
    private tail: Promise<void> = Promise.resolve();

    constructor(options: TokenBucketOptions, clock: Clock = systemClock) {
        if (!(options.tokensPerSecond > 0) || !(options.capacity >= 1)) {
            throw new RangeError('Token bucket needs tokensPerSecond > 0 and capacity >= 1');
        }
        this.ratePerMs = options.tokensPerSecond / 1000;
        this.capacity = options.capacity;
        this.clock = clock;
        this.tokens = options.capacity;
        this.lastRefill = clock.now();
    }

    /**
     * Wait until a token is available and take it.
     */
    acquire(): Promise<void> {
        const turn = this.tail.then(() => this.take());
        // Keep the chain alive for later callers even if a sleep rejects
        this.tail = turn.catch(() => undefined);
        return turn;
    }

    /** Tokens currently available (after refill) */
    available(): number {
        this.refill();
        return this.tokens;
    }

    private refill(): void {
        const now = this.clock.now();
        const elapsed = now - this.lastRefill;
        if (elapsed > 0) {
            this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.ratePerMs);
            this.lastRefill = now;
        }
    }

    private async take(): Promise<void> {
        this.refill();
        while (this.tokens < 1) {
            const waitMs = Math.ceil((1 - this.tokens) / this.ratePerMs);
            await this.clock.sleep(waitMs);
            this.refill();
        }
        this.tokens -= 1;
    }
}
