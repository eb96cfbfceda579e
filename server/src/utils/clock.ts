/**
 * Time source for rate limiting and backoff.
 * Tests substitute a fake whose sleep advances virtual time.
 */
export interface Clock {
    now(): number;
    sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep: (ms: number) => new Promise<void>(resolve => setTimeout(resolve, Math.max(0, ms))),
};
