import { TokenBucket } from '../tokenBucket.js';
import { FakeClock } from '../../__tests__/fakes.js';

describe('TokenBucket', () => {
    it('starts full and serves a burst without waiting', async () => {
        const clock = new FakeClock();
        const bucket = new TokenBucket({ tokensPerSecond: 2, capacity: 3 }, clock);

        expect(bucket.available()).toBe(3);
        await bucket.acquire();
        await bucket.acquire();
        await bucket.acquire();

        expect(clock.sleeps).toEqual([]);
        expect(bucket.available()).toBe(0);
    });

    it('waits for the next token once the burst is spent', async () => {
        const clock = new FakeClock();
        const bucket = new TokenBucket({ tokensPerSecond: 2, capacity: 1 }, clock);

        await bucket.acquire();
        await bucket.acquire();

        expect(clock.sleeps).toEqual([500]);
        expect(clock.now()).toBe(500);
    });

    it('sustains the configured rate for concurrent callers', async () => {
        const clock = new FakeClock();
        const bucket = new TokenBucket({ tokensPerSecond: 2, capacity: 1 }, clock);

        await Promise.all(Array.from({ length: 5 }, () => bucket.acquire()));

        // 1 immediate + 4 at 2/s
        expect(clock.now()).toBe(2000);
        expect(clock.sleeps).toEqual([500, 500, 500, 500]);
    });

    it('serves callers in call order', async () => {
        const clock = new FakeClock();
        const bucket = new TokenBucket({ tokensPerSecond: 2, capacity: 1 }, clock);
        const order: number[] = [];

        await Promise.all([1, 2, 3].map((n) => bucket.acquire().then(() => order.push(n))));

        expect(order).toEqual([1, 2, 3]);
    });

    it('refills over time but never beyond capacity', () => {
        const clock = new FakeClock();
        const bucket = new TokenBucket({ tokensPerSecond: 2, capacity: 3 }, clock);

        clock.advance(60_000);
        expect(bucket.available()).toBe(3);
    });

    it.each([
        [{ tokensPerSecond: 0, capacity: 1 }],
        [{ tokensPerSecond: 2, capacity: 0 }],
        [{ tokensPerSecond: Number.NaN, capacity: 1 }],
    ])('rejects %o', (options) => {
        expect(() => new TokenBucket(options, new FakeClock())).toThrow(RangeError);
    });
});
