import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RateLimiter } from '../src/core/rate-limiter.js';

describe('RateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('allows immediate acquisition when tokens are available', async () => {
    const limiter = new RateLimiter({ requestsPerSecond: 10 });
    await limiter.acquire();
    expect(limiter.available()).toBe(9);
  });

  it('throttles when tokens are exhausted', async () => {
    const limiter = new RateLimiter({ requestsPerSecond: 2 });
    await limiter.acquire();
    await limiter.acquire();

    let done = false;
    const third = limiter.acquire().then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(499);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await third;
    expect(done).toBe(true);
  });

  it('refills tokens over time up to the bucket size', async () => {
    const limiter = new RateLimiter({ requestsPerSecond: 4 });
    for (let i = 0; i < 4; i++) await limiter.acquire();
    expect(limiter.available()).toBe(0);

    vi.advanceTimersByTime(500);
    expect(limiter.available()).toBeCloseTo(2, 6);

    vi.advanceTimersByTime(10_000);
    expect(limiter.available()).toBe(4);
  });

  it('serves waiters in arrival order', async () => {
    const limiter = new RateLimiter({ requestsPerSecond: 1 });
    const order: number[] = [];
    const all = Promise.all([1, 2, 3].map(n => limiter.acquire().then(() => order.push(n))));

    await vi.advanceTimersByTimeAsync(2000);
    await all;
    expect(order).toEqual([1, 2, 3]);
  });

  it('uses an injected clock', () => {
    let now = 0;
    const limiter = new RateLimiter({ requestsPerSecond: 5, now: () => now });
    expect(limiter.available()).toBe(5);
    now = 1000;
    expect(limiter.available()).toBe(5);
  });

  it('rejects a non-positive rate', () => {
    expect(() => new RateLimiter({ requestsPerSecond: 0 })).toThrow(RangeError);
  });
});
