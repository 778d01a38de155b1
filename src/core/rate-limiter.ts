/**
 * Token bucket rate limiter for the DART OpenAPI.
 * Waiters are served in arrival order, so a burst of crawls drains fairly.
 */

export interface RateLimiterOptions {
  /** Sustained request budget; also the bucket size */
  requestsPerSecond?: number;
  now?: () => number;
}

export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly maxTokens: number;
  private readonly refillRate: number; // tokens per ms
  private readonly now: () => number;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions = {}) {
    const requestsPerSecond = options.requestsPerSecond ?? 5;
    if (!(requestsPerSecond > 0)) {
      throw new RangeError(`requestsPerSecond must be positive, got ${requestsPerSecond}`);
    }
    this.now = options.now ?? Date.now;
    this.maxTokens = requestsPerSecond;
    this.tokens = requestsPerSecond;
    this.refillRate = requestsPerSecond / 1000;
    this.lastRefill = this.now();
  }

  private refill(): void {
    const now = this.now();
    const elapsed = now - this.lastRefill;
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRate);
    this.lastRefill = now;
  }

  /** Resolves once a token has been taken for the caller */
  acquire(): Promise<void> {
    const turn = this.queue.then(() => this.take());
    this.queue = turn;
    return turn;
  }

  /** Tokens currently available, after refilling */
  available(): number {
    this.refill();
    return this.tokens;
  }

  private async take(): Promise<void> {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return;
    }

    const waitMs = Math.ceil((1 - this.tokens) / this.refillRate);
    await new Promise(resolve => setTimeout(resolve, waitMs));
    this.refill();
    this.tokens = Math.max(0, this.tokens - 1);
  }
}
