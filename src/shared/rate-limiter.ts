import { TooManyRequestsError } from './errors';

interface RateLimiterOptions {
  maxRequestsPerMinute: number;
  maxWaitMs?: number;
}

/**
 * In-memory token bucket guarding calls to the language-model providers.
 * One instance per process; workers scaled horizontally each get their own budget.
 */
export class RateLimiter {
  private tokens: number;
  private maxTokens: number;
  private refillRate: number; // tokens per ms
  private lastRefill: number;
  private maxWaitMs: number;

  constructor(options: RateLimiterOptions) {
    this.maxTokens = options.maxRequestsPerMinute;
    this.tokens = this.maxTokens;
    this.refillRate = options.maxRequestsPerMinute / 60000;
    this.lastRefill = Date.now();
    this.maxWaitMs = options.maxWaitMs || 30000;
  }

  /**
   * Acquire a token, waiting if necessary.
   * Throws TooManyRequestsError if the wait would exceed maxWaitMs.
   */
  async acquire(): Promise<void> {
    const waitMs = this.reserve();
    if (waitMs === 0) return;

    await new Promise<void>((resolve) => setTimeout(resolve, waitMs));
  }

  /**
   * Take a token now, possibly going into debt, and return how long the
   * caller must wait before using it.
   */
  private reserve(): number {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return 0;
    }

    const tokensNeeded = 1 - this.tokens;
    const waitMs = Math.ceil(tokensNeeded / this.refillRate);

    if (waitMs > this.maxWaitMs) {
      throw new TooManyRequestsError(
        `Rate limit exceeded. Try again in ${Math.ceil(waitMs / 1000)} seconds`,
        Math.ceil(waitMs / 1000)
      );
    }

    this.tokens -= 1;
    return waitMs;
  }

  private refill(): void {
    const now = Date.now();
    const elapsed = now - this.lastRefill;
    const refillAmount = elapsed * this.refillRate;

    this.tokens = Math.min(this.maxTokens, this.tokens + refillAmount);
    this.lastRefill = now;
  }
}
