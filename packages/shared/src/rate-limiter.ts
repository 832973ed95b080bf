export interface RateLimiter {
  acquire(signal?: AbortSignal): Promise<void>;
}

export type TokenBucketOptions = {
  capacity: number;
  refillPerMinute: number;
  now?: () => number;
};

export class RateLimitAbortedError extends Error {
  constructor() {
    super("rate limited: wait aborted");
    this.name = "RateLimitAbortedError";
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RateLimitAbortedError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RateLimitAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Token bucket: starts full, refills continuously at `refillPerMinute`.
 * One instance is shared by every invocation in the process.
 */
export class TokenBucketRateLimiter implements RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly msPerToken: number;
  private readonly now: () => number;

  constructor(private readonly options: TokenBucketOptions) {
    if (options.capacity < 1) throw new Error("capacity must be at least 1");
    if (options.refillPerMinute <= 0) throw new Error("refillPerMinute must be positive");
    this.now = options.now ?? Date.now;
    this.tokens = options.capacity;
    this.lastRefill = this.now();
    this.msPerToken = 60_000 / options.refillPerMinute;
  }

  available(): number {
    this.refill();
    return Math.floor(this.tokens);
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    for (;;) {
      if (signal?.aborted) throw new RateLimitAbortedError();
      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }
      const waitMs = Math.max(1, Math.ceil((1 - this.tokens) * this.msPerToken));
      await sleep(waitMs, signal);
    }
  }

  private refill() {
    const now = this.now();
    const elapsed = now - this.lastRefill;
    if (elapsed <= 0) return;
    this.tokens = Math.min(this.options.capacity, this.tokens + elapsed / this.msPerToken);
    this.lastRefill = now;
  }
}
