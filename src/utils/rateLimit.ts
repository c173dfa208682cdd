export interface RateLimitDecision {
  allowed: boolean;
  retryAfterSec: number;
  remainingTokens: number;
}

/** Inbound limiter; each client key drains its own bucket. */
export interface RateLimiter {
  consume(clientKey: string, tokens?: number): RateLimitDecision;
}

export interface TokenBucketOptions {
  rpm: number;
  burst: number;
  now?: () => number;
  /** Buckets idle this long are dropped; they would be full again anyway. */
  idleEvictMs?: number;
}

interface Bucket {
  tokens: number;
  lastRefill: number;
}

export class TokenBucketRateLimiter implements RateLimiter {
  private readonly capacity: number;
  private readonly refillPerSecond: number;
  private readonly now: () => number;
  private readonly idleEvictMs: number;
  private readonly buckets = new Map<string, Bucket>();
  private lastSweep: number;

  public constructor(options: TokenBucketOptions) {
    this.capacity = options.burst;
    this.refillPerSecond = options.rpm / 60;
    this.now = options.now ?? (() => Date.now());
    this.idleEvictMs = options.idleEvictMs ?? 10 * 60 * 1000;
    this.lastSweep = this.now();
  }

  public get trackedClients(): number {
    return this.buckets.size;
  }

  public consume(clientKey: string, requestedTokens = 1): RateLimitDecision {
    const now = this.now();
    this.sweep(now);
    const bucket = this.refill(clientKey, now);

    if (bucket.tokens >= requestedTokens) {
      bucket.tokens -= requestedTokens;
      return { allowed: true, retryAfterSec: 0, remainingTokens: bucket.tokens };
    }

    const needed = requestedTokens - bucket.tokens;
    const retryAfterSec = this.refillPerSecond > 0 ? Math.max(1, Math.ceil(needed / this.refillPerSecond)) : 60;
    return { allowed: false, retryAfterSec, remainingTokens: bucket.tokens };
  }

  private refill(clientKey: string, now: number): Bucket {
    const bucket = this.buckets.get(clientKey);
    if (!bucket) {
      const fresh = { tokens: this.capacity, lastRefill: now };
      this.buckets.set(clientKey, fresh);
      return fresh;
    }

    const elapsedSeconds = Math.max(0, (now - bucket.lastRefill) / 1000);
    bucket.lastRefill = now;
    bucket.tokens = Math.min(this.capacity, bucket.tokens + elapsedSeconds * this.refillPerSecond);
    return bucket;
  }

  private sweep(now: number): void {
    if (now - this.lastSweep < this.idleEvictMs) {
      return;
    }
    this.lastSweep = now;
    for (const [key, bucket] of this.buckets) {
      if (now - bucket.lastRefill >= this.idleEvictMs) {
        this.buckets.delete(key);
      }
    }
  }
}
