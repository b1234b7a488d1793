/**
 * Token Bucket Rate Limiter
 *
 * One bucket per identifier (connection id). Buckets start full, refill
 * continuously at capacity / windowMs tokens per millisecond, and every
 * accepted operation consumes one token.
 */

interface Bucket {
  tokens: number;
  lastRefill: number;
}

export interface RateLimiterOptions {
  /** Maximum tokens in a bucket */
  capacity: number;
  /** Time to refill an empty bucket completely */
  windowMs: number;
  /** Clock override for tests */
  now?: () => number;
  /** How often idle buckets are swept; 0 disables the sweep */
  sweepIntervalMs?: number;
}

const DEFAULT_SWEEP_INTERVAL_MS = 300_000;

export class RateLimiter {
  private readonly buckets: Map<string, Bucket> = new Map();
  private readonly capacity: number;
  private readonly windowMs: number;
  private readonly refillRate: number; // tokens per millisecond
  private readonly now: () => number;
  private readonly sweepInterval: ReturnType<typeof setInterval> | null;

  constructor(options: RateLimiterOptions) {
    this.capacity = options.capacity;
    this.windowMs = options.windowMs;
    this.refillRate = options.capacity / options.windowMs;
    this.now = options.now ?? Date.now;

    const sweepMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    if (sweepMs > 0) {
      this.sweepInterval = setInterval(() => this.sweep(), sweepMs);
      this.sweepInterval.unref();
    } else {
      this.sweepInterval = null;
    }
  }

  /** Drop buckets idle long enough to have refilled completely */
  sweep(): void {
    const now = this.now();
    for (const [id, bucket] of this.buckets) {
      if (now - bucket.lastRefill >= this.windowMs) {
        this.buckets.delete(id);
      }
    }
  }

  dispose(): void {
    if (this.sweepInterval) clearInterval(this.sweepInterval);
    this.buckets.clear();
  }

  /**
   * Try to consume a token.
   * @returns true if the operation may proceed
   */
  tryConsume(identifier: string): boolean {
    const now = this.now();
    let bucket = this.buckets.get(identifier);

    if (!bucket) {
      bucket = { tokens: this.capacity - 1, lastRefill: now };
      this.buckets.set(identifier, bucket);
      return true;
    }

    bucket.tokens = this.refilled(bucket, now);
    bucket.lastRefill = now;

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return true;
    }
    return false;
  }

  clear(identifier: string): void {
    this.buckets.delete(identifier);
  }

  getTokenCount(identifier: string): number {
    const bucket = this.buckets.get(identifier);
    if (!bucket) return this.capacity;
    return this.refilled(bucket, this.now());
  }

  /** Milliseconds until the next token, 0 if one is available */
  getRetryAfter(identifier: string): number {
    const bucket = this.buckets.get(identifier);
    if (!bucket) return 0;

    const tokens = this.refilled(bucket, this.now());
    if (tokens >= 1) return 0;
    return Math.ceil((1 - tokens) / this.refillRate);
  }

  get size(): number {
    return this.buckets.size;
  }

  private refilled(bucket: Bucket, now: number): number {
    return Math.min(this.capacity, bucket.tokens + (now - bucket.lastRefill) * this.refillRate);
  }
}
