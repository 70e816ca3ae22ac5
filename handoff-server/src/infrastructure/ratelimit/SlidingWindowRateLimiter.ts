import { IClock } from '../../domain/common/IClock';
import { RateLimitConfig } from '../config/Config';

export interface RateLimitDecision {
  allowed: boolean;
  /** Requests left in the current window after this one. */
  remaining: number;
  /** Milliseconds until the next request would be admitted; 0 when allowed. */
  retryAfterMs: number;
}

/**
 * Per-key sliding window: a request is admitted when fewer than
 * `maxRequests` were admitted during the preceding `windowMs`.
 */
export class SlidingWindowRateLimiter {
  private hits = new Map<string, number[]>();

  constructor(
    private options: RateLimitConfig,
    private clock: IClock
  ) {}

  consume(key: string): RateLimitDecision {
    const now = this.clock.now();
    const windowStart = now - this.options.windowMs;
    const recent = (this.hits.get(key) ?? []).filter(t => t > windowStart);

    if (recent.length >= this.options.maxRequests) {
      this.hits.set(key, recent);
      return {
        allowed: false,
        remaining: 0,
        retryAfterMs: recent[0] + this.options.windowMs - now
      };
    }

    recent.push(now);
    this.hits.set(key, recent);
    return {
      allowed: true,
      remaining: this.options.maxRequests - recent.length,
      retryAfterMs: 0
    };
  }

  /**
   * Drop keys with no hits inside the window.
   * @returns Number of keys removed
   */
  evictExpired(): number {
    const windowStart = this.clock.now() - this.options.windowMs;
    let removed = 0;
    for (const [key, hits] of this.hits) {
      if (hits.every(t => t <= windowStart)) {
        this.hits.delete(key);
        removed++;
      }
    }
    return removed;
  }

  reset(key?: string): void {
    if (key === undefined) {
      this.hits.clear();
    } else {
      this.hits.delete(key);
    }
  }

  get trackedKeys(): number {
    return this.hits.size;
  }
}
