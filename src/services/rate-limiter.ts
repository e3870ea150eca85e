import type { KVStore } from '../kv-client';
import type { RateLimitResult } from '../types';
import { type Logger, createLogger } from '../utils/logger';

export interface RateLimiterOptions {
  enabled: boolean;
  maxRequests: number;
  windowSeconds: number;
  clock?: () => number;
  logger?: Logger;
}

/**
 * Fixed-window rate limiter using the KV server
 */
export class RateLimiter {
  private clock: () => number;
  private logger: Logger;

  constructor(
    private getClient: () => Promise<KVStore>,
    private options: RateLimiterOptions
  ) {
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? createLogger('rate-limit');
  }

  get limit(): number {
    return this.options.maxRequests;
  }

  /**
   * Check rate limit for an identifier (IP, API key, etc.)
   */
  async checkLimit(identifier: string): Promise<RateLimitResult> {
    if (!this.options.enabled) {
      return { allowed: true, remaining: Infinity, resetIn: 0 };
    }

    const { windowSeconds, maxRequests } = this.options;

    // Time-bucketed key for fixed window rate limiting
    const currentSecond = Math.floor(this.clock() / 1000);
    const window = Math.floor(currentSecond / windowSeconds);
    const key = `ratelimit:shorten:${identifier}:${window}`;

    try {
      const client = await this.getClient();

      // Atomic increment
      const count = await client.incr(key);

      // Set expiry on first request in window
      if (count === 1) {
        await client.expire(key, windowSeconds);
      }

      const allowed = count <= maxRequests;
      const remaining = Math.max(0, maxRequests - count);

      // Calculate seconds until window resets
      const windowStart = window * windowSeconds;
      const resetIn = windowSeconds - (currentSecond - windowStart);

      return { allowed, remaining, resetIn };
    } catch (error) {
      // On error, allow request but log
      this.logger.warn('Rate limit check failed, allowing request', { identifier, error });
      return { allowed: true, remaining: 0, resetIn: 0 };
    }
  }
}
