import { logger, type Logger } from '../../utils/logger.js';
import { rateLimitWaits } from '../../utils/metrics.js';
import { TransientGatewayError } from '../../utils/errors.js';

/**
 * Rate limiter configuration
 */
export interface RateLimiterConfig {
  /**
   * Maximum tokens in the bucket (burst capacity)
   */
  capacity: number;
  /**
   * Tokens added per second (sustained rate)
   */
  refillRate: number;
}

/**
 * Default rate limiter configurations
 */
export const DEFAULT_RATE_LIMITS = {
  // Bybit allows 10-20 req/s per endpoint group on UTA; stay under the lowest
  BYBIT_TRADE: {
    capacity: 10,
    refillRate: 10,
  },
  BYBIT_READ: {
    capacity: 20,
    refillRate: 20,
  },
} as const;

/**
 * Token bucket rate limiter
 * Implements a token bucket algorithm for rate limiting API calls
 */
export class RateLimiter {
  private log: Logger;
  private config: RateLimiterConfig;
  private tokens: number;
  private lastRefill: number;
  private name: string;

  constructor(name: string, config: RateLimiterConfig) {
    this.name = name;
    this.config = config;
    this.tokens = config.capacity;
    this.lastRefill = Date.now();
    this.log = logger(`RateLimiter:${name}`);
  }

  /**
   * Refill tokens based on elapsed time
   */
  private refillTokens(): void {
    const now = Date.now();
    const elapsed = (now - this.lastRefill) / 1000; // Convert to seconds
    const tokensToAdd = elapsed * this.config.refillRate;

    if (tokensToAdd > 0) {
      this.tokens = Math.min(this.config.capacity, this.tokens + tokensToAdd);
      this.lastRefill = now;
    }
  }

  /**
   * Acquire a token, waiting if necessary
   * @param tokens Number of tokens to acquire (default: 1)
   * @param timeoutMs Maximum time to wait in milliseconds
   */
  async acquire(tokens: number = 1, timeoutMs: number = 30000): Promise<void> {
    const startTime = Date.now();

    for (;;) {
      this.refillTokens();

      if (this.tokens >= tokens) {
        this.tokens -= tokens;
        const waited = Date.now() - startTime;
        if (waited > 0) {
          rateLimitWaits.labels(this.name).observe(waited);
        }
        return;
      }

      const elapsed = Date.now() - startTime;
      if (elapsed >= timeoutMs) {
        this.log.warn('Rate limit wait timed out', { tokens, timeoutMs });
        throw new TransientGatewayError(`Rate limit timeout after ${timeoutMs}ms`, { limiter: this.name });
      }

      const tokensNeeded = tokens - this.tokens;
      const waitTimeMs = Math.ceil((tokensNeeded / this.config.refillRate) * 1000);
      await new Promise<void>((resolve) => setTimeout(resolve, Math.min(waitTimeMs, timeoutMs - elapsed)));
    }
  }

  /**
   * Try to acquire tokens without waiting
   */
  tryAcquire(tokens: number = 1): boolean {
    this.refillTokens();

    if (this.tokens >= tokens) {
      this.tokens -= tokens;
      return true;
    }
    return false;
  }

  /**
   * Get current token count
   */
  getTokens(): number {
    this.refillTokens();
    return this.tokens;
  }
}
