import type { Request, Response, NextFunction, RequestHandler } from 'express';

export interface RateLimitConfig {
  windowMs: number; // Time window in milliseconds
  maxRequests: number; // Maximum requests per window
  keyGenerator?: (req: Request) => string;
  clock?: () => number;
}

const clientKey = (req: Request): string => req.ip ?? 'unknown';

/**
 * Fixed-window request limiter keyed by client (or by whatever keyGenerator returns).
 */
export class RateLimiter {
  private requests: Map<string, { count: number; resetTime: number }> = new Map();
  private readonly config: Required<RateLimitConfig>;
  private cleanupTimer: NodeJS.Timeout | null;

  constructor(config: RateLimitConfig) {
    this.config = {
      keyGenerator: clientKey,
      clock: Date.now,
      ...config,
    };

    // Clean up expired entries every minute
    this.cleanupTimer = setInterval(() => {
      this.cleanupExpiredEntries();
    }, 60000);
    this.cleanupTimer.unref();
  }

  /**
   * Express middleware for rate limiting
   */
  middleware(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      const key = this.config.keyGenerator(req);
      const now = this.config.clock();

      let rateLimitInfo = this.requests.get(key);
      if (!rateLimitInfo || rateLimitInfo.resetTime <= now) {
        rateLimitInfo = { count: 0, resetTime: now + this.config.windowMs };
        this.requests.set(key, rateLimitInfo);
      }

      if (rateLimitInfo.count >= this.config.maxRequests) {
        const retryAfter = Math.ceil((rateLimitInfo.resetTime - now) / 1000);

        res.set({
          'X-RateLimit-Limit': this.config.maxRequests.toString(),
          'X-RateLimit-Remaining': '0',
          'X-RateLimit-Reset': new Date(rateLimitInfo.resetTime).toISOString(),
          'Retry-After': retryAfter.toString(),
        });

        res.status(429).json({
          success: false,
          error: 'RATE_LIMITED',
          message: 'Rate limit exceeded',
          retryAfter,
          timestamp: new Date().toISOString(),
        });
        return;
      }

      rateLimitInfo.count++;

      const remaining = Math.max(0, this.config.maxRequests - rateLimitInfo.count);
      res.set({
        'X-RateLimit-Limit': this.config.maxRequests.toString(),
        'X-RateLimit-Remaining': remaining.toString(),
        'X-RateLimit-Reset': new Date(rateLimitInfo.resetTime).toISOString(),
      });

      next();
    };
  }

  /**
   * Stop the cleanup timer.
   */
  stop(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  private cleanupExpiredEntries(): void {
    const now = this.config.clock();
    let cleaned = 0;

    for (const [key, info] of this.requests.entries()) {
      if (info.resetTime <= now) {
        this.requests.delete(key);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      console.log(`Cleaned up ${cleaned} expired rate limit entries`);
    }
  }
}

/**
 * Pre-configured rate limiters for the HTTP service
 */
export class RateLimitPresets {
  /**
   * Per-client limit across the whole API
   */
  static global(maxRequests = 1000): RateLimiter {
    return new RateLimiter({
      windowMs: 60 * 1000, // 1 minute
      maxRequests,
    });
  }

  /**
   * Per-client, per-resource write limit
   */
  static resourceWrites(maxRequests = 120): RateLimiter {
    return new RateLimiter({
      windowMs: 60 * 1000, // 1 minute
      maxRequests,
      keyGenerator: (req: Request) => {
        const resourceId = req.params['resourceId'];
        return resourceId ? `resource:${resourceId}:${clientKey(req)}` : clientKey(req);
      },
    });
  }
}
