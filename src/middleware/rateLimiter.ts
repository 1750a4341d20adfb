import { Request, Response, NextFunction } from 'express';
import { config } from '../utils/config';
import { logger } from '../utils/logger';
import { agentError } from './errorHandler';

export const RATE_LIMIT_MESSAGE = 'Rate limit exceeded. Please wait a moment before trying again.';

export interface RateLimiterOptions {
  windowMs?: number;
  maxRequests?: number;
  now?: () => number;
}

/**
 * Sliding-window limiter keyed by user id. Must run after
 * `validateResilienceRequest`, which resolves the id.
 */
export class RateLimiter {
  private windows = new Map<string, number[]>();
  private windowMs: number;
  private maxRequests: number;
  private now: () => number;
  private cleanupTimer: NodeJS.Timeout;

  constructor(options: RateLimiterOptions = {}) {
    this.windowMs = options.windowMs ?? config.rateLimit.windowMs;
    this.maxRequests = options.maxRequests ?? config.rateLimit.maxRequests;
    this.now = options.now ?? Date.now;

    // Drop idle users every 5 minutes
    this.cleanupTimer = setInterval(() => this.cleanup(), 5 * 60 * 1000);
    this.cleanupTimer.unref();
  }

  private cleanup(): void {
    const cutoff = this.now() - this.windowMs;
    for (const [key, timestamps] of this.windows) {
      if (timestamps.every(timestamp => timestamp <= cutoff)) {
        this.windows.delete(key);
      }
    }
  }

  /**
   * Record a request for `key` if it fits in the window.
   */
  tryAcquire(key: string): { allowed: boolean; remaining: number; retryAfterMs: number } {
    const now = this.now();
    const cutoff = now - this.windowMs;
    const timestamps = (this.windows.get(key) ?? []).filter(timestamp => timestamp > cutoff);

    if (timestamps.length >= this.maxRequests) {
      this.windows.set(key, timestamps);
      return { allowed: false, remaining: 0, retryAfterMs: timestamps[0] + this.windowMs - now };
    }

    timestamps.push(now);
    this.windows.set(key, timestamps);
    return { allowed: true, remaining: this.maxRequests - timestamps.length, retryAfterMs: 0 };
  }

  middleware() {
    return (req: Request, res: Response, next: NextFunction) => {
      const key = req.resilience?.userId ?? 'anonymous';
      const result = this.tryAcquire(key);

      res.set({
        'X-RateLimit-Limit': this.maxRequests.toString(),
        'X-RateLimit-Remaining': result.remaining.toString(),
      });

      if (!result.allowed) {
        const retryAfter = Math.ceil(result.retryAfterMs / 1000);
        logger.warn(`Rate limit exceeded for user: ${key}`, { limit: this.maxRequests, resetIn: retryAfter });
        res.set('Retry-After', retryAfter.toString());
        return res.status(429).json(agentError(RATE_LIMIT_MESSAGE));
      }

      next();
    };
  }

  stop(): void {
    clearInterval(this.cleanupTimer);
  }
}
