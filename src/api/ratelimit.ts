/**
 * Rate limiting for the knockout tracker API
 *
 * Imports walk the disk, so they are limited much harder than reads.
 */

import { type Request, type Response, type NextFunction } from 'express';

export interface RateLimitEntry {
  count: number;
  windowStart: number;
}

export interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
  message: string;
}

export const RATE_LIMITS = {
  // Disk-walking imports
  import: { windowMs: 60_000, maxRequests: 5, message: 'Too many imports' },

  // Read-only queries
  query: { windowMs: 10_000, maxRequests: 100, message: 'Too many requests' },
} as const;

export interface RateLimiter {
  (req: Request, res: Response, next: NextFunction): void;
  /** Drop windows older than `maxAgeMs` */
  prune(now?: number, maxAgeMs?: number): void;
}

/**
 * Check and count one request against a window store
 */
export function checkLimit(
  limits: Map<string, RateLimitEntry>,
  key: string,
  config: RateLimitConfig,
  now = Date.now()
): { allowed: boolean; remaining: number; resetIn: number } {
  const entry = limits.get(key);

  if (!entry || now - entry.windowStart >= config.windowMs) {
    limits.set(key, { count: 1, windowStart: now });
    return { allowed: true, remaining: config.maxRequests - 1, resetIn: config.windowMs };
  }

  if (entry.count >= config.maxRequests) {
    const resetIn = config.windowMs - (now - entry.windowStart);
    return { allowed: false, remaining: 0, resetIn };
  }

  entry.count++;
  return {
    allowed: true,
    remaining: config.maxRequests - entry.count,
    resetIn: config.windowMs - (now - entry.windowStart),
  };
}

/**
 * Create rate limit middleware keyed by client IP and path
 */
export function rateLimit(config: RateLimitConfig): RateLimiter {
  const limits = new Map<string, RateLimitEntry>();

  const middleware = (req: Request, res: Response, next: NextFunction): void => {
    const ip = req.ip || req.socket.remoteAddress || 'unknown';
    const result = checkLimit(limits, `${ip}:${req.path}`, config);

    res.set('X-RateLimit-Limit', config.maxRequests.toString());
    res.set('X-RateLimit-Remaining', result.remaining.toString());
    res.set('X-RateLimit-Reset', Math.ceil(result.resetIn / 1000).toString());

    if (!result.allowed) {
      res.status(429).json({
        error: config.message,
        retryAfter: Math.ceil(result.resetIn / 1000),
      });
      return;
    }

    next();
  };

  const prune = (now = Date.now(), maxAgeMs = 300_000): void => {
    for (const [key, entry] of limits) {
      if (now - entry.windowStart > maxAgeMs) limits.delete(key);
    }
  };

  return Object.assign(middleware, { prune });
}
