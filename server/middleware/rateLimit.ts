import type { Request, Response, NextFunction } from 'express';
import { ErrorCode, createErrorResponse } from '@shared/errors';

interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
  message?: string;
}

interface RateLimitEntry {
  count: number;
  resetTime: number;
}

/** Fixed-window limiter keyed by client IP and route; state lives in-process. */
export function createRateLimiter(config: RateLimitConfig) {
  const { windowMs, maxRequests, message = 'Too many requests, please try again later' } = config;
  const rateLimitStore = new Map<string, RateLimitEntry>();

  const cleanup = setInterval(() => {
    const now = Date.now();
    for (const [key, entry] of Array.from(rateLimitStore.entries())) {
      if (now > entry.resetTime) {
        rateLimitStore.delete(key);
      }
    }
  }, windowMs);
  cleanup.unref();

  return (req: Request, res: Response, next: NextFunction) => {
    const clientKey = req.ip || 'anonymous';
    const routeKey = `${clientKey}:${req.path}`;
    const now = Date.now();

    let entry = rateLimitStore.get(routeKey);

    if (!entry || now > entry.resetTime) {
      entry = { count: 1, resetTime: now + windowMs };
      rateLimitStore.set(routeKey, entry);
      return next();
    }

    entry.count++;

    if (entry.count > maxRequests) {
      console.log(`⚠️ [Rate Limit] ${routeKey} exceeded ${maxRequests} requests`);
      return res.status(429).json(createErrorResponse(ErrorCode.RATE_LIMITED, message, {
        retryAfter: Math.ceil((entry.resetTime - now) / 1000),
      }));
    }

    next();
  };
}
