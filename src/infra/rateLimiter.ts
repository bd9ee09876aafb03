import type { Request, Response, NextFunction, RequestHandler } from 'express';

export type RateLimitOptions = {
  windowMs: number;
  max: number;
  /** Clock in epoch milliseconds; defaults to Date.now */
  now?: () => number;
};

type RateLimitWindow = {
  count: number;
  resetAt: number;
};

/**
 * Fixed-window limiter keyed by client IP, guarding the HTTP tool endpoint.
 * A non-positive window or max disables it.
 */
export function createRateLimiter({ windowMs, max, now = Date.now }: RateLimitOptions): RequestHandler {
  if (windowMs <= 0 || max <= 0) {
    return (_req: Request, _res: Response, next: NextFunction) => next();
  }

  const windows = new Map<string, RateLimitWindow>();

  return (req: Request, res: Response, next: NextFunction) => {
    const current = now();
    const key = req.ip || 'unknown';
    let window = windows.get(key);

    if (!window || current >= window.resetAt) {
      window = { count: 0, resetAt: current + windowMs };
      windows.set(key, window);
    }
    window.count += 1;

    res.setHeader('X-RateLimit-Limit', String(max));
    res.setHeader('X-RateLimit-Reset', String(window.resetAt));

    if (window.count > max) {
      res.setHeader('Retry-After', String(Math.ceil((window.resetAt - current) / 1000)));
      res.setHeader('X-RateLimit-Remaining', '0');
      res.status(429).json({
        error: 'rate_limited',
        message: 'Too many requests. Please retry later.',
      });
      return;
    }

    res.setHeader('X-RateLimit-Remaining', String(max - window.count));
    next();
  };
}
