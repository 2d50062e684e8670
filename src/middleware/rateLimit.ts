import type { NextFunction, Request, Response } from 'express';
import { logger } from '@/config/logger.js';
import { RateLimitExceededError } from '@/shared/errors.js';

interface Window {
  startedAt: number;
  count: number;
}

const WINDOW_MS = 60 * 1000;

/**
 * Fixed one-minute window per client IP, kept in process memory
 */
export function createRateLimiter(limitPerMinute: number, now: () => number = Date.now) {
  const windows = new Map<string, Window>();

  return function rateLimit(req: Request, res: Response, next: NextFunction): void {
    const key = req.ip ?? 'unknown';
    const timestamp = now();

    let window = windows.get(key);
    if (!window || timestamp - window.startedAt >= WINDOW_MS) {
      window = { startedAt: timestamp, count: 0 };
      windows.set(key, window);
    }
    window.count += 1;

    // Evict expired windows once the map gets large
    if (windows.size > 10000) {
      for (const [ip, entry] of windows) {
        if (timestamp - entry.startedAt >= WINDOW_MS) {
          windows.delete(ip);
        }
      }
    }

    if (window.count > limitPerMinute) {
      logger.warn('Rate limit exceeded', { ip: key, path: req.path });
      res.setHeader('Retry-After', String(Math.ceil((window.startedAt + WINDOW_MS - timestamp) / 1000)));
      next(new RateLimitExceededError('Too many requests. Please try again later.'));
      return;
    }
    next();
  };
}
