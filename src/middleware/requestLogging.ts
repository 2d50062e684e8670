import type { NextFunction, Request, Response } from 'express';
import { logger } from '@/config/logger.js';

export function requestLogging(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  res.on('finish', () => {
    const duration = Date.now() - startTime;
    logger.info(`${req.method} ${req.originalUrl.split('?')[0]} - ${res.statusCode} - ${duration}ms`);
  });
  next();
}
