import type { NextFunction, Request, Response } from 'express';
import { DatabaseError } from 'pg';
import { ZodError } from 'zod';
import { getEnvironment } from '@/config/environment.js';
import { logger } from '@/config/logger.js';
import { AppError, ValidationError } from '@/shared/errors.js';
import { serializeError, translateErrorMessage } from '@/utils/errorHandling.js';

function zodIssues(error: ZodError): Array<{ field: string; message: string }> {
  return error.issues.map((issue) => ({ field: issue.path.join('.'), message: issue.message }));
}

/**
 * Normalize anything thrown by a handler into an AppError (or null for unknown failures)
 */
export function toAppError(error: unknown): AppError | null {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof ZodError) {
    return new ValidationError('Validation error', zodIssues(error));
  }
  // invalid_text_representation: a malformed uuid in a path reached a query
  if (error instanceof DatabaseError && error.code === '22P02') {
    return new ValidationError('Invalid identifier');
  }
  if (error instanceof SyntaxError && Reflect.get(error, 'type') === 'entity.parse.failed') {
    return new ValidationError('Invalid JSON body');
  }
  if (error instanceof Error && Reflect.get(error, 'type') === 'entity.too.large') {
    return new ValidationError('Request body too large');
  }
  return null;
}

// Express recognises error middleware by its four parameters
export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  const appError = toAppError(error);
  if (appError) {
    const meta = { errorCode: appError.errorCode, statusCode: appError.statusCode };
    if (appError.statusCode >= 500) {
      logger.error(`${req.method} ${req.path} failed: ${appError.message}`, meta);
    } else {
      logger.warn(`${req.method} ${req.path} failed: ${appError.message}`, meta);
    }
    res.status(appError.statusCode).json(appError.toJSON());
    return;
  }

  const details = serializeError(error);
  logger.error('Unhandled error:', { method: req.method, path: req.path, ...details });
  res.status(500).json({
    error: 'internal_error',
    message: translateErrorMessage(details.message),
    details: getEnvironment().APP_DEBUG ? details.message : null,
  });
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ error: 'not_found', message: 'Route not found', path: req.path });
}
