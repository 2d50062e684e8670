import type { NextFunction, Request, Response } from 'express';
import '@/types/express.js';
import { logger } from '@/config/logger.js';
import type { User } from '@/db/schema/users.js';
import { AuthenticationError, NotFoundError } from '@/shared/errors.js';
import { verifyAccessToken, type TokenPayload } from '@/shared/security.js';
import { UserService } from '@/services/users.js';

export const ACCESS_TOKEN_COOKIE = 'access_token';

const userService = new UserService();

function bearerToken(req: Request): string | null {
  const header = req.header('authorization');
  if (!header) {
    return null;
  }
  const [scheme, token] = header.split(' ');
  return scheme?.toLowerCase() === 'bearer' && token ? token : null;
}

function cookieToken(req: Request): string | null {
  const cookies: unknown = req.cookies;
  if (typeof cookies !== 'object' || cookies === null) {
    return null;
  }
  const token: unknown = Reflect.get(cookies, ACCESS_TOKEN_COOKIE);
  return typeof token === 'string' && token ? token : null;
}

async function loadUser(userId: string): Promise<User> {
  const user = await userService.getById(userId);
  if (!user) {
    throw new NotFoundError('User');
  }
  if (!user.isActive) {
    throw new AuthenticationError('User account is deactivated');
  }
  return user;
}

/**
 * Bearer token, then the access_token cookie, then X-API-Key.
 * A token that fails verification falls through to the next method.
 */
export async function resolveUser(req: Request): Promise<User | null> {
  for (const token of [bearerToken(req), cookieToken(req)]) {
    if (!token) {
      continue;
    }
    let payload: TokenPayload;
    try {
      payload = verifyAccessToken(token);
    } catch (error) {
      if (!(error instanceof AuthenticationError)) {
        throw error;
      }
      logger.debug('Access token rejected', { error: error.message });
      continue;
    }
    return loadUser(payload.sub);
  }

  const apiKey = req.header('x-api-key');
  if (apiKey) {
    const userId = await userService.resolveApiKey(apiKey);
    if (userId) {
      return loadUser(userId);
    }
  }

  return null;
}

export function requireAuth(req: Request, _res: Response, next: NextFunction): void {
  resolveUser(req)
    .then((user) => {
      if (!user) {
        throw new AuthenticationError('Not authenticated');
      }
      req.user = user;
      next();
    })
    .catch(next);
}

export function optionalAuth(req: Request, _res: Response, next: NextFunction): void {
  resolveUser(req)
    .then((user) => {
      if (user) {
        req.user = user;
      }
      next();
    })
    .catch((error: unknown) => {
      // A rejected or stale credential reads as anonymous; anything else is a real failure
      if (!(error instanceof AuthenticationError || error instanceof NotFoundError)) {
        next(error);
        return;
      }
      logger.debug('Optional authentication skipped', { error: error.message });
      next();
    });
}

/**
 * The user set by requireAuth
 */
export function currentUser(req: Request): User {
  if (!req.user) {
    throw new AuthenticationError('Not authenticated');
  }
  return req.user;
}
