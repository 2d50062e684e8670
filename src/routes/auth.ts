import express from 'express';
import { z } from 'zod';
import { getEnvironment } from '@/config/environment.js';
import { DEFAULT_LANGUAGE, SUPPORTED_LANGUAGES, languageFromAcceptHeader } from '@/config/locales.js';
import { logger } from '@/config/logger.js';
import type { User } from '@/db/schema/users.js';
import { ACCESS_TOKEN_COOKIE, currentUser, requireAuth } from '@/middleware/auth.js';
import { UserService } from '@/services/users.js';
import { AuthenticationError, InvalidCredentialsError } from '@/shared/errors.js';
import { createAccessToken, createRefreshToken, verifyRefreshToken } from '@/shared/security.js';
import { serializeUser } from '@/shared/serializers.js';

const router = express.Router();
const userService = new UserService();

const RegisterSchema = z.object({
  email: z.string().email(),
  username: z
    .string()
    .min(3)
    .max(50)
    .regex(/^[a-zA-Z0-9_]+$/),
  password: z.string().min(8).max(100),
  language: z.enum(SUPPORTED_LANGUAGES).optional(),
});

// `login` takes an email or a username; the separate fields are accepted too
const LoginSchema = z.object({
  login: z.string().optional(),
  email: z.string().optional(),
  username: z.string().optional(),
  password: z.string(),
});

const RefreshSchema = z.object({ refresh_token: z.string().min(1) });

const PasswordChangeSchema = z.object({
  current_password: z.string(),
  new_password: z.string().min(8).max(100),
});

/**
 * Issue a token pair and mirror the access token into the httpOnly cookie
 */
function sendTokens(res: express.Response, user: User, status = 200): void {
  const env = getEnvironment();
  const expiresIn = env.ACCESS_TOKEN_EXPIRE_HOURS * 3600;
  const accessToken = createAccessToken(user.id, user.email);

  res.cookie(ACCESS_TOKEN_COOKIE, accessToken, {
    httpOnly: true,
    sameSite: 'lax',
    secure: env.NODE_ENV === 'production',
    maxAge: expiresIn * 1000,
  });
  res.status(status).json({
    access_token: accessToken,
    refresh_token: createRefreshToken(user.id),
    token_type: 'bearer',
    expires_in: expiresIn,
  });
}

/**
 * POST /api/auth/register
 * Without an explicit language the browser's Accept-Language decides
 */
router.post('/register', async (req, res, next): Promise<void> => {
  try {
    const body = RegisterSchema.parse(req.body);
    const user = await userService.register({
      ...body,
      language: body.language ?? languageFromAcceptHeader(req.header('accept-language')) ?? DEFAULT_LANGUAGE,
    });
    sendTokens(res, user, 201);
  } catch (error) {
    next(error);
  }
});

/**
 * POST /api/auth/login
 */
router.post('/login', async (req, res, next): Promise<void> => {
  try {
    const body = LoginSchema.parse(req.body);
    const login = body.login || body.email || body.username;
    if (!login) {
      throw new InvalidCredentialsError();
    }

    const user = await userService.authenticate(login, body.password);
    logger.info('User logged in', { userId: user.id });
    sendTokens(res, user);
  } catch (error) {
    next(error);
  }
});

/**
 * POST /api/auth/refresh
 */
router.post('/refresh', async (req, res, next): Promise<void> => {
  try {
    const { refresh_token } = RefreshSchema.parse(req.body);
    const payload = verifyRefreshToken(refresh_token);

    const user = await userService.getById(payload.sub);
    if (!user || !user.isActive) {
      throw new AuthenticationError('Invalid refresh token');
    }
    sendTokens(res, user);
  } catch (error) {
    next(error);
  }
});

router.post('/logout', (_req, res): void => {
  res.clearCookie(ACCESS_TOKEN_COOKIE);
  res.json({ message: 'Logged out successfully' });
});

router.get('/me', requireAuth, (req, res): void => {
  res.json(serializeUser(currentUser(req)));
});

router.post('/change-password', requireAuth, async (req, res, next): Promise<void> => {
  try {
    const body = PasswordChangeSchema.parse(req.body);
    await userService.changePassword(currentUser(req), body.current_password, body.new_password);
    res.json({ message: 'Password changed successfully' });
  } catch (error) {
    next(error);
  }
});

export { router as authRouter };
