/**
 * Password hashing, JWT handling, API key generation and secret encryption
 */
import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'crypto';
import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { authConfig } from '@/config/environment.js';
import { ConfigurationError, InvalidTokenError, TokenExpiredError } from './errors.js';

const BCRYPT_ROUNDS = 12;
const API_KEY_PREFIX = 'hc_';
const CIPHER = 'aes-256-gcm';
const IV_LENGTH = 12;
const TAG_LENGTH = 16;

// ---------------------------------------------------------------------------
// Passwords
// ---------------------------------------------------------------------------

export function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, BCRYPT_ROUNDS);
}

export function verifyPassword(password: string, passwordHash: string): Promise<boolean> {
  return bcrypt.compare(password, passwordHash);
}

// ---------------------------------------------------------------------------
// JWT
// ---------------------------------------------------------------------------

const tokenPayloadSchema = z.object({
  sub: z.string(),
  type: z.enum(['access', 'refresh']),
  email: z.string().optional(),
  exp: z.number(),
  iat: z.number(),
});

export type TokenPayload = z.infer<typeof tokenPayloadSchema>;

export function createAccessToken(userId: string, email: string, expiresInSeconds?: number): string {
  const { secret, algorithm, accessTokenHours } = authConfig.get();
  return jwt.sign({ sub: userId, email, type: 'access' }, secret, {
    algorithm,
    expiresIn: expiresInSeconds ?? accessTokenHours * 3600,
  });
}

export function createRefreshToken(userId: string, expiresInSeconds?: number): string {
  const { secret, algorithm, refreshTokenDays } = authConfig.get();
  return jwt.sign({ sub: userId, type: 'refresh' }, secret, {
    algorithm,
    expiresIn: expiresInSeconds ?? refreshTokenDays * 86400,
  });
}

export function decodeToken(token: string): TokenPayload {
  const { secret, algorithm } = authConfig.get();
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, secret, { algorithms: [algorithm] });
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      throw new TokenExpiredError();
    }
    throw new InvalidTokenError();
  }

  const parsed = tokenPayloadSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new InvalidTokenError();
  }
  return parsed.data;
}

export function verifyAccessToken(token: string): TokenPayload {
  const payload = decodeToken(token);
  if (payload.type !== 'access') {
    throw new InvalidTokenError();
  }
  return payload;
}

export function verifyRefreshToken(token: string): TokenPayload {
  const payload = decodeToken(token);
  if (payload.type !== 'refresh') {
    throw new InvalidTokenError();
  }
  return payload;
}

// ---------------------------------------------------------------------------
// API keys
// ---------------------------------------------------------------------------

export function hashApiKey(plainKey: string): string {
  return createHash('sha256').update(plainKey).digest('hex');
}

/** Returns the plaintext key (shown once) and the hash that gets stored. */
export function generateApiKey(): { plainKey: string; keyHash: string } {
  const plainKey = API_KEY_PREFIX + randomBytes(32).toString('base64url');
  return { plainKey, keyHash: hashApiKey(plainKey) };
}

// ---------------------------------------------------------------------------
// Secrets at rest (vendor API keys, drive credentials)
// ---------------------------------------------------------------------------

function encryptionKey(): Buffer {
  const raw = Buffer.from(authConfig.get().encryptionKey, 'utf8');
  const key = Buffer.alloc(32);
  raw.copy(key, 0, 0, Math.min(raw.length, 32));
  return key;
}

export function encryptSecret(plain: string): string {
  if (!plain) {
    return '';
  }
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(CIPHER, encryptionKey(), iv);
  const ciphertext = Buffer.concat([cipher.update(plain, 'utf8'), cipher.final()]);
  const tag = cipher.getAuthTag();
  return Buffer.concat([iv, tag, ciphertext]).toString('base64url');
}

export function decryptSecret(encrypted: string | null | undefined): string {
  if (!encrypted) {
    return '';
  }
  const payload = Buffer.from(encrypted, 'base64url');
  if (payload.length <= IV_LENGTH + TAG_LENGTH) {
    throw new ConfigurationError('Stored secret is malformed');
  }
  try {
    const iv = payload.subarray(0, IV_LENGTH);
    const tag = payload.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH);
    const ciphertext = payload.subarray(IV_LENGTH + TAG_LENGTH);
    const decipher = createDecipheriv(CIPHER, encryptionKey(), iv);
    decipher.setAuthTag(tag);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
  } catch (error) {
    throw new ConfigurationError('Stored secret cannot be decrypted; re-enter it in Settings', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}

// ---------------------------------------------------------------------------
// Sanitizers
// ---------------------------------------------------------------------------

export function sanitizeText(text: string | null | undefined): string {
  if (!text) {
    return '';
  }
  return text
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, '')
    .replace(/<[^>]+>/g, '')
    .replace(/\0/g, '')
    .trim();
}

export function sanitizeFilename(filename: string | null | undefined): string {
  if (!filename) {
    return 'unnamed';
  }
  return filename.replace(/[^a-zA-Z0-9._-]/g, '_').slice(0, 255);
}
