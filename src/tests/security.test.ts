import { describe, it, expect } from '@jest/globals';
import jwt from 'jsonwebtoken';
import { InvalidTokenError, TokenExpiredError } from '@/shared/errors';
import {
  createAccessToken,
  createRefreshToken,
  decryptSecret,
  encryptSecret,
  generateApiKey,
  hashApiKey,
  hashPassword,
  sanitizeFilename,
  sanitizeText,
  verifyAccessToken,
  verifyPassword,
  verifyRefreshToken,
} from '@/shared/security';

describe('security', () => {
  describe('passwords', () => {
    it('verifies the password it hashed and rejects another', async () => {
      const hash = await hashPassword('correct horse');
      expect(hash).not.toBe('correct horse');
      await expect(verifyPassword('correct horse', hash)).resolves.toBe(true);
      await expect(verifyPassword('wrong horse', hash)).resolves.toBe(false);
    });
  });

  describe('tokens', () => {
    it('round-trips an access token', () => {
      const token = createAccessToken('user-1', 'reader@example.com');
      const payload = verifyAccessToken(token);
      expect(payload.sub).toBe('user-1');
      expect(payload.email).toBe('reader@example.com');
      expect(payload.type).toBe('access');
    });

    it('refuses a refresh token where an access token is expected', () => {
      const refresh = createRefreshToken('user-1');
      expect(verifyRefreshToken(refresh).sub).toBe('user-1');
      expect(() => verifyAccessToken(refresh)).toThrow(InvalidTokenError);
    });

    it('reports expiry separately from tampering', () => {
      const expired = jwt.sign(
        { sub: 'user-1', type: 'access', exp: Math.floor(Date.now() / 1000) - 60 },
        'test-secret',
        { algorithm: 'HS256' },
      );
      expect(() => verifyAccessToken(expired)).toThrow(TokenExpiredError);

      const foreign = jwt.sign({ sub: 'user-1', type: 'access' }, 'other-secret', { algorithm: 'HS256' });
      expect(() => verifyAccessToken(foreign)).toThrow('Invalid token');
    });
  });

  describe('api keys', () => {
    it('generates prefixed keys whose hash matches hashApiKey', () => {
      const { plainKey, keyHash } = generateApiKey();
      expect(plainKey.startsWith('hc_')).toBe(true);
      expect(keyHash).toBe(hashApiKey(plainKey));
      expect(keyHash).toHaveLength(64);
    });
  });

  describe('secret encryption', () => {
    it('decrypts what it encrypted', () => {
      const encrypted = encryptSecret('test-secret');
      expect(encrypted).not.toContain('test-secret');
      expect(decryptSecret(encrypted)).toBe('test-secret');
    });

    it('maps empty values to empty strings', () => {
      expect(encryptSecret('')).toBe('');
      expect(decryptSecret(null)).toBe('');
    });

    it('rejects a malformed payload', () => {
      expect(() => decryptSecret('abc')).toThrow('Stored secret is malformed');
    });
  });

  describe('sanitizers', () => {
    it('strips markup and script blocks', () => {
      expect(sanitizeText('  <b>Hello</b><script>alert(1)</script> world ')).toBe('Hello world');
    });

    it('replaces unsafe filename characters', () => {
      expect(sanitizeFilename('my cover (final).png')).toBe('my_cover__final_.png');
      expect(sanitizeFilename(undefined)).toBe('unnamed');
    });
  });
});
