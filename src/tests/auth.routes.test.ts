import request from 'supertest';
import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import type { UserService } from '@/services/users.js';
import { makeUser } from './fixtures.js';

const userServiceMock = {
  getById: jest.fn<UserService['getById']>(),
  register: jest.fn<UserService['register']>(),
  authenticate: jest.fn<UserService['authenticate']>(),
  changePassword: jest.fn<UserService['changePassword']>(),
  resolveApiKey: jest.fn<UserService['resolveApiKey']>(),
};

jest.mock('@/config/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

jest.mock('@/services/users', () => ({
  UserService: jest.fn(() => userServiceMock),
}));

jest.mock('fluent-ffmpeg', () => ({
  __esModule: true,
  default: Object.assign(jest.fn(), { setFfmpegPath: jest.fn(), setFfprobePath: jest.fn(), ffprobe: jest.fn() }),
}));

jest.mock('@ffmpeg-installer/ffmpeg', () => ({
  __esModule: true,
  default: { path: '/usr/bin/ffmpeg' },
}));

import { createApp } from '@/app.js';
import { InvalidCredentialsError } from '@/shared/errors.js';
import { HealthService } from '@/shared/health.js';
import { createAccessToken, createRefreshToken, verifyAccessToken } from '@/shared/security.js';

const app = createApp({
  healthService: new HealthService(() => Promise.resolve([]), { initialize: () => Promise.resolve(), rootPath: '/tmp' }),
});
const user = makeUser();

describe('auth routes', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    userServiceMock.getById.mockResolvedValue(user);
    userServiceMock.resolveApiKey.mockResolvedValue(null);
  });

  describe('POST /api/auth/register', () => {
    it('creates the account and issues tokens', async () => {
      userServiceMock.register.mockResolvedValue(user);

      const response = await request(app).post('/api/auth/register').send({
        email: 'writer@example.com',
        username: 'writer',
        password: 'test-password',
      });

      expect(response.status).toBe(201);
      expect(response.body.token_type).toBe('bearer');
      expect(response.body.expires_in).toBe(86400);
      expect(verifyAccessToken(response.body.access_token).sub).toBe('user-1');
      expect(response.headers['set-cookie']?.[0]).toMatch(/^access_token=.+; .*HttpOnly/);
      expect(userServiceMock.register).toHaveBeenCalledWith({
        email: 'writer@example.com',
        username: 'writer',
        password: 'test-password',
        language: 'en',
      });
    });

    it('takes the language from Accept-Language when none is given', async () => {
      userServiceMock.register.mockResolvedValue(user);

      await request(app)
        .post('/api/auth/register')
        .set('Accept-Language', 'fr-FR,de-DE;q=0.8,en;q=0.5')
        .send({ email: 'writer@example.com', username: 'writer', password: 'test-password' });

      expect(userServiceMock.register).toHaveBeenCalledWith(expect.objectContaining({ language: 'de' }));
    });

    it('rejects invalid usernames', async () => {
      const response = await request(app).post('/api/auth/register').send({
        email: 'writer@example.com',
        username: 'bad name!',
        password: 'test-password',
      });

      expect(response.status).toBe(422);
      expect(response.body.error).toBe('validation_error');
      expect(response.body.details[0].field).toBe('username');
      expect(userServiceMock.register).not.toHaveBeenCalled();
    });
  });

  describe('POST /api/auth/login', () => {
    it('accepts an email in place of the login field', async () => {
      userServiceMock.authenticate.mockResolvedValue(user);

      const response = await request(app)
        .post('/api/auth/login')
        .send({ email: 'writer@example.com', password: 'test-password' });

      expect(response.status).toBe(200);
      expect(userServiceMock.authenticate).toHaveBeenCalledWith('writer@example.com', 'test-password');
    });

    it('answers 401 for wrong credentials', async () => {
      userServiceMock.authenticate.mockRejectedValue(new InvalidCredentialsError());

      const response = await request(app).post('/api/auth/login').send({ login: 'writer', password: 'wrong' });

      expect(response.status).toBe(401);
      expect(response.body).toEqual({
        error: 'authentication_error',
        message: 'Invalid username or password',
        details: null,
      });
    });

    it('answers 401 without any identifier', async () => {
      const response = await request(app).post('/api/auth/login').send({ password: 'test-password' });

      expect(response.status).toBe(401);
      expect(userServiceMock.authenticate).not.toHaveBeenCalled();
    });
  });

  describe('GET /api/auth/me', () => {
    it('reads a bearer token', async () => {
      const token = createAccessToken('user-1', 'writer@example.com');

      const response = await request(app).get('/api/auth/me').set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        id: 'user-1',
        email: 'writer@example.com',
        username: 'writer',
        language: 'en',
        is_active: true,
        created_at: '2026-01-15T10:00:00.000Z',
        updated_at: '2026-01-15T10:00:00.000Z',
        has_llm_api_key: false,
        has_elevenlabs_api_key: false,
        has_kieai_api_key: false,
        llm_provider: 'openrouter',
        llm_model: null,
        storage_type: 'local',
      });
      expect(userServiceMock.getById).toHaveBeenCalledWith('user-1');
    });

    it('reads the access token cookie', async () => {
      const token = createAccessToken('user-1', 'writer@example.com');

      const response = await request(app).get('/api/auth/me').set('Cookie', `access_token=${token}`);

      expect(response.status).toBe(200);
      expect(response.body.username).toBe('writer');
    });

    it('accepts an API key', async () => {
      userServiceMock.resolveApiKey.mockResolvedValue('user-1');

      const response = await request(app).get('/api/auth/me').set('X-API-Key', 'hc_test-key');

      expect(response.status).toBe(200);
      expect(userServiceMock.resolveApiKey).toHaveBeenCalledWith('hc_test-key');
    });

    it('does not accept a refresh token as an access token', async () => {
      const response = await request(app)
        .get('/api/auth/me')
        .set('Authorization', `Bearer ${createRefreshToken('user-1')}`);

      expect(response.status).toBe(401);
      expect(response.body.message).toBe('Not authenticated');
    });

    it('rejects deactivated accounts', async () => {
      userServiceMock.getById.mockResolvedValue(makeUser({ isActive: false }));
      const token = createAccessToken('user-1', 'writer@example.com');

      const response = await request(app).get('/api/auth/me').set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(401);
      expect(response.body.message).toBe('User account is deactivated');
    });
  });

  describe('POST /api/auth/refresh', () => {
    it('issues a new pair for a valid refresh token', async () => {
      const response = await request(app)
        .post('/api/auth/refresh')
        .send({ refresh_token: createRefreshToken('user-1') });

      expect(response.status).toBe(200);
      expect(verifyAccessToken(response.body.access_token).sub).toBe('user-1');
    });

    it('rejects access tokens', async () => {
      const response = await request(app)
        .post('/api/auth/refresh')
        .send({ refresh_token: createAccessToken('user-1', 'writer@example.com') });

      expect(response.status).toBe(401);
      expect(response.body.message).toBe('Invalid token');
    });
  });

  describe('GET / with optional sign-in', () => {
    it('names the signed-in user', async () => {
      const token = createAccessToken('user-1', 'writer@example.com');

      const response = await request(app).get('/').set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(200);
      expect(response.body.user).toEqual({ id: 'user-1', username: 'writer' });
    });

    it('serves deactivated accounts anonymously', async () => {
      userServiceMock.getById.mockResolvedValue(makeUser({ isActive: false }));
      const token = createAccessToken('user-1', 'writer@example.com');

      const response = await request(app).get('/').set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(200);
      expect(response.body.user).toBeNull();
    });

    it('reports failures that are not about credentials', async () => {
      userServiceMock.getById.mockRejectedValue(new Error('connection refused'));
      const token = createAccessToken('user-1', 'writer@example.com');

      const response = await request(app).get('/').set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(500);
    });
  });

  it('POST /api/auth/logout clears the cookie', async () => {
    const response = await request(app).post('/api/auth/logout');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ message: 'Logged out successfully' });
    expect(response.headers['set-cookie']?.[0]).toMatch(/^access_token=;/);
  });
});
