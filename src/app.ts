import cookieParser from 'cookie-parser';
import express from 'express';
import helmet from 'helmet';
import { getEnvironment } from '@/config/environment.js';
import { logger } from '@/config/logger.js';
import { APP_VERSION } from '@/config/providers.js';
import { optionalAuth, requireAuth } from '@/middleware/auth.js';
import { errorHandler, notFoundHandler } from '@/middleware/errorHandler.js';
import { createRateLimiter } from '@/middleware/rateLimit.js';
import { requestLogging } from '@/middleware/requestLogging.js';
import { authRouter } from '@/routes/auth.js';
import { coverStylesRouter } from '@/routes/cover-styles.js';
import { episodesRouter } from '@/routes/episodes.js';
import { filesRouter } from '@/routes/files.js';
import { generationRouter } from '@/routes/generation.js';
import { projectsRouter } from '@/routes/projects.js';
import { settingsRouter } from '@/routes/settings.js';
import { templatesRouter } from '@/routes/templates.js';
import { usersRouter } from '@/routes/users.js';
import { voicesRouter } from '@/routes/voices.js';
import { getStorageService } from '@/services/storage-singleton.js';
import { STORAGE_URL_PREFIX } from '@/services/storage.js';
import { HealthService } from '@/shared/health.js';

export interface AppOptions {
  healthService?: HealthService;
}

export function createApp(options: AppOptions = {}): express.Express {
  const app = express();
  const env = getEnvironment();
  const healthService = options.healthService ?? new HealthService();

  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          scriptSrc: ["'self'"],
          styleSrc: ["'self'", "'unsafe-inline'"],
          imgSrc: ["'self'", 'https:', 'data:', 'blob:'],
          mediaSrc: ["'self'", 'https:', 'data:', 'blob:'],
          connectSrc: ["'self'", 'https:'],
        },
      },
      frameguard: { action: 'deny' },
      referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
    }),
  );

  app.use(requestLogging);
  app.use(createRateLimiter(env.RATE_LIMIT_PER_MINUTE));

  // Reference images arrive as base64 data URLs
  app.use(express.json({ limit: '15mb' }));
  app.use(express.urlencoded({ extended: true }));
  app.use(cookieParser());

  app.use(STORAGE_URL_PREFIX, express.static(getStorageService().rootPath));

  app.get('/', optionalAuth, (req, res) => {
    res.json({
      name: env.APP_NAME,
      version: APP_VERSION,
      environment: env.NODE_ENV,
      user: req.user ? { id: req.user.id, username: req.user.username } : null,
    });
  });

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'healthy', app_name: env.APP_NAME, version: APP_VERSION });
  });

  app.get('/health', async (_req, res) => {
    try {
      const healthStatus = await healthService.checkHealth(env.NODE_ENV);
      res.status(healthStatus.status === 'unhealthy' ? 503 : 200).json(healthStatus);
    } catch (error) {
      logger.error('Health check endpoint error', {
        error: error instanceof Error ? error.message : String(error),
      });
      res.status(503).json({
        status: 'unhealthy',
        service: 'heinercast',
        timestamp: new Date().toISOString(),
        environment: env.NODE_ENV,
        version: APP_VERSION,
        checks: {
          database: { status: 'unhealthy', message: 'Health check failed to execute' },
          storage: { status: 'unhealthy', message: 'Health check failed to execute' },
        },
      });
    }
  });

  app.use('/api/auth', authRouter);
  app.use('/api/users', requireAuth, usersRouter);
  app.use('/api/settings', settingsRouter);
  app.use('/api/projects', requireAuth, projectsRouter);
  app.use('/api/episodes', requireAuth, episodesRouter);
  app.use('/api/voices', requireAuth, voicesRouter);
  app.use('/api/generation', requireAuth, generationRouter);
  app.use('/api/files', requireAuth, filesRouter);
  app.use('/api/cover-styles', coverStylesRouter);
  app.use('/api/templates', requireAuth, templatesRouter);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
