import { Server } from 'http';
import { getEnvironment, validateEnvironment } from '@/config/environment.js';
import { logger } from '@/config/logger.js';
import { closeDatabaseConnection } from '@/db/connection.js';
import { getStorageService } from '@/services/storage-singleton.js';
import { createApp } from './app.js';

// Graceful server startup with port conflict handling
async function startServer(): Promise<void> {
  validateEnvironment();
  const env = getEnvironment();
  const port = env.PORT;
  const app = createApp();

  const tryStartServer = (portToTry: number): Promise<Server> => {
    return new Promise<Server>((resolve, reject) => {
      const server = app.listen(portToTry, () => {
        logger.info(`🎧 ${env.APP_NAME} started`);
        logger.info(`📍 Environment: ${env.NODE_ENV}`);
        logger.info(`🔌 Port: ${portToTry}`);
        resolve(server);
      });
      server.on('error', reject);
    });
  };

  await getStorageService().initialize();
  logger.info(`📁 Storage: ${getStorageService().rootPath}`);

  let currentPort = port;
  let server: Server | undefined;

  while (!server && currentPort < port + 10) {
    try {
      server = await tryStartServer(currentPort);
      if (currentPort !== port) {
        logger.info(`Port ${port} was in use, successfully started on port ${currentPort}`);
      }
    } catch (err: unknown) {
      const code = err instanceof Error ? Reflect.get(err, 'code') : undefined;
      // Only auto-retry with a different port if PORT wasn't explicitly set
      if (code === 'EADDRINUSE' && !process.env.PORT) {
        logger.warn(`Port ${currentPort} is already in use, trying port ${currentPort + 1}...`);
        currentPort++;
      } else {
        throw err;
      }
    }
  }

  if (!server) {
    throw new Error(`Failed to find available port after trying ports ${port} to ${currentPort - 1}`);
  }

  setupGracefulShutdown(server);
}

function setupGracefulShutdown(server: Server): void {
  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, shutting down gracefully`);
    server.close(() => {
      closeDatabaseConnection()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Failed to close database connection', {
            error: error instanceof Error ? error.message : String(error),
          });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

startServer().catch((error: unknown) => {
  logger.error('Server failed to start', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
