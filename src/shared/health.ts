import { sql } from 'drizzle-orm';
import { getDatabase } from '@/db/connection.js';
import { logger } from '@/config/logger.js';
import { getDatabaseConfig } from '@/config/database.js';
import { APP_VERSION } from '@/config/providers.js';
import type { StorageService } from '@/services/storage.js';
import { getStorageService } from '@/services/storage-singleton.js';

type CheckStatus = 'healthy' | 'unhealthy';

export interface HealthStatus {
  status: 'healthy' | 'unhealthy' | 'degraded';
  service: string;
  timestamp: string;
  environment: string;
  version: string;
  checks: {
    database: {
      status: CheckStatus;
      message: string;
      host: string;
      responseTime?: number;
    };
    storage: {
      status: CheckStatus;
      message: string;
      path: string;
    };
  };
}

export type DatabasePing = () => Promise<unknown>;

const defaultPing: DatabasePing = () => getDatabase().execute(sql`SELECT 1 as health_check`);

export class HealthService {
  private readonly serviceName = 'heinercast';
  private readonly version = APP_VERSION;

  constructor(
    private readonly ping: DatabasePing = defaultPing,
    private readonly storage: Pick<StorageService, 'initialize' | 'rootPath'> = getStorageService(),
  ) {}

  async checkHealth(environment: string): Promise<HealthStatus> {
    const [database, storage] = await Promise.all([this.checkDatabaseHealth(), this.checkStorageHealth()]);

    const healthyCount = [database, storage].filter((check) => check.status === 'healthy').length;
    const status = healthyCount === 2 ? 'healthy' : database.status === 'healthy' ? 'degraded' : 'unhealthy';

    return {
      status,
      service: this.serviceName,
      timestamp: new Date().toISOString(),
      environment,
      version: this.version,
      checks: { database, storage },
    };
  }

  private async checkDatabaseHealth(): Promise<HealthStatus['checks']['database']> {
    const startTime = Date.now();
    const host = getDatabaseConfig().host;

    try {
      await this.ping();
      const responseTime = Date.now() - startTime;
      logger.debug(`Database health check successful (${responseTime}ms)`);
      return { status: 'healthy', message: 'Database connection successful', host, responseTime };
    } catch (error) {
      const responseTime = Date.now() - startTime;
      const errorMessage = error instanceof Error ? error.message : 'Unknown database error';
      logger.error(`Database health check failed (${responseTime}ms)`, { error: errorMessage });
      return { status: 'unhealthy', message: `Database connection failed: ${errorMessage}`, host, responseTime };
    }
  }

  private async checkStorageHealth(): Promise<HealthStatus['checks']['storage']> {
    try {
      await this.storage.initialize();
      return { status: 'healthy', message: 'Storage directory writable', path: this.storage.rootPath };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logger.error('Storage health check failed', { error: errorMessage });
      return { status: 'unhealthy', message: `Storage unavailable: ${errorMessage}`, path: this.storage.rootPath };
    }
  }
}
