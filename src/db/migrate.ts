import { migrate } from 'drizzle-orm/node-postgres/migrator';
import { closeDatabaseConnection, getDatabase } from './connection.js';
import { logger } from '@/config/logger.js';

export async function runMigrations(migrationsFolder = './drizzle'): Promise<void> {
  logger.info('Starting database migrations...', { migrationsFolder });
  await migrate(getDatabase(), { migrationsFolder });
  logger.info('✅ Database migrations completed successfully');
}

if (require.main === module) {
  runMigrations()
    .then(() => closeDatabaseConnection())
    .catch(async (error: unknown) => {
      logger.error('❌ Database migration failed:', error);
      await closeDatabaseConnection();
      process.exit(1);
    });
}
