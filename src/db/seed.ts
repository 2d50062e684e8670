import { closeDatabaseConnection } from './connection.js';
import { logger } from '@/config/logger.js';
import { CoverStyleService } from '@/services/cover-styles.js';

export async function seedDatabase(): Promise<void> {
  logger.info('Seeding cover styles...');
  const inserted = await new CoverStyleService().seedDefaults();
  logger.info('✅ Database seed completed', { coverStylesInserted: inserted });
}

if (require.main === module) {
  seedDatabase()
    .then(() => closeDatabaseConnection())
    .catch(async (error: unknown) => {
      logger.error('❌ Database seed failed:', error);
      await closeDatabaseConnection();
      process.exit(1);
    });
}
