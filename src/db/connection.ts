import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import { getDatabaseConfig } from '@/config/database.js';
import * as schema from './schema/index.js';

export type Database = NodePgDatabase<typeof schema>;

let pool: Pool | null = null;
let db: Database | null = null;

export function getDatabase(): Database {
  if (!db) {
    const config = getDatabaseConfig();

    pool = new Pool({
      ...config,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
    });

    db = drizzle(pool, { schema });
  }

  return db;
}

export async function closeDatabaseConnection(): Promise<void> {
  if (pool) {
    const current = pool;
    pool = null;
    db = null;
    await current.end();
  }
}

export { schema };
