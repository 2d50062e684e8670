import { getEnvironment } from './environment.js';

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  ssl: false | { rejectUnauthorized: boolean };
}

const POSTGRES_PROTOCOLS = new Set(['postgres:', 'postgresql:']);

/**
 * Pool settings from a postgres:// URL.
 * sslmode=require encrypts without checking the certificate; verify-ca and verify-full check it.
 */
export function parseDatabaseUrl(databaseUrl: string): DatabaseConfig {
  const url = new URL(databaseUrl);
  if (!POSTGRES_PROTOCOLS.has(url.protocol)) {
    throw new Error(`DATABASE_URL must use postgres:// or postgresql://, got ${url.protocol}`);
  }

  const sslMode = url.searchParams.get('sslmode');
  let ssl: DatabaseConfig['ssl'] = false;
  if (sslMode === 'require') {
    ssl = { rejectUnauthorized: false };
  } else if (sslMode === 'verify-ca' || sslMode === 'verify-full') {
    ssl = { rejectUnauthorized: true };
  }

  return {
    host: url.hostname,
    port: url.port ? Number(url.port) : 5432,
    user: decodeURIComponent(url.username),
    password: decodeURIComponent(url.password),
    database: decodeURIComponent(url.pathname.replace(/^\//, '')),
    ssl,
  };
}

export function getDatabaseConfig(): DatabaseConfig {
  return parseDatabaseUrl(getEnvironment().DATABASE_URL);
}
