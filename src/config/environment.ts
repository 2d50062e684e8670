import { z } from 'zod';
import { config } from 'dotenv';
import fs from 'fs';

// Load environment variables based on NODE_ENV
const nodeEnv = process.env.NODE_ENV || 'development';

if (nodeEnv === 'production') {
  if (fs.existsSync('.env.production')) {
    config({ path: '.env.production' });
  }
} else if (nodeEnv === 'development') {
  if (fs.existsSync('.env.local')) {
    config({ path: '.env.local' });
  }
  if (fs.existsSync('.env')) {
    config({ path: '.env' });
  }
} else {
  if (fs.existsSync(`.env.${nodeEnv}`)) {
    config({ path: `.env.${nodeEnv}` });
  }
  if (fs.existsSync('.env')) {
    config({ path: '.env' });
  }
}

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .string()
    .optional()
    .default(fallback)
    .transform((v) => v === 'true' || v === '1');

const positiveInt = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((v) => {
      const n = v ? parseInt(v, 10) : fallback;
      return Number.isNaN(n) || n <= 0 ? fallback : n;
    });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  PORT: z.string().transform(Number).default('8000'),

  APP_NAME: z.string().optional().default('HeinerCast'),
  APP_DEBUG: booleanFlag('false'),
  APP_URL: z.string().url().optional().default('http://localhost:8000'),

  DATABASE_URL: z.string().min(1),

  // Auth
  JWT_SECRET_KEY: z.string().min(1),
  JWT_ALGORITHM: z.enum(['HS256', 'HS384', 'HS512']).optional().default('HS256'),
  ACCESS_TOKEN_EXPIRE_HOURS: positiveInt(24),
  REFRESH_TOKEN_EXPIRE_DAYS: positiveInt(7),
  ENCRYPTION_KEY: z.string().min(1),

  // Storage
  STORAGE_TYPE: z.enum(['local', 'google_drive']).optional().default('local'),
  STORAGE_PATH: z.string().optional().default('./storage'),
  GOOGLE_DRIVE_CREDENTIALS_PATH: z.string().optional(),

  // Fallback vendor keys used when a user has not configured their own
  DEFAULT_OPENROUTER_API_KEY: z.string().optional(),
  DEFAULT_ELEVENLABS_API_KEY: z.string().optional(),
  DEFAULT_KIEAI_API_KEY: z.string().optional(),

  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional().default('info'),
  LOG_PATH: z.string().optional(),

  RATE_LIMIT_PER_MINUTE: positiveInt(60),

  // ffprobe binary; system PATH when unset
  FFPROBE_PATH: z.string().optional(),
});

export type Environment = z.infer<typeof envSchema>;

let cachedEnv: Environment | null = null;

export function getEnvironment(): Environment {
  if (cachedEnv) {
    return cachedEnv;
  }

  try {
    cachedEnv = envSchema.parse({
      ...process.env,
      PORT: process.env.PORT || '8000',
    });
    return cachedEnv;
  } catch (error) {
    console.error('Environment validation failed:', error);
    throw error;
  }
}

// Test-only helper to drop the cached environment after mutating process.env
export function resetEnvironmentForTests(): void {
  cachedEnv = null;
}

export function validateEnvironment(): void {
  try {
    const env = getEnvironment();
    console.log('✅ Environment variables validated successfully');
    console.log(`📝 Running in ${env.NODE_ENV} mode`);
    console.log(`🔌 Server will start on port ${env.PORT}`);
    console.log(`📦 Storage: ${env.STORAGE_TYPE} (${env.STORAGE_PATH})`);
    if (env.STORAGE_TYPE === 'google_drive') {
      console.log('⚠️ Google Drive storage is not available, files are kept on local disk');
    }
  } catch (error) {
    console.error('❌ Environment validation failed');
    throw error;
  }
}

// Export individual config objects for easier imports
export const authConfig = {
  get: () => {
    const env = getEnvironment();
    return {
      secret: env.JWT_SECRET_KEY,
      algorithm: env.JWT_ALGORITHM,
      accessTokenHours: env.ACCESS_TOKEN_EXPIRE_HOURS,
      refreshTokenDays: env.REFRESH_TOKEN_EXPIRE_DAYS,
      encryptionKey: env.ENCRYPTION_KEY,
    };
  },
};
