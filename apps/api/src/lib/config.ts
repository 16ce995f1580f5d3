// apps/api/src/lib/config.ts
import dotenv from 'dotenv';

export interface Config {
  mongoUri: string;
  mongoDbName: string;
  jwtSecret: string;
  encryptionKey: string;
  port: number;
  corsOrigins: string[];
}

// development-only fallbacks; each one in use is reported at startup
const DEFAULTS = {
  MONGO_URI: 'mongodb://localhost:27017',
  MONGO_DB_NAME: 'user-accounts',
  JWT_SECRET: 'dev_secret',
  ENCRYPTION_KEY: '12345678901234567890123456789012',
};

function read(env: NodeJS.ProcessEnv, key: keyof typeof DEFAULTS, warnIfDefault = false) {
  const value = env[key];
  if (value) return value;
  if (warnIfDefault) {
    console.warn(`${key} not set, falling back to an insecure development default`);
  }
  return DEFAULTS[key];
}

/**
 * Reads configuration from `.env` and the process environment. Pass `env`
 * to load from somewhere other than `process.env`.
 */
export function loadConfig(env?: NodeJS.ProcessEnv): Config {
  if (!env) dotenv.config();
  const source = env ?? process.env;

  const encryptionKey = read(source, 'ENCRYPTION_KEY', true);
  if (Buffer.byteLength(encryptionKey, 'utf8') !== 32) {
    throw new Error('ENCRYPTION_KEY must be exactly 32 bytes');
  }

  const port = Number(source.PORT || 8080);
  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`invalid PORT: ${source.PORT}`);
  }

  return {
    mongoUri: read(source, 'MONGO_URI'),
    mongoDbName: read(source, 'MONGO_DB_NAME'),
    jwtSecret: read(source, 'JWT_SECRET', true),
    encryptionKey,
    port,
    // comma-separated; trailing slashes stripped so they compare against Origin headers
    corsOrigins: (source.CORS_ORIGINS || '')
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean)
      .map((s) => s.replace(/\/+$/, '')),
  };
}
