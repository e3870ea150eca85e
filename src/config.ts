import dotenv from 'dotenv';

dotenv.config();

export type SequenceBackend = 'sqlite' | 'kv';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function parseLogLevel(value: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  return level ?? 'info';
}

function parseSequenceBackend(value: string | undefined): SequenceBackend {
  return value === 'kv' ? 'kv' : 'sqlite';
}

export const config = {
  // Server configuration
  port: parseInt(process.env.PORT || '3000', 10),
  baseUrl: process.env.BASE_URL || 'http://localhost:3000',

  // KV configuration (cache + counter)
  kv: {
    host: process.env.KV_HOST || 'localhost',
    port: parseInt(process.env.KV_PORT || '6380', 10),
    connectionTimeout: 5000,
    commandTimeout: 3000,
    logging: process.env.KV_LOGGING === 'true',
  },

  // Durable store
  database: {
    path: process.env.DATABASE_PATH || './data/shortlinks.db',
    replicaPath: process.env.DATABASE_REPLICA_PATH || undefined,
    // Defaults to the store timeout, which cannot interrupt a synchronous driver
    busyTimeoutMs: parseInt(process.env.DATABASE_BUSY_TIMEOUT_MS || process.env.STORE_TIMEOUT_MS || '2000', 10),
  },

  // URL shortener settings
  shortener: {
    maxUrlLength: 2048,
    maxCodeLength: 12,
    cacheDefaultTtl: parseInt(process.env.CACHE_DEFAULT_TTL_SECONDS || '86400', 10), // 24 hours
    cacheTimeoutMs: parseInt(process.env.CACHE_TIMEOUT_MS || '200', 10),
    storeTimeoutMs: parseInt(process.env.STORE_TIMEOUT_MS || '2000', 10),
    sequenceBackend: parseSequenceBackend(process.env.SEQUENCE_BACKEND),
    sequenceKey: 'seq:shortlink',
  },

  // Expired-record cleanup
  sweeper: {
    enabled: process.env.SWEEPER_ENABLED !== 'false',
    schedule: process.env.SWEEPER_SCHEDULE || '0 3 * * *', // daily, 03:00
  },

  // Rate limiting
  rateLimit: {
    enabled: process.env.RATE_LIMIT_ENABLED !== 'false',
    maxRequests: parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '100', 10),
    windowSeconds: parseInt(process.env.RATE_LIMIT_WINDOW_SECONDS || '60', 10),
  },

  logging: {
    level: parseLogLevel(process.env.LOG_LEVEL),
  },
};
