import dotenv from 'dotenv';
import path from 'path';
import crypto from 'crypto';

// Load environment variables
dotenv.config();

interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
    logLevel: string;
    timezone: string;
  };
  logging: {
    dir: string;
  };
  security: {
    adminKey: string;
  };
  database: {
    path: string;
  };
  rateLimit: {
    max: number;
    window: number;
  };
  webhooks: {
    timeoutMs: number;
    dedupWindowMs: number;
    backoffScheduleMs: number[];
    defaultRetryBudget: number;
  };
  worker: {
    enabled: boolean;
    concurrency: number;
    pollIntervalMs: number;
    leaseMs: number;
    errorRetryDelayMs: number;
  };
  sentry: {
    enabled: boolean;
    dsn: string;
    environment: string;
    tracesSampleRate: number;
  };
  instanceId: string;
}

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function listFromEnv(name: string, fallback: number[]): number[] {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  return raw.split(',').map((part) => {
    const value = parseInt(part.trim(), 10);
    if (Number.isNaN(value) || value <= 0) {
      throw new Error(`${name} must be a comma separated list of positive integers, got "${raw}"`);
    }
    return value;
  });
}

const nodeEnv = process.env.NODE_ENV || 'development';

const config: Config = {
  server: {
    port: intFromEnv('PORT', 3000),
    host: process.env.HOST || '0.0.0.0',
    nodeEnv,
    logLevel: process.env.LOG_LEVEL || 'info',
    timezone: process.env.SERVER_TIMEZONE || 'UTC',
  },
  logging: {
    dir: process.env.LOG_DIR ?? path.join(process.cwd(), 'logs'),
  },
  security: {
    adminKey: (process.env.ADMIN_KEY || '').toLowerCase(),
  },
  database: {
    path: process.env.DATABASE_PATH || path.join(process.cwd(), 'data', 'webhook-relay.db'),
  },
  rateLimit: {
    max: intFromEnv('RATE_LIMIT_MAX', 100),
    window: intFromEnv('RATE_LIMIT_WINDOW', 60000),
  },
  webhooks: {
    timeoutMs: intFromEnv('WEBHOOK_TIMEOUT_MS', 15000),
    dedupWindowMs: intFromEnv('WEBHOOK_DEDUP_WINDOW_MS', 60000),
    backoffScheduleMs: listFromEnv('WEBHOOK_BACKOFF_MS', [1000, 2000, 4000, 8000, 16000]),
    defaultRetryBudget: intFromEnv('WEBHOOK_DEFAULT_RETRY_BUDGET', 5),
  },
  worker: {
    enabled: (process.env.WORKER_ENABLED || 'true') !== 'false',
    concurrency: intFromEnv('WORKER_CONCURRENCY', 4),
    pollIntervalMs: intFromEnv('WORKER_POLL_INTERVAL_MS', 500),
    leaseMs: intFromEnv('WORKER_LEASE_MS', 60000),
    errorRetryDelayMs: intFromEnv('WORKER_ERROR_RETRY_DELAY_MS', 30000),
  },
  sentry: {
    enabled: Boolean(process.env.SENTRY_DSN),
    dsn: process.env.SENTRY_DSN || '',
    environment: process.env.SENTRY_ENVIRONMENT || nodeEnv,
    tracesSampleRate: Number(process.env.SENTRY_TRACES_SAMPLE_RATE || '0'),
  },
  // Used as the lease owner when claiming delivery jobs
  instanceId: process.env.INSTANCE_ID || crypto.randomUUID(),
};

// Validate critical config
if (!config.security.adminKey) {
  throw new Error('ADMIN_KEY is required in environment variables');
}

if (!/^[0-9a-f]{64}$/.test(config.security.adminKey)) {
  throw new Error('ADMIN_KEY must be a valid SHA256 hash (64 hex characters)');
}

if (config.webhooks.defaultRetryBudget < 1) {
  throw new Error('WEBHOOK_DEFAULT_RETRY_BUDGET must be at least 1');
}

if (config.worker.leaseMs <= config.webhooks.timeoutMs) {
  throw new Error('WORKER_LEASE_MS must be greater than WEBHOOK_TIMEOUT_MS');
}

if (config.worker.concurrency < 1) {
  throw new Error('WORKER_CONCURRENCY must be at least 1');
}

export default config;
