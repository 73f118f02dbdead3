import { getDatabase } from './database';
import logger from '../utils/logger';

interface Migration {
  version: number;
  name: string;
  up: string;
}

export const migrations: Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    up: `
      -- Webhook subscriptions
      CREATE TABLE IF NOT EXISTS webhooks (
        id TEXT PRIMARY KEY,
        name TEXT,
        url TEXT NOT NULL,
        secret TEXT NOT NULL,
        events TEXT NOT NULL,
        headers TEXT,
        enabled INTEGER NOT NULL DEFAULT 1,
        retry_count INTEGER NOT NULL DEFAULT 5 CHECK(retry_count >= 1),
        timeout INTEGER NOT NULL DEFAULT 15000,
        dedup_window_ms INTEGER,
        backoff_schedule_ms TEXT,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE INDEX idx_webhooks_enabled ON webhooks(enabled);

      -- Delivery records (one per subscription x event occurrence)
      CREATE TABLE IF NOT EXISTS webhook_deliveries (
        id TEXT PRIMARY KEY,
        webhook_id TEXT NOT NULL,
        event TEXT NOT NULL,
        payload TEXT NOT NULL,
        idempotency_key TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending' CHECK(status IN ('pending', 'retry_scheduled', 'delivered', 'dead_lettered')),
        attempts INTEGER NOT NULL DEFAULT 0,
        response_status INTEGER,
        last_error TEXT,
        next_attempt_at INTEGER,
        delivered_at INTEGER,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL,
        FOREIGN KEY (webhook_id) REFERENCES webhooks(id) ON DELETE CASCADE
      );

      CREATE INDEX idx_webhook_deliveries_webhook_id ON webhook_deliveries(webhook_id, created_at);
      CREATE INDEX idx_webhook_deliveries_idempotency ON webhook_deliveries(idempotency_key, created_at);
      CREATE INDEX idx_webhook_deliveries_status ON webhook_deliveries(status);

      -- Terminal failures (snapshot, intentionally no foreign keys)
      CREATE TABLE IF NOT EXISTS dead_letter_entries (
        id TEXT PRIMARY KEY,
        job_type TEXT NOT NULL,
        webhook_id TEXT,
        delivery_id TEXT,
        event TEXT,
        target_url TEXT,
        payload TEXT NOT NULL,
        failure_reason TEXT NOT NULL,
        retry_count INTEGER NOT NULL,
        first_failed_at INTEGER,
        last_failed_at INTEGER
      );

      CREATE INDEX idx_dead_letter_entries_job_type ON dead_letter_entries(job_type, last_failed_at);

      -- Delivery work queue
      CREATE TABLE IF NOT EXISTS delivery_jobs (
        id TEXT PRIMARY KEY,
        delivery_id TEXT NOT NULL,
        webhook_id TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'queued' CHECK(status IN ('queued', 'running', 'done')),
        run_at INTEGER NOT NULL,
        locked_by TEXT,
        locked_until INTEGER,
        claims INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE INDEX idx_delivery_jobs_due ON delivery_jobs(status, run_at);
      CREATE INDEX idx_delivery_jobs_delivery_id ON delivery_jobs(delivery_id);

      -- Migration tracking
      CREATE TABLE IF NOT EXISTS migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at INTEGER NOT NULL DEFAULT (strftime('%s', 'now'))
      );
    `,
  },
];

export function runMigrations(): void {
  const db = getDatabase();

  // Get current version
  let currentVersion = 0;
  const tracking = db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'migrations'")
    .get();
  if (tracking) {
    const row = db.prepare('SELECT MAX(version) as version FROM migrations').get() as { version: number | null };
    currentVersion = row.version || 0;
  } else {
    logger.info('Migrations table not found, starting from version 0');
  }

  // Run pending migrations
  for (const migration of migrations) {
    if (migration.version > currentVersion) {
      logger.info({ version: migration.version, name: migration.name }, 'Running migration');

      try {
        db.transaction(() => {
          db.exec(migration.up);
          db.prepare('INSERT INTO migrations (version, name) VALUES (?, ?)').run(
            migration.version,
            migration.name
          );
        })();

        logger.info({ version: migration.version, name: migration.name }, 'Migration completed');
      } catch (error) {
        logger.error({ err: error, version: migration.version, name: migration.name }, 'Migration failed');
        throw error;
      }
    }
  }

  logger.debug({ currentVersion: migrations[migrations.length - 1]?.version || 0 }, 'All migrations completed');
}

// CLI for running migrations
if (require.main === module) {
  try {
    runMigrations();
    logger.info('Database migration completed successfully');
    process.exit(0);
  } catch (error) {
    logger.error({ err: error }, 'Database migration failed');
    process.exit(1);
  }
}
