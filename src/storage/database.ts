import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import config from '../config';
import logger from '../utils/logger';

let db: Database.Database | null = null;

export function getDatabase(): Database.Database {
  if (!db) {
    const inMemory = config.database.path === ':memory:';

    if (!inMemory) {
      const dbDir = path.dirname(config.database.path);
      if (!fs.existsSync(dbDir)) {
        fs.mkdirSync(dbDir, { recursive: true });
      }
    }

    db = new Database(config.database.path);
    if (!inMemory) {
      db.pragma('journal_mode = WAL');
    }
    db.pragma('foreign_keys = ON');
    db.pragma('busy_timeout = 5000');

    logger.info({ path: config.database.path }, 'Database connected');
  }

  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.info('Database connection closed');
  }
}

/**
 * Run `fn` inside a single SQLite transaction (savepoint when nested)
 */
export function withTransaction<T>(fn: () => T): T {
  return getDatabase().transaction(fn)();
}

export default { getDatabase, closeDatabase, withTransaction };
