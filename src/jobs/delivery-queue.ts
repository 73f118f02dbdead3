import { getDatabase, withTransaction } from '../storage/database';
import { generateId } from '../utils/crypto';
import config from '../config';

export interface DeliveryWorkItem {
  deliveryId: string;
  webhookId: string;
}

export type DeliveryJobStatus = 'queued' | 'running' | 'done';

export interface DeliveryJob extends DeliveryWorkItem {
  id: string;
  status: DeliveryJobStatus;
  runAt: number;
  lockedBy: string | null;
  lockedUntil: number | null;
  claims: number;
  createdAt: number;
  updatedAt: number;
}

export interface EnqueueOptions {
  /** Earliest time (epoch ms) the item may be claimed; defaults to now */
  notBefore?: number;
}

export interface QueueStats {
  queued: number;
  running: number;
  done: number;
  /** queued items whose run_at has passed */
  due: number;
}

/**
 * Durable at-least-once work queue for delivery attempts.
 * A claimed item that is neither completed nor rescheduled before its lease
 * expires becomes claimable again.
 */
export interface DeliveryQueue {
  enqueue(item: DeliveryWorkItem, options?: EnqueueOptions): DeliveryJob;
  claim(workerId: string, limit: number): DeliveryJob[];
  complete(jobId: string): void;
  reschedule(jobId: string, runAt: number): void;
  stats(): QueueStats;
}

interface DeliveryJobRow {
  id: string;
  delivery_id: string;
  webhook_id: string;
  status: DeliveryJobStatus;
  run_at: number;
  locked_by: string | null;
  locked_until: number | null;
  claims: number;
  created_at: number;
  updated_at: number;
}

function rowToJob(row: DeliveryJobRow): DeliveryJob {
  return {
    id: row.id,
    deliveryId: row.delivery_id,
    webhookId: row.webhook_id,
    status: row.status,
    runAt: row.run_at,
    lockedBy: row.locked_by,
    lockedUntil: row.locked_until,
    claims: row.claims,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class SqliteDeliveryQueue implements DeliveryQueue {
  constructor(private leaseMs: number = config.worker.leaseMs) {}

  enqueue(item: DeliveryWorkItem, options: EnqueueOptions = {}): DeliveryJob {
    const db = getDatabase();
    const now = Date.now();
    const id = generateId('job');
    const runAt = options.notBefore ?? now;

    db.prepare(`
      INSERT INTO delivery_jobs (id, delivery_id, webhook_id, status, run_at, claims, created_at, updated_at)
      VALUES (?, ?, ?, 'queued', ?, 0, ?, ?)
    `).run(id, item.deliveryId, item.webhookId, runAt, now, now);

    return {
      id,
      deliveryId: item.deliveryId,
      webhookId: item.webhookId,
      status: 'queued',
      runAt,
      lockedBy: null,
      lockedUntil: null,
      claims: 0,
      createdAt: now,
      updatedAt: now,
    };
  }

  /**
   * Claims up to `limit` due items: queued with run_at <= now, or running
   * with an expired lease. Selection and locking happen in one transaction.
   */
  claim(workerId: string, limit: number): DeliveryJob[] {
    if (limit <= 0) return [];

    return withTransaction(() => {
      const db = getDatabase();
      const now = Date.now();
      const lockedUntil = now + this.leaseMs;

      const rows = db.prepare(`
        SELECT * FROM delivery_jobs
        WHERE (status = 'queued' AND run_at <= ?)
           OR (status = 'running' AND locked_until <= ?)
        ORDER BY run_at ASC, created_at ASC
        LIMIT ?
      `).all(now, now, limit) as DeliveryJobRow[];

      const lock = db.prepare(`
        UPDATE delivery_jobs
        SET status = 'running', locked_by = ?, locked_until = ?, claims = claims + 1, updated_at = ?
        WHERE id = ?
      `);

      return rows.map((row) => {
        lock.run(workerId, lockedUntil, now, row.id);
        return rowToJob({
          ...row,
          status: 'running',
          locked_by: workerId,
          locked_until: lockedUntil,
          claims: row.claims + 1,
          updated_at: now,
        });
      });
    });
  }

  complete(jobId: string): void {
    const db = getDatabase();
    db.prepare(`
      UPDATE delivery_jobs
      SET status = 'done', locked_by = NULL, locked_until = NULL, updated_at = ?
      WHERE id = ?
    `).run(Date.now(), jobId);
  }

  /**
   * Releases the lease and puts the item back with a new not-before time
   */
  reschedule(jobId: string, runAt: number): void {
    const db = getDatabase();
    db.prepare(`
      UPDATE delivery_jobs
      SET status = 'queued', run_at = ?, locked_by = NULL, locked_until = NULL, updated_at = ?
      WHERE id = ?
    `).run(runAt, Date.now(), jobId);
  }

  getById(jobId: string): DeliveryJob | null {
    const db = getDatabase();
    const row = db.prepare('SELECT * FROM delivery_jobs WHERE id = ?').get(jobId) as DeliveryJobRow | undefined;
    return row ? rowToJob(row) : null;
  }

  listForDelivery(deliveryId: string): DeliveryJob[] {
    const db = getDatabase();
    const rows = db.prepare(`
      SELECT * FROM delivery_jobs WHERE delivery_id = ? ORDER BY created_at ASC
    `).all(deliveryId) as DeliveryJobRow[];
    return rows.map(rowToJob);
  }

  stats(): QueueStats {
    const db = getDatabase();
    const rows = db.prepare('SELECT status, COUNT(*) as count FROM delivery_jobs GROUP BY status').all() as Array<{
      status: DeliveryJobStatus;
      count: number;
    }>;
    const due = db.prepare(`
      SELECT COUNT(*) as count FROM delivery_jobs WHERE status = 'queued' AND run_at <= ?
    `).get(Date.now()) as { count: number };

    const stats: QueueStats = { queued: 0, running: 0, done: 0, due: due.count };
    for (const row of rows) {
      stats[row.status] = row.count;
    }
    return stats;
  }
}

export const deliveryQueue = new SqliteDeliveryQueue();
