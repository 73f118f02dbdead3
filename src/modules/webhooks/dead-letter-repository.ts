import { getDatabase } from '../../storage/database';
import { generateId } from '../../utils/crypto';
import type { DeadLetterEntry, DeadLetterFilter } from './types';
import { WEBHOOK_DELIVERY_JOB_TYPE } from './types';

interface DeadLetterRow {
  id: string;
  job_type: string;
  webhook_id: string | null;
  delivery_id: string | null;
  event: string | null;
  target_url: string | null;
  payload: string;
  failure_reason: string;
  retry_count: number;
  first_failed_at: number | null;
  last_failed_at: number | null;
}

export type CreateDeadLetterInput = Omit<DeadLetterEntry, 'id'>;

function rowToEntry(row: DeadLetterRow): DeadLetterEntry {
  return {
    id: row.id,
    jobType: row.job_type,
    webhookId: row.webhook_id,
    deliveryId: row.delivery_id,
    event: row.event,
    targetUrl: row.target_url,
    payload: row.payload,
    failureReason: row.failure_reason,
    retryCount: row.retry_count,
    firstFailedAt: row.first_failed_at,
    lastFailedAt: row.last_failed_at,
  };
}

/**
 * Append-only store of deliveries that exhausted their retry budget
 */
export class DeadLetterRepository {
  create(input: CreateDeadLetterInput): DeadLetterEntry {
    const db = getDatabase();
    const id = generateId('dlq');

    db.prepare(`
      INSERT INTO dead_letter_entries (id, job_type, webhook_id, delivery_id, event, target_url, payload,
        failure_reason, retry_count, first_failed_at, last_failed_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id,
      input.jobType,
      input.webhookId,
      input.deliveryId,
      input.event,
      input.targetUrl,
      input.payload,
      input.failureReason,
      input.retryCount,
      input.firstFailedAt,
      input.lastFailedAt
    );

    return { id, ...input };
  }

  getById(entryId: string): DeadLetterEntry | null {
    const db = getDatabase();
    const row = db.prepare('SELECT * FROM dead_letter_entries WHERE id = ?').get(entryId) as DeadLetterRow | undefined;
    return row ? rowToEntry(row) : null;
  }

  /**
   * Webhook delivery entries, most recent failure first
   */
  list(filter: DeadLetterFilter = {}): DeadLetterEntry[] {
    const db = getDatabase();
    let query = 'SELECT * FROM dead_letter_entries WHERE job_type = ?';
    const params: Array<string | number> = [WEBHOOK_DELIVERY_JOB_TYPE];

    if (filter.search) {
      query += " AND failure_reason LIKE ? ESCAPE '\\'";
      params.push(`%${filter.search.replace(/[\\%_]/g, (c) => `\\${c}`)}%`);
    }

    if (filter.retryCountMin !== undefined) {
      query += ' AND retry_count >= ?';
      params.push(filter.retryCountMin);
    }

    if (filter.retryCountMax !== undefined) {
      query += ' AND retry_count <= ?';
      params.push(filter.retryCountMax);
    }

    query += ' ORDER BY last_failed_at DESC, id DESC LIMIT ?';
    params.push(filter.limit ?? 100);

    const rows = db.prepare(query).all(...params) as DeadLetterRow[];
    return rows.map(rowToEntry);
  }

  count(): number {
    const db = getDatabase();
    const row = db.prepare('SELECT COUNT(*) as count FROM dead_letter_entries WHERE job_type = ?').get(WEBHOOK_DELIVERY_JOB_TYPE) as {
      count: number;
    };
    return row.count;
  }
}

export const deadLetterRepository = new DeadLetterRepository();
