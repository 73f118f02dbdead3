import { getDatabase } from '../../storage/database';
import { generateId } from '../../utils/crypto';
import { isContentEventName } from '../events/types';
import type { DeliveryRecord, DeliveryStatus, WebhookEvent } from './types';

interface DeliveryRow {
  id: string;
  webhook_id: string;
  event: string;
  payload: string;
  idempotency_key: string;
  status: DeliveryStatus;
  attempts: number;
  response_status: number | null;
  last_error: string | null;
  next_attempt_at: number | null;
  delivered_at: number | null;
  created_at: number;
  updated_at: number;
}

export interface CreateDeliveryInput {
  webhookId: string;
  event: WebhookEvent;
  payload: string;
  idempotencyKey: string;
  createdAt: number;
}

export interface FailedAttemptInput {
  responseStatus: number | null;
  lastError: string;
  status: Extract<DeliveryStatus, 'retry_scheduled' | 'dead_lettered'>;
  nextAttemptAt: number | null;
  at: number;
}

function rowToDelivery(row: DeliveryRow): DeliveryRecord {
  return {
    id: row.id,
    webhookId: row.webhook_id,
    // rows are only ever written with a known event name
    event: isContentEventName(row.event) ? row.event : 'content.updated',
    payload: row.payload,
    idempotencyKey: row.idempotency_key,
    status: row.status,
    attempts: row.attempts,
    responseStatus: row.response_status,
    lastError: row.last_error,
    nextAttemptAt: row.next_attempt_at,
    deliveredAt: row.delivered_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class DeliveryRepository {
  create(input: CreateDeliveryInput): DeliveryRecord {
    const db = getDatabase();
    const id = generateId('dlv');

    db.prepare(`
      INSERT INTO webhook_deliveries (id, webhook_id, event, payload, idempotency_key, status, attempts, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, 'pending', 0, ?, ?)
    `).run(id, input.webhookId, input.event, input.payload, input.idempotencyKey, input.createdAt, input.createdAt);

    return {
      id,
      webhookId: input.webhookId,
      event: input.event,
      payload: input.payload,
      idempotencyKey: input.idempotencyKey,
      status: 'pending',
      attempts: 0,
      responseStatus: null,
      lastError: null,
      nextAttemptAt: null,
      deliveredAt: null,
      createdAt: input.createdAt,
      updatedAt: input.createdAt,
    };
  }

  getById(deliveryId: string): DeliveryRecord | null {
    const db = getDatabase();
    const row = db.prepare('SELECT * FROM webhook_deliveries WHERE id = ?').get(deliveryId) as DeliveryRow | undefined;
    return row ? rowToDelivery(row) : null;
  }

  /**
   * Dedup ledger lookup: a record with this key created strictly after `since`
   */
  findRecentByIdempotencyKey(idempotencyKey: string, since: number): DeliveryRecord | null {
    const db = getDatabase();
    const row = db.prepare(`
      SELECT * FROM webhook_deliveries
      WHERE idempotency_key = ? AND created_at > ?
      ORDER BY created_at DESC
      LIMIT 1
    `).get(idempotencyKey, since) as DeliveryRow | undefined;

    return row ? rowToDelivery(row) : null;
  }

  listByWebhook(webhookId: string, limit: number = 100): DeliveryRecord[] {
    const db = getDatabase();
    const rows = db.prepare(`
      SELECT * FROM webhook_deliveries
      WHERE webhook_id = ?
      ORDER BY created_at DESC, id DESC
      LIMIT ?
    `).all(webhookId, limit) as DeliveryRow[];

    return rows.map(rowToDelivery);
  }

  /**
   * Records a 2xx attempt. Conditional on the attempt count the caller read,
   * so a redelivered execution cannot apply the same attempt twice.
   */
  markDelivered(deliveryId: string, expectedAttempts: number, responseStatus: number, at: number): boolean {
    const db = getDatabase();
    const result = db.prepare(`
      UPDATE webhook_deliveries
      SET attempts = attempts + 1,
          status = 'delivered',
          response_status = ?,
          last_error = NULL,
          next_attempt_at = NULL,
          delivered_at = ?,
          updated_at = ?
      WHERE id = ? AND attempts = ? AND status IN ('pending', 'retry_scheduled')
    `).run(responseStatus, at, at, deliveryId, expectedAttempts);

    return result.changes === 1;
  }

  /**
   * Records a failed attempt (non-2xx, timeout or transport error)
   */
  markFailed(deliveryId: string, expectedAttempts: number, input: FailedAttemptInput): boolean {
    const db = getDatabase();
    const result = db.prepare(`
      UPDATE webhook_deliveries
      SET attempts = attempts + 1,
          status = ?,
          response_status = COALESCE(?, response_status),
          last_error = ?,
          next_attempt_at = ?,
          updated_at = ?
      WHERE id = ? AND attempts = ? AND status IN ('pending', 'retry_scheduled')
    `).run(input.status, input.responseStatus, input.lastError, input.nextAttemptAt, input.at, deliveryId, expectedAttempts);

    return result.changes === 1;
  }

  countByStatus(): Record<DeliveryStatus, number> {
    const db = getDatabase();
    const rows = db.prepare('SELECT status, COUNT(*) as count FROM webhook_deliveries GROUP BY status').all() as Array<{
      status: DeliveryStatus;
      count: number;
    }>;

    const counts: Record<DeliveryStatus, number> = {
      pending: 0,
      retry_scheduled: 0,
      delivered: 0,
      dead_lettered: 0,
    };
    for (const row of rows) {
      counts[row.status] = row.count;
    }
    return counts;
  }
}

export const deliveryRepository = new DeliveryRepository();
