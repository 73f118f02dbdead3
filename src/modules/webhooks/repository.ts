import { getDatabase } from '../../storage/database';
import { generateId, generateSecret } from '../../utils/crypto';
import config from '../../config';
import { AppError, ErrorCode } from '../../types';
import { isContentEventName, CONTENT_EVENT_NAMES } from '../events/types';
import { isValidBackoffSchedule } from './backoff';
import type { Webhook, WebhookEvent, CreateWebhookRequest, UpdateWebhookRequest, PublicWebhook } from './types';

interface WebhookRow {
  id: string;
  name: string | null;
  url: string;
  secret: string;
  events: string;
  headers: string | null;
  enabled: number;
  retry_count: number;
  timeout: number;
  dedup_window_ms: number | null;
  backoff_schedule_ms: string | null;
  created_at: number;
  updated_at: number;
}

const RESERVED_HEADERS = new Set(['content-type', 'content-length', 'host', 'x-signature']);

function invalid(message: string, details?: unknown): AppError {
  return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
}

function parseEvents(raw: string): WebhookEvent[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((e): e is WebhookEvent => typeof e === 'string' && isContentEventName(e));
}

function parseHeaders(raw: string | null): Record<string, string> | null {
  if (!raw) return null;
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null;

  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string') headers[key] = value;
  }
  return headers;
}

function parseSchedule(raw: string | null): number[] | null {
  if (!raw) return null;
  const parsed: unknown = JSON.parse(raw);
  return isValidBackoffSchedule(parsed) ? parsed : null;
}

function rowToWebhook(row: WebhookRow): Webhook {
  return {
    id: row.id,
    name: row.name,
    url: row.url,
    secret: row.secret,
    events: parseEvents(row.events),
    headers: parseHeaders(row.headers),
    enabled: row.enabled === 1,
    retryCount: row.retry_count,
    timeout: row.timeout,
    dedupWindowMs: row.dedup_window_ms,
    backoffScheduleMs: parseSchedule(row.backoff_schedule_ms),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toPublicWebhook(webhook: Webhook): PublicWebhook {
  const { secret: _secret, ...rest } = webhook;
  return rest;
}

function validateUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw invalid('url must be an absolute URL', { url });
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw invalid('url must use http or https', { url });
  }
}

function normalizeEvents(events: string[]): WebhookEvent[] {
  if (events.length === 0) {
    throw invalid('events must contain at least one event name');
  }
  const unknown = events.filter((e) => !isContentEventName(e));
  if (unknown.length > 0) {
    throw invalid('Unknown event names', { unknown, allowed: CONTENT_EVENT_NAMES });
  }
  // ordered set: keep first occurrence
  return [...new Set(events.filter(isContentEventName))];
}

function validateHeaders(headers: Record<string, string>): void {
  const reserved = Object.keys(headers).filter((key) => RESERVED_HEADERS.has(key.toLowerCase()));
  if (reserved.length > 0) {
    throw invalid('Custom headers may not override reserved headers', { reserved });
  }
}

function validateRetryCount(retryCount: number): void {
  if (!Number.isInteger(retryCount) || retryCount < 1) {
    throw invalid('retryCount must be an integer >= 1', { retryCount });
  }
}

function validateTimeout(timeout: number): void {
  if (!Number.isInteger(timeout) || timeout < 1 || timeout >= config.worker.leaseMs) {
    throw invalid(`timeout must be between 1 and ${config.worker.leaseMs - 1} ms`, { timeout });
  }
}

function validateOverrides(req: UpdateWebhookRequest): void {
  if (req.dedupWindowMs !== undefined && req.dedupWindowMs !== null) {
    if (!Number.isInteger(req.dedupWindowMs) || req.dedupWindowMs < 0) {
      throw invalid('dedupWindowMs must be a non-negative integer', { dedupWindowMs: req.dedupWindowMs });
    }
  }
  if (req.backoffScheduleMs !== undefined && req.backoffScheduleMs !== null) {
    if (!isValidBackoffSchedule(req.backoffScheduleMs)) {
      throw invalid('backoffScheduleMs must be a non-empty list of positive integers');
    }
  }
}

export class WebhookRepository {
  create(req: CreateWebhookRequest): Webhook {
    validateUrl(req.url);
    const events = normalizeEvents(req.events);
    const retryCount = req.retryCount ?? config.webhooks.defaultRetryBudget;
    const timeout = req.timeout ?? config.webhooks.timeoutMs;
    validateRetryCount(retryCount);
    validateTimeout(timeout);
    if (req.headers) validateHeaders(req.headers);
    validateOverrides(req);

    const db = getDatabase();
    const id = generateId('whk');
    const now = Date.now();

    db.prepare(`
      INSERT INTO webhooks (id, name, url, secret, events, headers, enabled, retry_count, timeout,
        dedup_window_ms, backoff_schedule_ms, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id,
      req.name ?? null,
      req.url,
      req.secret || generateSecret(),
      JSON.stringify(events),
      req.headers ? JSON.stringify(req.headers) : null,
      req.enabled === false ? 0 : 1,
      retryCount,
      timeout,
      req.dedupWindowMs ?? null,
      req.backoffScheduleMs ? JSON.stringify(req.backoffScheduleMs) : null,
      now,
      now
    );

    return this.mustGet(id);
  }

  getById(webhookId: string): Webhook | null {
    const db = getDatabase();
    const row = db.prepare('SELECT * FROM webhooks WHERE id = ?').get(webhookId) as WebhookRow | undefined;
    return row ? rowToWebhook(row) : null;
  }

  list(options: { enabled?: boolean } = {}): Webhook[] {
    const db = getDatabase();
    const rows = (options.enabled === undefined
      ? db.prepare('SELECT * FROM webhooks ORDER BY created_at ASC, id ASC').all()
      : db.prepare('SELECT * FROM webhooks WHERE enabled = ? ORDER BY created_at ASC, id ASC').all(options.enabled ? 1 : 0)
    ) as WebhookRow[];

    return rows.map(rowToWebhook);
  }

  /**
   * Enabled subscriptions whose event set contains `event`
   */
  findEnabledForEvent(event: WebhookEvent): Webhook[] {
    const db = getDatabase();
    const rows = db.prepare(`
      SELECT w.* FROM webhooks w
      WHERE w.enabled = 1
        AND EXISTS (SELECT 1 FROM json_each(w.events) e WHERE e.value = ?)
      ORDER BY w.created_at ASC, w.id ASC
    `).all(event) as WebhookRow[];

    return rows.map(rowToWebhook);
  }

  update(webhookId: string, req: UpdateWebhookRequest): Webhook | null {
    if (!this.getById(webhookId)) return null;

    const db = getDatabase();
    const updates: string[] = [];
    const values: Array<string | number | null> = [];

    if (req.name !== undefined) {
      updates.push('name = ?');
      values.push(req.name);
    }
    if (req.url !== undefined) {
      validateUrl(req.url);
      updates.push('url = ?');
      values.push(req.url);
    }
    if (req.events !== undefined) {
      updates.push('events = ?');
      values.push(JSON.stringify(normalizeEvents(req.events)));
    }
    if (req.secret !== undefined) {
      if (!req.secret) throw invalid('secret must not be empty');
      updates.push('secret = ?');
      values.push(req.secret);
    }
    if (req.headers !== undefined) {
      validateHeaders(req.headers);
      updates.push('headers = ?');
      values.push(Object.keys(req.headers).length > 0 ? JSON.stringify(req.headers) : null);
    }
    if (req.enabled !== undefined) {
      updates.push('enabled = ?');
      values.push(req.enabled ? 1 : 0);
    }
    if (req.retryCount !== undefined) {
      validateRetryCount(req.retryCount);
      updates.push('retry_count = ?');
      values.push(req.retryCount);
    }
    if (req.timeout !== undefined) {
      validateTimeout(req.timeout);
      updates.push('timeout = ?');
      values.push(req.timeout);
    }
    validateOverrides(req);
    if (req.dedupWindowMs !== undefined) {
      updates.push('dedup_window_ms = ?');
      values.push(req.dedupWindowMs);
    }
    if (req.backoffScheduleMs !== undefined) {
      updates.push('backoff_schedule_ms = ?');
      values.push(req.backoffScheduleMs ? JSON.stringify(req.backoffScheduleMs) : null);
    }

    if (updates.length > 0) {
      updates.push('updated_at = ?');
      values.push(Date.now());
      values.push(webhookId);

      db.prepare(`UPDATE webhooks SET ${updates.join(', ')} WHERE id = ?`).run(...values);
    }

    return this.getById(webhookId);
  }

  /**
   * Deletes the subscription; its delivery records go with it (ON DELETE CASCADE)
   */
  delete(webhookId: string): boolean {
    const db = getDatabase();
    const result = db.prepare('DELETE FROM webhooks WHERE id = ?').run(webhookId);
    return result.changes > 0;
  }

  countEnabled(): number {
    const db = getDatabase();
    const row = db.prepare('SELECT COUNT(*) as count FROM webhooks WHERE enabled = 1').get() as { count: number };
    return row.count;
  }

  private mustGet(webhookId: string): Webhook {
    const webhook = this.getById(webhookId);
    if (!webhook) {
      throw new AppError(ErrorCode.DATABASE_ERROR, `Webhook ${webhookId} vanished after insert`);
    }
    return webhook;
  }
}

export const webhookRepository = new WebhookRepository();
