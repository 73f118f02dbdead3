import type { ContentEventName } from '../events/types';

export type WebhookEvent = ContentEventName;

export interface Webhook {
  id: string;
  name: string | null;
  url: string;
  secret: string;
  events: WebhookEvent[];
  headers: Record<string, string> | null;
  enabled: boolean;
  /** Retry budget: total attempts before the delivery is dead-lettered */
  retryCount: number;
  /** Request timeout in ms */
  timeout: number;
  /** Per-subscription override of the dedup window, null = config default */
  dedupWindowMs: number | null;
  /** Per-subscription override of the backoff schedule, null = config default */
  backoffScheduleMs: number[] | null;
  createdAt: number;
  updatedAt: number;
}

/** Webhook as returned by the management API (never exposes the secret) */
export type PublicWebhook = Omit<Webhook, 'secret'>;

export interface CreateWebhookRequest {
  name?: string;
  url: string;
  events: string[];
  secret?: string;
  headers?: Record<string, string>;
  enabled?: boolean;
  retryCount?: number;
  timeout?: number;
  dedupWindowMs?: number | null;
  backoffScheduleMs?: number[] | null;
}

export type UpdateWebhookRequest = Partial<CreateWebhookRequest>;

export type DeliveryStatus = 'pending' | 'retry_scheduled' | 'delivered' | 'dead_lettered';

export const TERMINAL_DELIVERY_STATUSES: readonly DeliveryStatus[] = ['delivered', 'dead_lettered'];

export interface DeliveryRecord {
  id: string;
  webhookId: string;
  event: WebhookEvent;
  /** Exact serialized body; signed and transmitted verbatim on every attempt */
  payload: string;
  idempotencyKey: string;
  status: DeliveryStatus;
  attempts: number;
  responseStatus: number | null;
  lastError: string | null;
  nextAttemptAt: number | null;
  deliveredAt: number | null;
  createdAt: number;
  updatedAt: number;
}

export interface DeadLetterEntry {
  id: string;
  jobType: string;
  webhookId: string | null;
  deliveryId: string | null;
  event: string | null;
  targetUrl: string | null;
  payload: string;
  failureReason: string;
  retryCount: number;
  firstFailedAt: number | null;
  lastFailedAt: number | null;
}

export interface DeadLetterFilter {
  search?: string;
  retryCountMin?: number;
  retryCountMax?: number;
  limit?: number;
}

/** Body sent to webhook endpoints */
export interface WebhookEnvelope {
  event: WebhookEvent;
  timestamp: string;
  data: {
    entityId: string;
    [key: string]: unknown;
  };
}

export const WEBHOOK_DELIVERY_JOB_TYPE = 'webhook_delivery';
