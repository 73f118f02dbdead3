import config from '../../config';
import logger from '../../utils/logger';
import { captureException } from '../../utils/sentry';
import { withTransaction } from '../../storage/database';
import { deliveryQueue, type DeliveryQueue } from '../../jobs/delivery-queue';
import type { EventBus } from '../events/event-bus';
import { CONTENT_EVENT_NAMES, type ContentEvent } from '../events/types';
import { webhookRepository, type WebhookRepository } from './repository';
import { deliveryRepository, type DeliveryRepository } from './delivery-repository';
import { serializeEnvelope } from './signature';
import type { Webhook, WebhookEvent } from './types';

export interface DispatchSummary {
  /** Delivery records created and enqueued */
  dispatched: number;
  /** Subscriptions skipped because an identical delivery is inside the dedup window */
  duplicates: number;
  /** Subscriptions whose record or queue write failed */
  failures: number;
}

export function idempotencyKey(webhookId: string, event: WebhookEvent, entityId: string): string {
  return `${webhookId}:${event}:${entityId}`;
}

/**
 * Flattens a content event into the `data` object of the webhook body
 */
export function toDeliveryData(event: ContentEvent): Record<string, unknown> {
  const data: Record<string, unknown> = { contentType: event.contentType };
  if (event.userId) data.userId = event.userId;

  switch (event.name) {
    case 'content.created':
      if (event.data) data.data = event.data;
      break;
    case 'content.updated':
      if (event.diff) data.diff = event.diff;
      break;
    case 'content.published':
      if (event.entry) data.entry = event.entry;
      break;
    case 'content.deleted':
      break;
  }

  return data;
}

/**
 * Fans a domain event out to every matching subscription: one delivery
 * record and one queued work item per subscription, unless deduplicated.
 */
export class WebhookDispatcher {
  constructor(
    private webhooks: WebhookRepository = webhookRepository,
    private deliveries: DeliveryRepository = deliveryRepository,
    private queue: DeliveryQueue = deliveryQueue
  ) {}

  onEvent(event: WebhookEvent, entityId: string, payload: Record<string, unknown> = {}): DispatchSummary {
    const summary: DispatchSummary = { dispatched: 0, duplicates: 0, failures: 0 };
    const subscriptions = this.webhooks.findEnabledForEvent(event);

    if (subscriptions.length === 0) {
      logger.debug({ event, entityId }, 'No webhook subscriptions for event');
      return summary;
    }

    const now = Date.now();
    const body = serializeEnvelope(event, entityId, payload, new Date(now));

    for (const webhook of subscriptions) {
      try {
        if (this.dispatchTo(webhook, event, entityId, body, now)) {
          summary.dispatched++;
        } else {
          summary.duplicates++;
        }
      } catch (error) {
        summary.failures++;
        logger.error({ err: error, webhookId: webhook.id, event, entityId }, 'Failed to dispatch webhook delivery');
        captureException(error, { webhookId: webhook.id, event, entityId });
      }
    }

    logger.debug({ event, entityId, ...summary }, 'Event dispatched');
    return summary;
  }

  private dispatchTo(webhook: Webhook, event: WebhookEvent, entityId: string, body: string, now: number): boolean {
    const key = idempotencyKey(webhook.id, event, entityId);
    const windowMs = webhook.dedupWindowMs ?? config.webhooks.dedupWindowMs;

    const existing = this.deliveries.findRecentByIdempotencyKey(key, now - windowMs);
    if (existing) {
      logger.debug({ webhookId: webhook.id, idempotencyKey: key, existingDeliveryId: existing.id }, 'Duplicate event skipped');
      return false;
    }

    // record and work item commit together
    const record = withTransaction(() => {
      const created = this.deliveries.create({
        webhookId: webhook.id,
        event,
        payload: body,
        idempotencyKey: key,
        createdAt: now,
      });
      this.queue.enqueue({ deliveryId: created.id, webhookId: webhook.id }, { notBefore: now });
      return created;
    });

    logger.info({ deliveryId: record.id, webhookId: webhook.id, event, entityId }, 'Webhook delivery queued');
    return true;
  }
}

/**
 * Subscribes the dispatcher to every content event on the bus.
 * Returns the bus subscription ids.
 */
export function registerWebhookDispatcher(bus: EventBus, dispatcher: WebhookDispatcher): string[] {
  return CONTENT_EVENT_NAMES.map((name) =>
    bus.subscribe(name, (event) => {
      dispatcher.onEvent(event.name, event.entityId, toDeliveryData(event));
    })
  );
}

export const webhookDispatcher = new WebhookDispatcher();
