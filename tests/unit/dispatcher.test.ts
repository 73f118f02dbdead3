import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  WebhookDispatcher,
  idempotencyKey,
  registerWebhookDispatcher,
  toDeliveryData,
} from '../../src/modules/webhooks/dispatcher';
import { webhookRepository } from '../../src/modules/webhooks/repository';
import { deliveryRepository } from '../../src/modules/webhooks/delivery-repository';
import { SqliteDeliveryQueue, type DeliveryJob, type DeliveryWorkItem } from '../../src/jobs/delivery-queue';
import { EventBus } from '../../src/modules/events/event-bus';
import { resetDatabase } from '../helpers';

const T0 = new Date('2026-03-01T12:00:00.000Z').getTime();

class FailingQueue extends SqliteDeliveryQueue {
  constructor(private failFor: string) {
    super();
  }

  enqueue(item: DeliveryWorkItem): DeliveryJob {
    if (item.webhookId === this.failFor) {
      throw new Error('queue unavailable');
    }
    return super.enqueue(item);
  }
}

describe('WebhookDispatcher', () => {
  let queue: SqliteDeliveryQueue;
  let dispatcher: WebhookDispatcher;

  beforeEach(() => {
    resetDatabase();
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(T0);
    queue = new SqliteDeliveryQueue();
    dispatcher = new WebhookDispatcher(webhookRepository, deliveryRepository, queue);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should create one record and one work item per matching subscription', () => {
    const a = webhookRepository.create({ url: 'https://a.test', events: ['content.created'] });
    const b = webhookRepository.create({ url: 'https://b.test', events: ['content.created', 'content.deleted'] });

    const summary = dispatcher.onEvent('content.created', 'entry-1', { contentType: 'article' });

    expect(summary).toEqual({ dispatched: 2, duplicates: 0, failures: 0 });
    for (const webhook of [a, b]) {
      const [record] = deliveryRepository.listByWebhook(webhook.id);
      expect(record.status).toBe('pending');
      expect(record.attempts).toBe(0);
      expect(record.idempotencyKey).toBe(`${webhook.id}:content.created:entry-1`);
      expect(queue.listForDelivery(record.id)).toHaveLength(1);
      expect(queue.listForDelivery(record.id)[0].runAt).toBe(T0);
    }
  });

  it('should store the serialized envelope as the payload', () => {
    const webhook = webhookRepository.create({ url: 'https://a.test', events: ['content.published'] });

    dispatcher.onEvent('content.published', 'entry-7', { entry: { slug: 'hello' }, contentType: 'page' });

    const [record] = deliveryRepository.listByWebhook(webhook.id);
    expect(record.payload).toBe(
      '{"event":"content.published","timestamp":"2026-03-01T12:00:00.000Z",' +
        '"data":{"entityId":"entry-7","contentType":"page","entry":{"slug":"hello"}}}'
    );
  });

  it('should skip an identical event inside the dedup window', () => {
    const webhook = webhookRepository.create({ url: 'https://a.test', events: ['content.updated'] });

    expect(dispatcher.onEvent('content.updated', 'entry-1').dispatched).toBe(1);

    vi.setSystemTime(T0 + 30000);
    expect(dispatcher.onEvent('content.updated', 'entry-1')).toEqual({ dispatched: 0, duplicates: 1, failures: 0 });
    expect(deliveryRepository.listByWebhook(webhook.id)).toHaveLength(1);
  });

  it('should deliver again once the window has passed', () => {
    const webhook = webhookRepository.create({ url: 'https://a.test', events: ['content.updated'] });

    dispatcher.onEvent('content.updated', 'entry-1');
    vi.setSystemTime(T0 + 61000);
    expect(dispatcher.onEvent('content.updated', 'entry-1').dispatched).toBe(1);

    expect(deliveryRepository.listByWebhook(webhook.id)).toHaveLength(2);
  });

  it('should treat the window boundary as outside the window', () => {
    webhookRepository.create({ url: 'https://a.test', events: ['content.updated'] });

    dispatcher.onEvent('content.updated', 'entry-1');
    vi.setSystemTime(T0 + 60000);

    expect(dispatcher.onEvent('content.updated', 'entry-1').dispatched).toBe(1);
  });

  it('should not deduplicate other entities or other events', () => {
    webhookRepository.create({ url: 'https://a.test', events: ['content.created', 'content.deleted'] });

    dispatcher.onEvent('content.created', 'entry-1');
    expect(dispatcher.onEvent('content.created', 'entry-2').dispatched).toBe(1);
    expect(dispatcher.onEvent('content.deleted', 'entry-1').dispatched).toBe(1);
  });

  it('should honor a per-subscription dedup window', () => {
    webhookRepository.create({ url: 'https://a.test', events: ['content.updated'], dedupWindowMs: 0 });

    dispatcher.onEvent('content.updated', 'entry-1');
    expect(dispatcher.onEvent('content.updated', 'entry-1').dispatched).toBe(1);
  });

  it('should ignore disabled subscriptions', () => {
    const webhook = webhookRepository.create({ url: 'https://a.test', events: ['content.created'], enabled: false });

    expect(dispatcher.onEvent('content.created', 'entry-1')).toEqual({ dispatched: 0, duplicates: 0, failures: 0 });
    expect(deliveryRepository.listByWebhook(webhook.id)).toEqual([]);
  });

  it('should ignore subscriptions to other events', () => {
    const webhook = webhookRepository.create({ url: 'https://a.test', events: ['content.deleted'] });

    dispatcher.onEvent('content.created', 'entry-1');
    expect(deliveryRepository.listByWebhook(webhook.id)).toEqual([]);
  });

  it('should keep dispatching to other subscriptions when one fails', () => {
    const broken = webhookRepository.create({ url: 'https://a.test', events: ['content.created'] });
    const healthy = webhookRepository.create({ url: 'https://b.test', events: ['content.created'] });
    const failing = new WebhookDispatcher(webhookRepository, deliveryRepository, new FailingQueue(broken.id));

    const summary = failing.onEvent('content.created', 'entry-1');

    expect(summary).toEqual({ dispatched: 1, duplicates: 0, failures: 1 });
    expect(deliveryRepository.listByWebhook(healthy.id)).toHaveLength(1);
    expect(deliveryRepository.listByWebhook(broken.id)).toEqual([]);
  });

  it('should build idempotency keys from subscription, event and entity', () => {
    expect(idempotencyKey('whk_1', 'content.deleted', 'entry-9')).toBe('whk_1:content.deleted:entry-9');
  });

  describe('event bus wiring', () => {
    it('should dispatch every content event published on the bus', async () => {
      const webhook = webhookRepository.create({ url: 'https://a.test', events: ['content.updated'] });
      const bus = new EventBus();
      const ids = registerWebhookDispatcher(bus, dispatcher);

      expect(ids).toHaveLength(4);
      await bus.publish({
        name: 'content.updated',
        entityId: 'entry-3',
        contentType: 'article',
        userId: 'user-1',
        diff: { title: { from: 'Old', to: 'New' } },
      });

      const [record] = deliveryRepository.listByWebhook(webhook.id);
      expect(JSON.parse(record.payload).data).toEqual({
        entityId: 'entry-3',
        contentType: 'article',
        diff: { title: { from: 'Old', to: 'New' } },
        userId: 'user-1',
      });
    });

    it('should map each event kind to its data fields', () => {
      expect(toDeliveryData({ name: 'content.created', entityId: 'e', contentType: 'article', data: { a: 1 } })).toEqual({
        contentType: 'article',
        data: { a: 1 },
      });
      expect(toDeliveryData({ name: 'content.deleted', entityId: 'e', contentType: 'article' })).toEqual({
        contentType: 'article',
      });
      expect(toDeliveryData({ name: 'content.published', entityId: 'e', contentType: 'page', entry: { id: 'e' } })).toEqual({
        contentType: 'page',
        entry: { id: 'e' },
      });
    });
  });
});
