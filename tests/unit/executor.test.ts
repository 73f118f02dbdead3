import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DeliveryExecutor, type ExecutionOutcome } from '../../src/modules/webhooks/executor';
import { WebhookDispatcher } from '../../src/modules/webhooks/dispatcher';
import { webhookRepository } from '../../src/modules/webhooks/repository';
import { DeliveryRepository, deliveryRepository } from '../../src/modules/webhooks/delivery-repository';
import { deadLetterRepository } from '../../src/modules/webhooks/dead-letter-repository';
import { verifySignature } from '../../src/modules/webhooks/signature';
import { SqliteDeliveryQueue } from '../../src/jobs/delivery-queue';
import type { CreateWebhookRequest, DeliveryRecord, Webhook } from '../../src/modules/webhooks/types';
import { ScriptedSender, resetDatabase } from '../helpers';

const T0 = new Date('2026-03-01T12:00:00.000Z').getTime();

class BrokenDeliveryRepository extends DeliveryRepository {
  getById(): DeliveryRecord | null {
    throw new Error('database is locked');
  }
}

describe('DeliveryExecutor', () => {
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

  function subscribe(overrides: Partial<CreateWebhookRequest> = {}): Webhook {
    return webhookRepository.create({
      url: 'https://receiver.test/hooks',
      events: ['content.published'],
      secret: 'test-secret',
      ...overrides,
    });
  }

  function publish(webhook: Webhook, entityId: string = 'entry-1'): DeliveryRecord {
    dispatcher.onEvent('content.published', entityId, { contentType: 'article' });
    const record = deliveryRepository.listByWebhook(webhook.id).find((r) => r.idempotencyKey.endsWith(`:${entityId}`));
    if (!record) throw new Error('no delivery record');
    return record;
  }

  async function runDue(executor: DeliveryExecutor): Promise<Array<ExecutionOutcome | null>> {
    const jobs = queue.claim('test-worker', 10);
    return Promise.all(jobs.map((job) => executor.run(job)));
  }

  describe('retry schedule', () => {
    it('should retry after 1s, 2s, 4s, 8s and dead-letter the fifth failure', async () => {
      const webhook = subscribe({ retryCount: 5 });
      const record = publish(webhook);
      const sender = new ScriptedSender([500]);
      const executor = new DeliveryExecutor(sender, queue);

      const attemptTimes = [T0, T0 + 1000, T0 + 3000, T0 + 7000, T0 + 15000];
      const outcomes: Array<ExecutionOutcome | null> = [];

      for (const at of attemptTimes) {
        // nothing is due just before the scheduled time
        vi.setSystemTime(at - 1);
        expect(await runDue(executor)).toEqual([]);

        vi.setSystemTime(at);
        outcomes.push(...(await runDue(executor)));
      }

      expect(outcomes.map((o) => o?.kind)).toEqual([
        'retry_scheduled',
        'retry_scheduled',
        'retry_scheduled',
        'retry_scheduled',
        'dead_lettered',
      ]);
      expect(sender.requests).toHaveLength(5);

      const stored = deliveryRepository.getById(record.id);
      expect(stored?.status).toBe('dead_lettered');
      expect(stored?.attempts).toBe(5);
      expect(stored?.responseStatus).toBe(500);
      expect(stored?.lastError).toBe('HTTP 500');
      expect(stored?.nextAttemptAt).toBeNull();

      const entries = deadLetterRepository.list();
      expect(entries).toHaveLength(1);
      expect(entries[0]).toEqual({
        id: entries[0].id,
        jobType: 'webhook_delivery',
        webhookId: webhook.id,
        deliveryId: record.id,
        event: 'content.published',
        targetUrl: 'https://receiver.test/hooks',
        payload: record.payload,
        failureReason: 'HTTP 500',
        retryCount: 5,
        firstFailedAt: T0,
        lastFailedAt: T0 + 15000,
      });

      // the queue holds nothing further for this delivery
      vi.setSystemTime(T0 + 3600000);
      expect(await runDue(executor)).toEqual([]);
      expect(queue.listForDelivery(record.id).map((j) => j.status)).toEqual(['done']);
    });

    it('should record each scheduled attempt on the delivery record', async () => {
      const webhook = subscribe({ retryCount: 5 });
      const record = publish(webhook);
      const executor = new DeliveryExecutor(new ScriptedSender([503]), queue);

      await runDue(executor);

      const stored = deliveryRepository.getById(record.id);
      expect(stored?.status).toBe('retry_scheduled');
      expect(stored?.attempts).toBe(1);
      expect(stored?.nextAttemptAt).toBe(T0 + 1000);
      expect(queue.listForDelivery(record.id)[0].runAt).toBe(T0 + 1000);
    });

    it('should dead-letter on the first failure with a budget of 1', async () => {
      const webhook = subscribe({ retryCount: 1 });
      const record = publish(webhook);
      const sender = new ScriptedSender([500]);
      const executor = new DeliveryExecutor(sender, queue);

      const outcomes = await runDue(executor);

      expect(outcomes).toEqual([
        { kind: 'dead_lettered', attempts: 1, deadLetterId: expect.stringMatching(/^dlq_/), error: 'HTTP 500' },
      ]);
      expect(sender.requests).toHaveLength(1);
      expect(deliveryRepository.getById(record.id)?.status).toBe('dead_lettered');
      expect(deadLetterRepository.list()[0].retryCount).toBe(1);
    });

    it('should deliver on the third attempt after two failures with a budget of 3', async () => {
      const webhook = subscribe({ retryCount: 3 });
      const record = publish(webhook);
      const sender = new ScriptedSender([500, 500, 200]);
      const executor = new DeliveryExecutor(sender, queue);

      await runDue(executor);
      vi.setSystemTime(T0 + 1000);
      await runDue(executor);
      vi.setSystemTime(T0 + 3000);
      const [last] = await runDue(executor);

      expect(last).toEqual({ kind: 'delivered', attempts: 3, responseStatus: 200 });
      const stored = deliveryRepository.getById(record.id);
      expect(stored?.status).toBe('delivered');
      expect(stored?.attempts).toBe(3);
      expect(stored?.responseStatus).toBe(200);
      expect(stored?.deliveredAt).toBe(T0 + 3000);
      expect(stored?.lastError).toBeNull();
      expect(deadLetterRepository.count()).toBe(0);
    });

    it('should use a per-subscription backoff schedule', async () => {
      const webhook = subscribe({ retryCount: 4, backoffScheduleMs: [10, 20] });
      const record = publish(webhook);
      const executor = new DeliveryExecutor(new ScriptedSender([500]), queue);

      await runDue(executor);
      expect(deliveryRepository.getById(record.id)?.nextAttemptAt).toBe(T0 + 10);

      vi.setSystemTime(T0 + 10);
      await runDue(executor);
      expect(deliveryRepository.getById(record.id)?.nextAttemptAt).toBe(T0 + 30);

      vi.setSystemTime(T0 + 30);
      await runDue(executor);
      expect(deliveryRepository.getById(record.id)?.nextAttemptAt).toBe(T0 + 50);
    });
  });

  describe('failure classification', () => {
    it('should treat any non-2xx status as a failure', async () => {
      for (const status of [301, 404, 429]) {
        resetDatabase();
        const webhook = subscribe({ retryCount: 2 });
        const record = publish(webhook);
        const executor = new DeliveryExecutor(new ScriptedSender([status]), queue);

        const [outcome] = await runDue(executor);

        expect(outcome?.kind).toBe('retry_scheduled');
        expect(deliveryRepository.getById(record.id)?.lastError).toBe(`HTTP ${status}`);
      }
    });

    it('should treat any 2xx status as success', async () => {
      const webhook = subscribe();
      publish(webhook);
      const executor = new DeliveryExecutor(new ScriptedSender([204]), queue);

      const [outcome] = await runDue(executor);

      expect(outcome).toEqual({ kind: 'delivered', attempts: 1, responseStatus: 204 });
    });

    it('should record transport errors and keep the last received status', async () => {
      const webhook = subscribe({ retryCount: 5 });
      const record = publish(webhook);
      const executor = new DeliveryExecutor(new ScriptedSender([503, new Error('socket hang up')]), queue);

      await runDue(executor);
      vi.setSystemTime(T0 + 1000);
      const [outcome] = await runDue(executor);

      expect(outcome).toEqual({
        kind: 'retry_scheduled',
        attempts: 2,
        nextAttemptAt: T0 + 3000,
        error: 'socket hang up',
      });
      const stored = deliveryRepository.getById(record.id);
      expect(stored?.responseStatus).toBe(503);
      expect(stored?.lastError).toBe('socket hang up');
    });
  });

  describe('request', () => {
    it('should send the stored payload verbatim with signature and custom headers', async () => {
      const webhook = subscribe({ headers: { 'X-Source': 'cms' }, timeout: 2500 });
      const record = publish(webhook);
      const sender = new ScriptedSender([200]);

      await runDue(new DeliveryExecutor(sender, queue));

      const [request] = sender.requests;
      expect(request.url).toBe('https://receiver.test/hooks');
      expect(request.timeoutMs).toBe(2500);
      expect(request.body.toString('utf8')).toBe(record.payload);
      expect(request.headers['Content-Type']).toBe('application/json');
      expect(request.headers['X-Source']).toBe('cms');
      expect(verifySignature(request.headers['X-Signature'], 'test-secret', request.body)).toBe(true);
    });

    it('should send identical bytes and signature on every attempt', async () => {
      const webhook = subscribe();
      publish(webhook);
      const sender = new ScriptedSender([500, 200]);
      const executor = new DeliveryExecutor(sender, queue);

      await runDue(executor);
      vi.setSystemTime(T0 + 1000);
      await runDue(executor);

      const [first, second] = sender.requests;
      expect(second.body.equals(first.body)).toBe(true);
      expect(second.headers['X-Signature']).toBe(first.headers['X-Signature']);
    });
  });

  describe('terminal states', () => {
    it('should not attempt a delivered record again', async () => {
      const webhook = subscribe();
      const record = publish(webhook);
      const sender = new ScriptedSender([200]);
      const executor = new DeliveryExecutor(sender, queue);
      await runDue(executor);

      const outcome = await executor.execute(record.id, webhook.id);

      expect(outcome).toEqual({ kind: 'skipped', reason: 'delivery already delivered' });
      expect(sender.requests).toHaveLength(1);
      expect(deliveryRepository.getById(record.id)?.attempts).toBe(1);
    });

    it('should not attempt or dead-letter a dead-lettered record again', async () => {
      const webhook = subscribe({ retryCount: 1 });
      const record = publish(webhook);
      const sender = new ScriptedSender([500]);
      const executor = new DeliveryExecutor(sender, queue);
      await runDue(executor);

      const outcome = await executor.execute(record.id, webhook.id);

      expect(outcome.kind).toBe('skipped');
      expect(sender.requests).toHaveLength(1);
      expect(deadLetterRepository.count()).toBe(1);
    });

    it('should apply an attempt only once when the same record runs twice concurrently', async () => {
      const webhook = subscribe();
      const record = publish(webhook);
      const sender = new ScriptedSender([200]);
      const executor = new DeliveryExecutor(sender, queue);

      const outcomes = await Promise.all([
        executor.execute(record.id, webhook.id),
        executor.execute(record.id, webhook.id),
      ]);

      expect(outcomes.map((o) => o.kind).sort()).toEqual(['delivered', 'skipped']);
      expect(deliveryRepository.getById(record.id)?.attempts).toBe(1);
    });

    it('should defer a record picked up before its next attempt time', async () => {
      const webhook = subscribe();
      const record = publish(webhook);
      const sender = new ScriptedSender([500]);
      const executor = new DeliveryExecutor(sender, queue);
      await runDue(executor);

      vi.setSystemTime(T0 + 500);
      const outcome = await executor.execute(record.id, webhook.id);

      expect(outcome).toEqual({ kind: 'deferred', runAt: T0 + 1000 });
      expect(sender.requests).toHaveLength(1);
    });
  });

  describe('missing data', () => {
    it('should drop work items whose record is gone', async () => {
      const webhook = subscribe();
      publish(webhook);
      webhookRepository.delete(webhook.id);
      const sender = new ScriptedSender([200]);

      const outcomes = await runDue(new DeliveryExecutor(sender, queue));

      expect(outcomes).toEqual([{ kind: 'dropped', reason: 'delivery record not found' }]);
      expect(sender.requests).toHaveLength(0);
      expect(queue.stats()).toEqual({ queued: 0, running: 0, done: 1, due: 0 });
    });

    it('should drop work items whose subscription is gone', async () => {
      const sender = new ScriptedSender([200]);
      const webhook = subscribe();
      const record = publish(webhook);
      const executor = new DeliveryExecutor(sender, queue);

      const outcome = await executor.execute(record.id, 'whk_missing');

      expect(outcome).toEqual({ kind: 'dropped', reason: 'webhook not found' });
      expect(sender.requests).toHaveLength(0);
    });

    it('should still complete deliveries for a subscription disabled after dispatch', async () => {
      const webhook = subscribe();
      publish(webhook);
      webhookRepository.update(webhook.id, { enabled: false });

      const [outcome] = await runDue(new DeliveryExecutor(new ScriptedSender([200]), queue));

      expect(outcome?.kind).toBe('delivered');
    });
  });

  it('should put a work item back after an execution error', async () => {
    const webhook = subscribe();
    const record = publish(webhook);
    const executor = new DeliveryExecutor(
      new ScriptedSender([200]),
      queue,
      webhookRepository,
      new BrokenDeliveryRepository()
    );

    const outcomes = await runDue(executor);

    expect(outcomes).toEqual([null]);
    const [job] = queue.listForDelivery(record.id);
    expect(job.status).toBe('queued');
    expect(job.runAt).toBe(T0 + 30000);
  });
});
