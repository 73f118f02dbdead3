import config from '../../config';
import logger from '../../utils/logger';
import { captureException, captureMessage } from '../../utils/sentry';
import { withTransaction } from '../../storage/database';
import { deliveryQueue, type DeliveryJob, type DeliveryQueue } from '../../jobs/delivery-queue';
import { webhookRepository, type WebhookRepository } from './repository';
import { deliveryRepository, type DeliveryRepository } from './delivery-repository';
import { deadLetterRepository, type DeadLetterRepository } from './dead-letter-repository';
import { backoffDelayMs, resolveBackoffSchedule } from './backoff';
import { SIGNATURE_HEADER, signatureHeaderValue } from './signature';
import { describeSendError, webhookSender, type WebhookSender } from './sender';
import { TERMINAL_DELIVERY_STATUSES, WEBHOOK_DELIVERY_JOB_TYPE, type DeliveryRecord, type Webhook } from './types';

export type ExecutionOutcome =
  | { kind: 'delivered'; attempts: number; responseStatus: number }
  | { kind: 'retry_scheduled'; attempts: number; nextAttemptAt: number; error: string }
  | { kind: 'dead_lettered'; attempts: number; deadLetterId: string; error: string }
  /** record or subscription no longer exists */
  | { kind: 'dropped'; reason: string }
  /** nothing to do: already terminal, or another execution applied this attempt */
  | { kind: 'skipped'; reason: string }
  /** picked up before its next attempt time */
  | { kind: 'deferred'; runAt: number };

interface AttemptResult {
  responseStatus: number | null;
  error: string | null;
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export class DeliveryExecutor {
  constructor(
    private sender: WebhookSender = webhookSender,
    private queue: DeliveryQueue = deliveryQueue,
    private webhooks: WebhookRepository = webhookRepository,
    private deliveries: DeliveryRepository = deliveryRepository,
    private deadLetters: DeadLetterRepository = deadLetterRepository
  ) {}

  /**
   * Performs one delivery attempt for the record and applies its outcome
   */
  async execute(deliveryId: string, webhookId: string): Promise<ExecutionOutcome> {
    const record = this.deliveries.getById(deliveryId);
    if (!record) {
      logger.warn({ deliveryId, webhookId }, 'Delivery record not found, dropping work item');
      return { kind: 'dropped', reason: 'delivery record not found' };
    }

    const webhook = this.webhooks.getById(webhookId);
    if (!webhook) {
      logger.warn({ deliveryId, webhookId }, 'Webhook not found, dropping work item');
      return { kind: 'dropped', reason: 'webhook not found' };
    }

    if (TERMINAL_DELIVERY_STATUSES.includes(record.status)) {
      logger.debug({ deliveryId, status: record.status }, 'Delivery already terminal');
      return { kind: 'skipped', reason: `delivery already ${record.status}` };
    }

    if (record.nextAttemptAt !== null && record.nextAttemptAt > Date.now()) {
      return { kind: 'deferred', runAt: record.nextAttemptAt };
    }

    const result = await this.attempt(webhook, record);
    const now = Date.now();
    const attempts = record.attempts + 1;

    if (result.responseStatus !== null && isSuccess(result.responseStatus)) {
      if (!this.deliveries.markDelivered(record.id, record.attempts, result.responseStatus, now)) {
        return { kind: 'skipped', reason: 'attempt already recorded' };
      }
      logger.info({ deliveryId, webhookId, attempts, responseStatus: result.responseStatus }, 'Webhook delivered');
      return { kind: 'delivered', attempts, responseStatus: result.responseStatus };
    }

    const error = result.error ?? `HTTP ${result.responseStatus}`;

    if (attempts >= webhook.retryCount) {
      return this.deadLetter(webhook, record, result.responseStatus, error, now);
    }

    const delay = backoffDelayMs(resolveBackoffSchedule(webhook.backoffScheduleMs), attempts);
    const nextAttemptAt = now + delay;
    const updated = this.deliveries.markFailed(record.id, record.attempts, {
      responseStatus: result.responseStatus,
      lastError: error,
      status: 'retry_scheduled',
      nextAttemptAt,
      at: now,
    });
    if (!updated) {
      return { kind: 'skipped', reason: 'attempt already recorded' };
    }

    logger.warn({ deliveryId, webhookId, attempts, delayMs: delay, error }, 'Webhook delivery failed, retry scheduled');
    return { kind: 'retry_scheduled', attempts, nextAttemptAt, error };
  }

  /**
   * Executes a claimed queue item and settles it: completed when the
   * delivery needs no further work, otherwise put back with a not-before time.
   */
  async run(job: DeliveryJob): Promise<ExecutionOutcome | null> {
    try {
      const outcome = await this.execute(job.deliveryId, job.webhookId);

      switch (outcome.kind) {
        case 'retry_scheduled':
          this.queue.reschedule(job.id, outcome.nextAttemptAt);
          break;
        case 'deferred':
          this.queue.reschedule(job.id, outcome.runAt);
          break;
        default:
          this.queue.complete(job.id);
      }

      return outcome;
    } catch (error) {
      logger.error({ err: error, jobId: job.id, deliveryId: job.deliveryId }, 'Delivery execution error');
      captureException(error, { jobId: job.id, deliveryId: job.deliveryId, webhookId: job.webhookId });
      this.queue.reschedule(job.id, Date.now() + config.worker.errorRetryDelayMs);
      return null;
    }
  }

  private async attempt(webhook: Webhook, record: DeliveryRecord): Promise<AttemptResult> {
    const body = Buffer.from(record.payload, 'utf8');
    const headers: Record<string, string> = {
      ...(webhook.headers ?? {}),
      'Content-Type': 'application/json',
      [SIGNATURE_HEADER]: signatureHeaderValue(webhook.secret, body),
    };

    try {
      const response = await this.sender.send({ url: webhook.url, body, headers, timeoutMs: webhook.timeout });
      return { responseStatus: response.status, error: null };
    } catch (error) {
      return { responseStatus: null, error: describeSendError(error, webhook.timeout) };
    }
  }

  private deadLetter(
    webhook: Webhook,
    record: DeliveryRecord,
    responseStatus: number | null,
    error: string,
    now: number
  ): ExecutionOutcome {
    const attempts = record.attempts + 1;

    const entry = withTransaction(() => {
      const updated = this.deliveries.markFailed(record.id, record.attempts, {
        responseStatus,
        lastError: error,
        status: 'dead_lettered',
        nextAttemptAt: null,
        at: now,
      });
      if (!updated) return null;

      return this.deadLetters.create({
        jobType: WEBHOOK_DELIVERY_JOB_TYPE,
        webhookId: webhook.id,
        deliveryId: record.id,
        event: record.event,
        targetUrl: webhook.url,
        payload: record.payload,
        failureReason: error,
        retryCount: attempts,
        firstFailedAt: record.createdAt,
        lastFailedAt: now,
      });
    });

    if (!entry) {
      return { kind: 'skipped', reason: 'attempt already recorded' };
    }

    logger.error({ deliveryId: record.id, webhookId: webhook.id, attempts, error, deadLetterId: entry.id }, 'Webhook delivery dead-lettered');
    captureMessage('Webhook delivery dead-lettered', 'warning', {
      deliveryId: record.id,
      webhookId: webhook.id,
      attempts,
      error,
    });

    return { kind: 'dead_lettered', attempts, deadLetterId: entry.id, error };
  }
}

export const deliveryExecutor = new DeliveryExecutor();
