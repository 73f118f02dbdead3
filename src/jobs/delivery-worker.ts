import config from '../config';
import logger from '../utils/logger';
import { deliveryQueue, type DeliveryQueue } from './delivery-queue';
import { deliveryExecutor, type DeliveryExecutor } from '../modules/webhooks/executor';

export interface DeliveryWorkerOptions {
  workerId?: string;
  concurrency?: number;
  pollIntervalMs?: number;
}

/**
 * Polls the delivery queue and runs claimed items, at most `concurrency`
 * at a time. Ticks never overlap.
 */
export class DeliveryWorker {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<number> | null = null;
  private readonly workerId: string;
  private readonly concurrency: number;
  private readonly pollIntervalMs: number;

  constructor(
    private queue: DeliveryQueue = deliveryQueue,
    private executor: DeliveryExecutor = deliveryExecutor,
    options: DeliveryWorkerOptions = {}
  ) {
    this.workerId = options.workerId ?? config.instanceId;
    this.concurrency = options.concurrency ?? config.worker.concurrency;
    this.pollIntervalMs = options.pollIntervalMs ?? config.worker.pollIntervalMs;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.pollIntervalMs);
    logger.info(
      { workerId: this.workerId, concurrency: this.concurrency, pollIntervalMs: this.pollIntervalMs },
      'Delivery worker started'
    );
  }

  /**
   * Stops polling and waits for the current batch to settle
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      // tick() logs a failed batch
      await Promise.allSettled([this.inFlight]);
    }
    logger.info({ workerId: this.workerId }, 'Delivery worker stopped');
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Claims one batch and runs it to completion. Returns the number of items processed.
   */
  async runOnce(): Promise<number> {
    const jobs = this.queue.claim(this.workerId, this.concurrency);
    if (jobs.length === 0) return 0;

    logger.debug({ workerId: this.workerId, count: jobs.length }, 'Claimed delivery jobs');
    await Promise.all(jobs.map((job) => this.executor.run(job)));
    return jobs.length;
  }

  private async tick(): Promise<void> {
    if (this.inFlight) return;

    this.inFlight = this.runOnce();
    try {
      await this.inFlight;
    } catch (error) {
      logger.error({ err: error, workerId: this.workerId }, 'Delivery worker tick error');
    } finally {
      this.inFlight = null;
    }
  }
}

export const deliveryWorker = new DeliveryWorker();
