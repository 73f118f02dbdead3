import { FastifyPluginAsync } from 'fastify';
import { getDatabase } from '../../storage/database';
import { webhookRepository } from '../../modules/webhooks/repository';
import { deliveryRepository } from '../../modules/webhooks/delivery-repository';
import { deadLetterRepository } from '../../modules/webhooks/dead-letter-repository';
import { deliveryQueue } from '../../jobs/delivery-queue';
import { deliveryWorker } from '../../jobs/delivery-worker';
import config from '../../config';
import logger from '../../utils/logger';

function gauge(name: string, help: string, value: number, type: 'gauge' | 'counter' = 'gauge'): string {
  return `# HELP ${name} ${help}\n# TYPE ${name} ${type}\n${name} ${value}\n`;
}

export const healthRoutes: FastifyPluginAsync = async (fastify) => {
  /**
   * Liveness check
   * GET /health
   */
  fastify.get(
    '/health',
    {
      schema: {
        description: 'Liveness check endpoint',
        tags: ['health'],
        response: {
          200: {
            type: 'object',
            properties: {
              status: { type: 'string' },
              timestamp: { type: 'number' },
              uptime: { type: 'number' },
            },
          },
        },
      },
    },
    async (_request, reply) => {
      return reply.send({
        status: 'alive',
        timestamp: Math.floor(Date.now() / 1000),
        uptime: process.uptime(),
      });
    }
  );

  /**
   * Readiness check
   * GET /ready
   */
  fastify.get(
    '/ready',
    {
      schema: {
        description: 'Readiness check endpoint - checks DB and delivery worker',
        tags: ['health'],
        response: {
          200: {
            type: 'object',
            properties: {
              ready: { type: 'boolean' },
              db: { type: 'boolean' },
              worker: { type: 'boolean' },
              timestamp: { type: 'number' },
            },
          },
          503: {
            type: 'object',
            properties: {
              ready: { type: 'boolean' },
              db: { type: 'boolean' },
              worker: { type: 'boolean' },
              timestamp: { type: 'number' },
            },
          },
        },
      },
    },
    async (_request, reply) => {
      let dbHealthy = false;

      try {
        const result = getDatabase().prepare('SELECT 1 as ok').get();
        dbHealthy = result !== undefined;
      } catch (error) {
        logger.error({ err: error }, 'DB health check failed');
      }

      // a disabled worker is not a failure: another instance may run it
      const workerHealthy = !config.worker.enabled || deliveryWorker.isRunning();
      const ready = dbHealthy && workerHealthy;

      return reply.code(ready ? 200 : 503).send({
        ready,
        db: dbHealthy,
        worker: workerHealthy,
        timestamp: Math.floor(Date.now() / 1000),
      });
    }
  );

  /**
   * Metrics endpoint (Prometheus text format)
   * GET /metrics
   */
  fastify.get(
    '/metrics',
    {
      schema: {
        description: 'Prometheus-compatible metrics endpoint',
        tags: ['health'],
      },
    },
    async (_request, reply) => {
      try {
        const deliveries = deliveryRepository.countByStatus();
        const queue = deliveryQueue.stats();

        const metrics = [
          gauge('webhook_relay_webhooks_enabled', 'Enabled webhook subscriptions', webhookRepository.countEnabled()),
          gauge('webhook_relay_deliveries_pending', 'Deliveries awaiting their first attempt', deliveries.pending),
          gauge('webhook_relay_deliveries_retry_scheduled', 'Deliveries waiting for a retry', deliveries.retry_scheduled),
          gauge('webhook_relay_deliveries_delivered', 'Deliveries acknowledged with a 2xx response', deliveries.delivered, 'counter'),
          gauge('webhook_relay_deliveries_dead_lettered', 'Deliveries that exhausted their retry budget', deliveries.dead_lettered, 'counter'),
          gauge('webhook_relay_dead_letters_total', 'Dead letter entries', deadLetterRepository.count(), 'counter'),
          gauge('webhook_relay_queue_due', 'Queued work items whose run time has passed', queue.due),
          gauge('webhook_relay_queue_running', 'Work items currently leased by a worker', queue.running),
          gauge('process_uptime_seconds', 'Process uptime in seconds', Math.floor(process.uptime())),
          gauge('nodejs_memory_usage_bytes', 'Node.js heap usage in bytes', process.memoryUsage().heapUsed),
        ].join('\n');

        return reply
          .header('Content-Type', 'text/plain; version=0.0.4')
          .send(metrics);
      } catch (error) {
        logger.error({ err: error }, 'Failed to generate metrics');
        return reply.code(500).header('Content-Type', 'text/plain').send('# ERROR: Failed to generate metrics\n');
      }
    }
  );
};
