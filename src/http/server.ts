import Fastify from 'fastify';
import fastifyHelmet from '@fastify/helmet';
import fastifyCors from '@fastify/cors';
import fastifyRateLimit from '@fastify/rate-limit';
import fastifySwagger from '@fastify/swagger';
import fastifySwaggerUi from '@fastify/swagger-ui';
import config from '../config';
import logger from '../utils/logger';
import { flushSentry } from '../utils/sentry';
import { errorHandler, requestLogger } from '../middlewares/error-handler';
import { runMigrations } from '../storage/migrate';
import { closeDatabase } from '../storage/database';
import { eventBus } from '../modules/events/event-bus';
import { registerWebhookDispatcher, webhookDispatcher } from '../modules/webhooks/dispatcher';
import { deliveryWorker } from '../jobs/delivery-worker';
import { healthRoutes } from './routes/health';
import { webhooksRoutes } from './routes/webhooks';
import { deliveriesRoutes } from './routes/deliveries';
import { deadLettersRoutes } from './routes/dead-letters';
import { eventsRoutes } from './routes/events';

/**
 * Builds the Fastify app with plugins and routes; does not listen
 */
export async function createServer() {
  const server = Fastify({
    loggerInstance: logger,
    requestIdLogLabel: 'requestId',
    disableRequestLogging: true,
    trustProxy: true,
  });

  // Security headers
  await server.register(fastifyHelmet, {
    contentSecurityPolicy: false,
  });

  await server.register(fastifyCors, {
    origin: true,
    credentials: true,
  });

  await server.register(fastifyRateLimit, {
    max: config.rateLimit.max,
    timeWindow: config.rateLimit.window,
    cache: 10000,
    keyGenerator: (req) => req.ip,
    errorResponseBuilder: (req, context) => {
      return {
        statusCode: context.statusCode,
        success: false,
        error: {
          code: 'RATE_LIMIT_EXCEEDED',
          message: `Rate limit exceeded, retry after ${context.after}`,
        },
        requestId: req.requestId,
      };
    },
  });

  // OpenAPI/Swagger
  await server.register(fastifySwagger, {
    openapi: {
      info: {
        title: 'Content Webhook Relay API',
        description: 'Signed, retried webhook delivery of content events',
        version: '1.0.0',
      },
      servers: [
        {
          url: `http://localhost:${config.server.port}`,
          description: 'Development server',
        },
      ],
      components: {
        securitySchemes: {
          adminKey: {
            type: 'apiKey',
            name: 'X-Admin-Key',
            in: 'header',
            description: 'Admin key for management endpoints',
          },
        },
      },
      tags: [
        { name: 'health', description: 'Health check endpoints' },
        { name: 'webhooks', description: 'Webhook subscriptions (requires admin key)' },
        { name: 'deliveries', description: 'Delivery records (requires admin key)' },
        { name: 'dead-letters', description: 'Dead-lettered deliveries (requires admin key)' },
        { name: 'events', description: 'Content event intake (requires admin key)' },
      ],
    },
  });

  await server.register(fastifySwaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
    },
    staticCSP: true,
  });

  server.addHook('onRequest', requestLogger);
  server.setErrorHandler(errorHandler);

  // Public routes first
  await server.register(healthRoutes);

  await server.register(webhooksRoutes, { prefix: '/v1/webhooks' });
  await server.register(deliveriesRoutes, { prefix: '/v1/deliveries' });
  await server.register(deadLettersRoutes, { prefix: '/v1/dead-letters' });
  await server.register(eventsRoutes, { prefix: '/v1/events' });

  return server;
}

export async function startServer(): Promise<void> {
  try {
    logger.info('Running database migrations...');
    runMigrations();

    const server = await createServer();
    const busSubscriptions = registerWebhookDispatcher(eventBus, webhookDispatcher);

    await server.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info(`Server listening on http://${config.server.host}:${config.server.port}`);
    logger.info(`OpenAPI docs available at http://localhost:${config.server.port}/docs`);

    if (config.worker.enabled) {
      deliveryWorker.start();
    } else {
      logger.info('Delivery worker disabled on this instance');
    }

    let shuttingDown = false;
    const shutdown = async (signal: string) => {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info({ signal }, 'Shutting down gracefully...');

      try {
        await server.close();

        busSubscriptions.forEach((id) => eventBus.unsubscribe(id));

        // Unfinished jobs are re-claimed after their lease expires
        await deliveryWorker.stop();

        closeDatabase();
        await flushSentry();
        logger.info('Shutdown complete');
      } catch (error) {
        logger.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      }

      process.exit(0);
    };

    process.on('SIGINT', () => {
      void shutdown('SIGINT');
    });
    process.on('SIGTERM', () => {
      void shutdown('SIGTERM');
    });
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server');
    await flushSentry();
    process.exit(1);
  }
}
