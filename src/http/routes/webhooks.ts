import { FastifyPluginAsync } from 'fastify';
import { verifyAdminKey } from '../../middlewares/auth';
import { webhookRepository, toPublicWebhook } from '../../modules/webhooks/repository';
import { deliveryRepository } from '../../modules/webhooks/delivery-repository';
import { CONTENT_EVENT_NAMES } from '../../modules/events/types';
import { NOT_FOUND } from '../../utils/http-errors';
import logger from '../../utils/logger';
import type { StandardResponse } from '../../types';
import type { CreateWebhookRequest, UpdateWebhookRequest } from '../../modules/webhooks/types';

const idParams = {
  type: 'object',
  properties: { id: { type: 'string' } },
  required: ['id'],
} as const;

const webhookBodyProperties = {
  name: { type: 'string', maxLength: 200 },
  url: { type: 'string', minLength: 1 },
  events: { type: 'array', items: { type: 'string', enum: [...CONTENT_EVENT_NAMES] } },
  secret: { type: 'string', minLength: 1 },
  headers: { type: 'object', additionalProperties: { type: 'string' } },
  enabled: { type: 'boolean' },
  retryCount: { type: 'integer', minimum: 1 },
  timeout: { type: 'integer', minimum: 1 },
  dedupWindowMs: { type: 'integer', minimum: 0, nullable: true },
  backoffScheduleMs: { type: 'array', items: { type: 'integer', minimum: 1 }, minItems: 1, nullable: true },
} as const;

export const webhooksRoutes: FastifyPluginAsync = async (fastify) => {
  // ahead of schema validation
  fastify.addHook('onRequest', verifyAdminKey);

  /**
   * Create webhook
   * POST /v1/webhooks
   */
  fastify.post<{ Body: CreateWebhookRequest }>(
    '/',
    {
      schema: {
        description: 'Register a webhook subscription. The signing secret is only returned here.',
        tags: ['webhooks'],
        security: [{ adminKey: [] }],
        body: {
          type: 'object',
          properties: webhookBodyProperties,
          required: ['url', 'events'],
          additionalProperties: false,
        },
      },
    },
    async (request, reply) => {
      const webhook = webhookRepository.create(request.body);
      logger.info({ webhookId: webhook.id, url: webhook.url, events: webhook.events }, 'Webhook created');

      const response: StandardResponse = {
        success: true,
        data: { ...toPublicWebhook(webhook), secret: webhook.secret },
        requestId: request.requestId,
      };
      return reply.code(201).send(response);
    }
  );

  /**
   * List webhooks
   * GET /v1/webhooks?enabled=true
   */
  fastify.get<{ Querystring: { enabled?: boolean } }>(
    '/',
    {
      schema: {
        description: 'List webhook subscriptions',
        tags: ['webhooks'],
        security: [{ adminKey: [] }],
        querystring: {
          type: 'object',
          properties: { enabled: { type: 'boolean' } },
        },
      },
    },
    async (request, reply) => {
      const webhooks = webhookRepository.list({ enabled: request.query.enabled });

      const response: StandardResponse = {
        success: true,
        data: webhooks.map(toPublicWebhook),
        requestId: request.requestId,
      };
      return reply.send(response);
    }
  );

  /**
   * Get webhook
   * GET /v1/webhooks/:id
   */
  fastify.get<{ Params: { id: string } }>(
    '/:id',
    {
      schema: {
        description: 'Get webhook details',
        tags: ['webhooks'],
        security: [{ adminKey: [] }],
        params: idParams,
      },
    },
    async (request, reply) => {
      const webhook = webhookRepository.getById(request.params.id);
      if (!webhook) {
        throw NOT_FOUND('Webhook not found');
      }

      const response: StandardResponse = {
        success: true,
        data: toPublicWebhook(webhook),
        requestId: request.requestId,
      };
      return reply.send(response);
    }
  );

  /**
   * Update webhook
   * PUT /v1/webhooks/:id
   */
  fastify.put<{ Params: { id: string }; Body: UpdateWebhookRequest }>(
    '/:id',
    {
      schema: {
        description: 'Update webhook configuration',
        tags: ['webhooks'],
        security: [{ adminKey: [] }],
        params: idParams,
        body: {
          type: 'object',
          properties: webhookBodyProperties,
          additionalProperties: false,
        },
      },
    },
    async (request, reply) => {
      const updated = webhookRepository.update(request.params.id, request.body);
      if (!updated) {
        throw NOT_FOUND('Webhook not found');
      }
      logger.info({ webhookId: updated.id, fields: Object.keys(request.body) }, 'Webhook updated');

      const response: StandardResponse = {
        success: true,
        data: toPublicWebhook(updated),
        requestId: request.requestId,
      };
      return reply.send(response);
    }
  );

  /**
   * Delete webhook and its delivery history
   * DELETE /v1/webhooks/:id
   */
  fastify.delete<{ Params: { id: string } }>(
    '/:id',
    {
      schema: {
        description: 'Delete webhook',
        tags: ['webhooks'],
        security: [{ adminKey: [] }],
        params: idParams,
      },
    },
    async (request, reply) => {
      if (!webhookRepository.delete(request.params.id)) {
        throw NOT_FOUND('Webhook not found');
      }
      logger.info({ webhookId: request.params.id }, 'Webhook deleted');
      return reply.code(204).send();
    }
  );

  /**
   * Delivery history
   * GET /v1/webhooks/:id/deliveries?limit=50
   */
  fastify.get<{ Params: { id: string }; Querystring: { limit?: number } }>(
    '/:id/deliveries',
    {
      schema: {
        description: 'List recent deliveries for a webhook, newest first',
        tags: ['webhooks'],
        security: [{ adminKey: [] }],
        params: idParams,
        querystring: {
          type: 'object',
          properties: { limit: { type: 'integer', minimum: 1, maximum: 500 } },
        },
      },
    },
    async (request, reply) => {
      if (!webhookRepository.getById(request.params.id)) {
        throw NOT_FOUND('Webhook not found');
      }

      const response: StandardResponse = {
        success: true,
        data: deliveryRepository.listByWebhook(request.params.id, request.query.limit ?? 100),
        requestId: request.requestId,
      };
      return reply.send(response);
    }
  );
};
