import { FastifyPluginAsync } from 'fastify';
import { verifyAdminKey } from '../../middlewares/auth';
import { eventBus } from '../../modules/events/event-bus';
import { CONTENT_EVENT_NAMES, type ContentEvent, type ContentEventName, type FieldDiff } from '../../modules/events/types';
import type { StandardResponse } from '../../types';

interface PublishEventBody {
  event: ContentEventName;
  entityId: string;
  contentType: string;
  userId?: string;
  data?: Record<string, unknown>;
  diff?: Record<string, FieldDiff>;
  entry?: Record<string, unknown>;
}

function toContentEvent(body: PublishEventBody): ContentEvent {
  const base = { entityId: body.entityId, contentType: body.contentType, userId: body.userId };

  switch (body.event) {
    case 'content.created':
      return { ...base, name: body.event, data: body.data };
    case 'content.updated':
      return { ...base, name: body.event, diff: body.diff };
    case 'content.published':
      return { ...base, name: body.event, entry: body.entry };
    case 'content.deleted':
      return { ...base, name: body.event };
  }
}

export const eventsRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.addHook('onRequest', verifyAdminKey);

  /**
   * Publish a content event onto the bus
   * POST /v1/events
   */
  fastify.post<{ Body: PublishEventBody }>(
    '/',
    {
      schema: {
        description: 'Publish a content event; matching webhooks are delivered asynchronously',
        tags: ['events'],
        security: [{ adminKey: [] }],
        body: {
          type: 'object',
          properties: {
            event: { type: 'string', enum: [...CONTENT_EVENT_NAMES] },
            entityId: { type: 'string', minLength: 1 },
            contentType: { type: 'string', minLength: 1 },
            userId: { type: 'string' },
            data: { type: 'object' },
            diff: { type: 'object' },
            entry: { type: 'object' },
          },
          required: ['event', 'entityId', 'contentType'],
        },
      },
    },
    async (request, reply) => {
      const event = toContentEvent(request.body);
      await eventBus.publish(event, { requestId: request.requestId, userId: event.userId, source: 'http' });

      const response: StandardResponse = {
        success: true,
        data: { accepted: true, event: event.name, entityId: event.entityId },
        requestId: request.requestId,
      };
      return reply.code(202).send(response);
    }
  );
};
