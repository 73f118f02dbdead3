import { FastifyPluginAsync } from 'fastify';
import { verifyAdminKey } from '../../middlewares/auth';
import { deadLetterRepository } from '../../modules/webhooks/dead-letter-repository';
import { BAD_REQUEST, NOT_FOUND } from '../../utils/http-errors';
import type { StandardResponse } from '../../types';
import type { DeadLetterFilter } from '../../modules/webhooks/types';

export const deadLettersRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.addHook('onRequest', verifyAdminKey);

  /**
   * Inspect dead-lettered deliveries, most recent failure first
   * GET /v1/dead-letters?search=timeout&retryCountMin=3&limit=20
   */
  fastify.get<{ Querystring: DeadLetterFilter }>(
    '/',
    {
      schema: {
        description: 'List dead-lettered webhook deliveries',
        tags: ['dead-letters'],
        security: [{ adminKey: [] }],
        querystring: {
          type: 'object',
          properties: {
            search: { type: 'string', description: 'Substring of the failure reason' },
            retryCountMin: { type: 'integer', minimum: 0 },
            retryCountMax: { type: 'integer', minimum: 0 },
            limit: { type: 'integer', minimum: 1, maximum: 500 },
          },
        },
      },
    },
    async (request, reply) => {
      const filter = request.query;
      if (
        filter.retryCountMin !== undefined &&
        filter.retryCountMax !== undefined &&
        filter.retryCountMin > filter.retryCountMax
      ) {
        throw BAD_REQUEST('retryCountMin must not exceed retryCountMax');
      }

      const entries = deadLetterRepository.list(filter);

      const response: StandardResponse = {
        success: true,
        data: entries,
        requestId: request.requestId,
      };
      return reply.send(response);
    }
  );

  /**
   * GET /v1/dead-letters/:id
   */
  fastify.get<{ Params: { id: string } }>(
    '/:id',
    {
      schema: {
        description: 'Get a dead letter entry',
        tags: ['dead-letters'],
        security: [{ adminKey: [] }],
        params: {
          type: 'object',
          properties: { id: { type: 'string' } },
          required: ['id'],
        },
      },
    },
    async (request, reply) => {
      const entry = deadLetterRepository.getById(request.params.id);
      if (!entry) {
        throw NOT_FOUND('Dead letter entry not found');
      }

      const response: StandardResponse = {
        success: true,
        data: entry,
        requestId: request.requestId,
      };
      return reply.send(response);
    }
  );
};
