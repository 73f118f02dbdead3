import { FastifyPluginAsync } from 'fastify';
import { verifyAdminKey } from '../../middlewares/auth';
import { deliveryRepository } from '../../modules/webhooks/delivery-repository';
import { NOT_FOUND } from '../../utils/http-errors';
import type { StandardResponse } from '../../types';

export const deliveriesRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.addHook('onRequest', verifyAdminKey);

  /**
   * GET /v1/deliveries/:id
   */
  fastify.get<{ Params: { id: string } }>(
    '/:id',
    {
      schema: {
        description: 'Get a delivery record, including its stored payload',
        tags: ['deliveries'],
        security: [{ adminKey: [] }],
        params: {
          type: 'object',
          properties: { id: { type: 'string' } },
          required: ['id'],
        },
      },
    },
    async (request, reply) => {
      const delivery = deliveryRepository.getById(request.params.id);
      if (!delivery) {
        throw NOT_FOUND('Delivery not found');
      }

      const response: StandardResponse = {
        success: true,
        data: delivery,
        requestId: request.requestId,
      };
      return reply.send(response);
    }
  );
};
