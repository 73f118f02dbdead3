import { FastifyRequest, FastifyReply } from 'fastify';
import { verifyAdminKey as verifyKey } from '../utils/crypto';
import { AppError, ErrorCode } from '../types';
import logger from '../utils/logger';

export const ADMIN_KEY_HEADER = 'x-admin-key';

/**
 * preHandler for management endpoints
 * Header: X-Admin-Key: <plain key>, whose SHA-256 must equal ADMIN_KEY
 */
export async function verifyAdminKey(
  request: FastifyRequest,
  _reply: FastifyReply
): Promise<void> {
  const header = request.headers[ADMIN_KEY_HEADER];
  const adminKey = Array.isArray(header) ? header[0] : header;

  if (!adminKey) {
    throw new AppError(
      ErrorCode.UNAUTHORIZED,
      'Admin key is required',
      401
    );
  }

  if (!verifyKey(adminKey)) {
    logger.warn({ ip: request.ip, url: request.url, requestId: request.requestId }, 'Admin authentication failed');

    throw new AppError(
      ErrorCode.INVALID_ADMIN_KEY,
      'Invalid admin key',
      401
    );
  }

  logger.debug({ ip: request.ip }, 'Admin authenticated');
}
