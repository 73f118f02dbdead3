import { FastifyRequest, FastifyReply, FastifyError } from 'fastify';
import Boom from '@hapi/boom';
import { AppError, ErrorCode, StandardResponse } from '../types';
import logger from '../utils/logger';
import { captureException } from '../utils/sentry';
import crypto from 'crypto';

declare module 'fastify' {
  interface FastifyRequest {
    requestId: string;
  }
}

/**
 * Assigns the request id and logs the incoming request
 */
export async function requestLogger(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  request.requestId = crypto.randomBytes(16).toString('hex');
  reply.header('X-Request-Id', request.requestId);

  logger.info({
    requestId: request.requestId,
    method: request.method,
    url: request.url,
    ip: request.ip,
  }, 'Incoming request');
}

function boomCode(statusCode: number): ErrorCode {
  switch (statusCode) {
    case 400:
      return ErrorCode.INVALID_INPUT;
    case 401:
      return ErrorCode.UNAUTHORIZED;
    case 403:
      return ErrorCode.FORBIDDEN;
    case 404:
      return ErrorCode.NOT_FOUND;
    case 409:
      return ErrorCode.CONFLICT;
    case 429:
      return ErrorCode.RATE_LIMIT_EXCEEDED;
    case 503:
      return ErrorCode.SERVICE_UNAVAILABLE;
    default:
      return statusCode >= 500 ? ErrorCode.INTERNAL_ERROR : ErrorCode.INVALID_INPUT;
  }
}

/**
 * Global error handler: every failure leaves as a StandardResponse envelope
 */
export function errorHandler(
  error: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply
): void {
  if (error instanceof AppError) {
    const response: StandardResponse = {
      success: false,
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
      },
      requestId: request.requestId,
    };

    logger.warn({
      requestId: request.requestId,
      code: error.code,
      statusCode: error.statusCode,
      reason: error.message,
    }, 'Application error');

    reply.status(error.statusCode).send(response);
    return;
  }

  if (Boom.isBoom(error)) {
    const { statusCode, payload } = error.output;
    const response: StandardResponse = {
      success: false,
      error: {
        code: boomCode(statusCode),
        message: payload.message,
      },
      requestId: request.requestId,
    };

    logger.warn({ requestId: request.requestId, statusCode, reason: payload.message }, 'HTTP error');

    reply.status(statusCode).send(response);
    return;
  }

  // Fastify schema validation
  if ('validation' in error && error.validation) {
    const response: StandardResponse = {
      success: false,
      error: {
        code: ErrorCode.VALIDATION_ERROR,
        message: error.message,
        details: error.validation,
      },
      requestId: request.requestId,
    };

    logger.warn({
      requestId: request.requestId,
      validation: error.validation,
    }, 'Validation error');

    reply.status(400).send(response);
    return;
  }

  // Fastify's own client errors (malformed JSON, unsupported media type, body too large)
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500) {
    const response: StandardResponse = {
      success: false,
      error: {
        code: boomCode(error.statusCode),
        message: error.message,
      },
      requestId: request.requestId,
    };

    reply.status(error.statusCode).send(response);
    return;
  }

  logger.error({ err: error, requestId: request.requestId }, 'Unhandled error');
  captureException(error, { requestId: request.requestId, url: request.url, method: request.method });

  const response: StandardResponse = {
    success: false,
    error: {
      code: ErrorCode.INTERNAL_ERROR,
      message: 'Internal server error',
    },
    requestId: request.requestId,
  };

  reply.status(500).send(response);
}
