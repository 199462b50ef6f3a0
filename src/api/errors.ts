/**
 * Error rendering
 *
 * Every error response, gatekeeper rejection or not, uses the same body:
 * { code, message, error, request_id, details? }. Internal exception text
 * never reaches the client; 5xx errors are logged with their stack.
 */

import { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { buildErrorBody, GatekeeperError, RateLimitedError } from '../utils/errors';

/** Codes for framework errors carrying their own 4xx status */
const CLIENT_ERROR_CODES: Record<number, string> = {
  400: 'BAD_REQUEST',
  404: 'NOT_FOUND',
  405: 'METHOD_NOT_ALLOWED',
  413: 'PAYLOAD_TOO_LARGE',
  415: 'UNSUPPORTED_MEDIA_TYPE',
};

export function errorHandler(error: FastifyError, request: FastifyRequest, reply: FastifyReply): FastifyReply {
  if (error instanceof GatekeeperError) {
    if (error instanceof RateLimitedError) {
      reply.header('Retry-After', String(error.retryAfterSeconds));
    }
    return reply.status(error.statusCode).send(
      buildErrorBody({
        statusCode: error.statusCode,
        code: error.code,
        message: error.message,
        requestId: request.id,
        details: error.details,
      })
    );
  }

  if (error.validation) {
    return reply.status(400).send(
      buildErrorBody({
        statusCode: 400,
        code: 'VALIDATION_ERROR',
        message: error.message || 'invalid request',
        requestId: request.id,
        details: error.validation.map((issue) => ({
          path: issue.instancePath,
          message: issue.message ?? 'invalid value',
        })),
      })
    );
  }

  const statusCode = error.statusCode ?? 500;
  if (statusCode >= 400 && statusCode < 500) {
    return reply.status(statusCode).send(
      buildErrorBody({
        statusCode,
        code: CLIENT_ERROR_CODES[statusCode] ?? 'BAD_REQUEST',
        message: error.message,
        requestId: request.id,
      })
    );
  }

  request.log.error({ err: error, request_id: request.id }, 'unhandled_exception');
  return reply.status(500).send(
    buildErrorBody({
      statusCode: 500,
      code: 'INTERNAL_ERROR',
      message: 'Internal Server Error',
      requestId: request.id,
    })
  );
}

export function notFoundHandler(request: FastifyRequest, reply: FastifyReply): FastifyReply {
  return reply.status(404).send(
    buildErrorBody({
      statusCode: 404,
      code: 'NOT_FOUND',
      message: 'Not Found',
      requestId: request.id,
    })
  );
}
