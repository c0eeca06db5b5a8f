import type { FastifyError, FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import { isAuthError } from '../auth/errors.js';
import { sendError } from '../utils/errors.js';

/**
 * Auth decisions keep their own status and message; anything else that is not
 * a client error is an infrastructure failure and becomes a plain 500.
 */
export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (isAuthError(error)) {
      request.log.warn({ code: error.code, url: request.url }, 'Request rejected by authorization');
      if (error.statusCode === 401) {
        reply.header('WWW-Authenticate', `Bearer error="${error.code}"`);
      }
      return reply.send(sendError(reply, error.statusCode, error.code, error.message));
    }

    if (error instanceof ZodError) {
      return reply.send(sendError(reply, 400, 'invalid_request', 'Invalid request', error.issues));
    }

    if (error.validation) {
      return reply.send(sendError(reply, 400, 'invalid_request', error.message, error.validation));
    }

    if (typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.send(sendError(reply, error.statusCode, error.code ?? 'bad_request', error.message));
    }

    request.log.error({ err: error }, 'Unhandled error while processing request');
    return reply.send(sendError(reply, 500, 'internal_error', 'Internal server error.'));
  });
}
