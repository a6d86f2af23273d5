import type { FastifyInstance } from 'fastify';
import { MacAuthError, sanitizeError } from '@macauth/auth';
import { CryptoError } from '@macauth/crypto';
import { CacheLockError } from '@macauth/storage';

export const registerErrorHandler = (app: FastifyInstance) => {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof MacAuthError) {
      return reply.status(400).send({ error: error.code, message: error.message, requestId: request.id });
    }
    if (error instanceof CacheLockError) {
      return reply.status(503).send({ error: error.code, message: error.message, requestId: request.id });
    }
    if (error.validation) {
      return reply.status(400).send({ error: 'VALIDATION_ERROR', message: error.message, requestId: request.id });
    }
    if (error instanceof CryptoError) {
      request.log.error({ error: sanitizeError(error) }, 'misconfigured mac algorithm');
    } else {
      request.log.error({ error: sanitizeError(error) }, 'unhandled error');
    }
    return reply.status(500).send({ error: 'INTERNAL', message: 'internal_error', requestId: request.id });
  });
};
