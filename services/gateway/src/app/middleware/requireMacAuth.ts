import { getId, verify, type MacRequest, type SafeLogger } from '@macauth/auth';
import type { HashAlgorithm } from '@macauth/crypto';
import type { NonceCache } from '@macauth/storage';
import type { FastifyReply, FastifyRequest } from 'fastify';
import type { KeyResolver } from '../../keys/types';
import type { GatewayMetrics, MacAuthOutcome } from '../../observability/metrics';

declare module 'fastify' {
  interface FastifyRequest {
    macIdentity: string | null;
  }
}

export const MAC_AUTH_ERROR_CODES = {
  missingCredentials: 'MISSING_CREDENTIALS',
  malformedRequest: 'MALFORMED_REQUEST',
  unknownIdentity: 'UNKNOWN_IDENTITY',
  invalidSignature: 'INVALID_SIGNATURE'
} as const;

export type MacAuthErrorCode = (typeof MAC_AUTH_ERROR_CODES)[keyof typeof MAC_AUTH_ERROR_CODES];

export interface RequireMacAuthDependencies {
  keyResolver: KeyResolver;
  nonceCache: NonceCache;
  metrics: GatewayMetrics;
  logger: SafeLogger;
  algorithm?: HashAlgorithm;
}

const toMacRequest = (request: FastifyRequest): MacRequest | null => {
  const { host, authorization } = request.headers;
  if (!host) {
    return null;
  }
  return { method: request.method, url: request.url, host, scheme: request.protocol, authorization };
};

export const createRequireMacAuth = (deps: RequireMacAuthDependencies) => {
  const { keyResolver, nonceCache, metrics, logger, algorithm } = deps;

  const fail = (
    request: FastifyRequest,
    reply: FastifyReply,
    outcome: MacAuthOutcome,
    code: MacAuthErrorCode,
    message: string,
    startedAt: number,
    loggingMeta?: Record<string, unknown>
  ) => {
    metrics.recordAuth(outcome, Date.now() - startedAt);
    logger.warn?.({ reqId: request.id, code, ...loggingMeta }, 'auth_failed');
    return reply.code(401).header('WWW-Authenticate', 'MAC').send({ code, message, requestId: request.id });
  };

  return async function requireMacAuth(request: FastifyRequest, reply: FastifyReply) {
    const startedAt = Date.now();

    const macRequest = toMacRequest(request);
    if (!macRequest) {
      return fail(request, reply, 'malformed', MAC_AUTH_ERROR_CODES.malformedRequest, 'Host header required', startedAt);
    }

    const id = getId(macRequest);
    if (!id) {
      return fail(
        request,
        reply,
        'missing',
        MAC_AUTH_ERROR_CODES.missingCredentials,
        'MAC authorization required',
        startedAt
      );
    }

    const key = await keyResolver.resolve(id);
    if (key === null) {
      return fail(request, reply, 'unknown_id', MAC_AUTH_ERROR_CODES.unknownIdentity, 'Unknown MAC identity', startedAt, {
        id
      });
    }

    if (!verify(macRequest, key, { algorithm, nonceCache, logger })) {
      return fail(
        request,
        reply,
        'invalid',
        MAC_AUTH_ERROR_CODES.invalidSignature,
        'MAC signature rejected',
        startedAt,
        { id }
      );
    }

    request.macIdentity = id;
    metrics.recordAuth('ok', Date.now() - startedAt);
    logger.debug?.({ reqId: request.id, id }, 'auth_ok');
  };
};

export type RequireMacAuth = ReturnType<typeof createRequireMacAuth>;
