import type { IncomingMessage } from 'node:http';
import { InvalidParameterError } from '../errors';
import type { MacRequest } from './types';

const isEncrypted = (request: IncomingMessage) =>
  'encrypted' in request.socket && request.socket.encrypted === true;

/**
 * For Node HTTP servers. The scheme comes from the socket unless a proxy-aware
 * caller passes it explicitly.
 */
export const requestFromIncomingMessage = (request: IncomingMessage, scheme?: string): MacRequest => {
  const host = request.headers.host;
  if (!host) {
    throw new InvalidParameterError('missing host header');
  }
  return {
    method: request.method ?? 'GET',
    url: request.url ?? '/',
    host,
    scheme: scheme ?? (isEncrypted(request) ? 'https' : 'http'),
    authorization: request.headers.authorization
  };
};
