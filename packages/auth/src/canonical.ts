import { InvalidParameterError, UnknownSchemeError } from './errors';
import { readParam, requireParam, type MacParams } from './params';
import type { MacRequest } from './request/types';

const DEFAULT_PORTS = new Map<string, string>([
  ['http', '80'],
  ['https', '443']
]);

const PORT = /^\d{1,5}$/;

export interface HostAndPort {
  host: string;
  port?: string;
}

/** Splits a `Host` header value; bracketed IPv6 literals keep their brackets. */
export const splitHost = (value: string): HostAndPort => {
  const trimmed = value.trim();
  let host = trimmed;
  let port: string | undefined;

  if (trimmed.startsWith('[')) {
    const close = trimmed.indexOf(']');
    if (close === -1) {
      throw new InvalidParameterError(`invalid host: ${value}`);
    }
    host = trimmed.slice(0, close + 1);
    const rest = trimmed.slice(close + 1);
    if (rest) {
      if (!rest.startsWith(':')) {
        throw new InvalidParameterError(`invalid host: ${value}`);
      }
      port = rest.slice(1);
    }
  } else {
    const colon = trimmed.indexOf(':');
    if (colon !== -1) {
      host = trimmed.slice(0, colon);
      port = trimmed.slice(colon + 1);
    }
  }

  if (!host) {
    throw new InvalidParameterError('request has no host');
  }
  if (port === '') {
    return { host };
  }
  if (port !== undefined && !PORT.test(port)) {
    throw new InvalidParameterError(`invalid port: ${port}`);
  }
  return port === undefined ? { host } : { host, port };
};

export const defaultPort = (scheme: string): string => {
  const port = DEFAULT_PORTS.get(scheme.toLowerCase());
  if (port === undefined) {
    throw new UnknownSchemeError(scheme);
  }
  return port;
};

const pathAndQuery = (url: string) => {
  const mark = url.indexOf('?');
  if (mark === -1) return url;
  const query = url.slice(mark + 1);
  return query ? url : url.slice(0, mark);
};

/**
 * The string that gets signed: ts, nonce, method, path and query, host, port and
 * ext, each followed by a newline. Clients and servers must agree on it byte for byte.
 */
export const getNormalizedRequestString = (request: MacRequest, params: MacParams): string => {
  const ts = requireParam(params, 'ts');
  const nonce = requireParam(params, 'nonce');
  const { host, port } = splitHost(request.host);

  return [
    ts,
    nonce,
    request.method.toUpperCase(),
    pathAndQuery(request.url),
    host.toLowerCase(),
    port ?? defaultPort(request.scheme ?? 'http'),
    readParam(params, 'ext') ?? ''
  ]
    .map((part) => `${part}\n`)
    .join('');
};
