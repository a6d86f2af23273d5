import {
  DEFAULT_HASH_ALGORITHM,
  computeMac,
  randomNonce,
  type HashAlgorithm,
  type MacKey
} from '@macauth/crypto';
import { getNormalizedRequestString } from './canonical';
import { parseAuthzHeader } from './header/parser';
import { serializeAuthzHeader } from './header/serializer';
import { MAC_SCHEME, readParam, type MacParams, type ParsedAuthorization } from './params';
import type { MacRequest } from './request/types';

export interface SignatureOptions {
  algorithm?: HashAlgorithm;
  /** Used instead of the parameters in the request's `Authorization` header. */
  params?: MacParams;
}

export interface SignOptions extends SignatureOptions {
  now?: () => number;
}

// Always written by the signer, whatever the caller passed.
const SIGNER_OWNED = new Set(['id', 'ts', 'nonce', 'mac']);

const headerParams = (request: MacRequest): MacParams => {
  if (!request.authorization) {
    return {};
  }
  const parsed = parseAuthzHeader(request.authorization);
  return parsed.scheme === MAC_SCHEME ? parsed.params : {};
};

/**
 * Base64 HMAC over the canonical form of `request`. Parameters come from
 * `options.params` or, failing that, from the request's `Authorization` header.
 */
export const getSignature = (request: MacRequest, key: MacKey, options: SignatureOptions = {}): string => {
  const params = options.params ?? parseAuthzHeader(request.authorization).params;
  const normalized = getNormalizedRequestString(request, params);
  return computeMac(key, normalized, options.algorithm ?? DEFAULT_HASH_ALGORITHM);
};

/**
 * Signs `request` as `id` and returns the `Authorization` header value.
 *
 * Existing MAC parameters on the request (or `options.params`) are kept, `ts` and
 * `nonce` are generated when missing, and `id` is always the given identity.
 * Parameters of other schemes are discarded. A malformed existing header throws.
 */
export const sign = (request: MacRequest, id: string, key: MacKey, options: SignOptions = {}): string => {
  const base = options.params ?? headerParams(request);
  const now = options.now ?? Date.now;

  const entries = new Map<string, string>([
    ['id', id],
    ['ts', readParam(base, 'ts') ?? String(Math.floor(now() / 1000))],
    ['nonce', readParam(base, 'nonce') ?? randomNonce()]
  ]);
  for (const [name, value] of Object.entries(base)) {
    if (!SIGNER_OWNED.has(name)) {
      entries.set(name, value);
    }
  }

  const mac = getSignature(request, key, {
    algorithm: options.algorithm,
    params: Object.fromEntries(entries)
  });
  entries.set('mac', mac);
  return serializeAuthzHeader(MAC_SCHEME, Object.fromEntries(entries));
};

/** Like {@link sign}, and also sets `request.authorization`. */
export const signRequest = (request: MacRequest, id: string, key: MacKey, options: SignOptions = {}): string => {
  const authorization = sign(request, id, key, options);
  request.authorization = authorization;
  return authorization;
};

/**
 * The identity a request claims, without checking its signature. `null` when the
 * request carries no parseable MAC credentials with an `id`.
 */
export const getId = (request: MacRequest, params?: ParsedAuthorization): string | null => {
  const parsed = params ?? parseAuthzHeader(request.authorization, null);
  if (!parsed || parsed.scheme !== MAC_SCHEME) {
    return null;
  }
  return readParam(parsed.params, 'id') ?? null;
};
