import {
  DEFAULT_HASH_ALGORITHM,
  assertHashAlgorithm,
  computeMac,
  constantTimeEqual,
  type HashAlgorithm,
  type MacKey
} from '@macauth/crypto';
import type { NonceCache } from '@macauth/storage';
import { getNormalizedRequestString } from './canonical';
import { getDefaultNonceCache } from './defaultNonceCache';
import { MacAuthError, ReplayedNonceError, SignatureMismatchError, WrongSchemeError } from './errors';
import { parseAuthzHeader } from './header/parser';
import { logWithContext, redactToken, type SafeLogger } from './logging';
import { MAC_SCHEME, parseTimestamp, requireParam, type ParsedAuthorization } from './params';
import type { MacRequest } from './request/types';

export interface VerifyOptions {
  algorithm?: HashAlgorithm;
  /** Pre-parsed credentials, used instead of the request's `Authorization` header. */
  params?: ParsedAuthorization;
  /** `false` turns off replay protection. Defaults to the process-wide cache. */
  nonceCache?: NonceCache | false;
  logger?: SafeLogger;
}

const check = (
  request: MacRequest,
  key: MacKey,
  algorithm: HashAlgorithm,
  parsed: ParsedAuthorization,
  nonceCache: NonceCache | false
) => {
  if (parsed.scheme !== MAC_SCHEME) {
    throw new WrongSchemeError(parsed.scheme);
  }
  const { params } = parsed;
  const id = requireParam(params, 'id');
  const ts = requireParam(params, 'ts');
  const nonce = requireParam(params, 'nonce');
  const mac = requireParam(params, 'mac');
  const timestamp = parseTimestamp(ts);

  if (nonceCache && !nonceCache.checkNonce(id, timestamp, nonce)) {
    throw new ReplayedNonceError();
  }

  const expected = computeMac(key, getNormalizedRequestString(request, params), algorithm);
  if (!constantTimeEqual(mac, expected)) {
    throw new SignatureMismatchError();
  }
};

/**
 * Checks the MAC credentials on `request` against `key`.
 *
 * Returns `false` for any request that fails authentication: missing or malformed
 * credentials, a replayed nonce, a stale timestamp or a wrong signature. The
 * nonce is recorded before the signature is compared, so a forged request still
 * burns its nonce. Throws only for caller errors such as an unsupported algorithm.
 */
export const verify = (request: MacRequest, key: MacKey, options: VerifyOptions = {}): boolean => {
  const algorithm = options.algorithm ?? DEFAULT_HASH_ALGORITHM;
  assertHashAlgorithm(algorithm);

  try {
    const parsed = options.params ?? parseAuthzHeader(request.authorization);
    check(request, key, algorithm, parsed, options.nonceCache ?? getDefaultNonceCache());
    return true;
  } catch (error) {
    if (!(error instanceof MacAuthError)) {
      throw error;
    }
    logWithContext(options.logger, 'debug', 'mac_auth_rejected', {
      reason: error.code,
      nonce: redactToken(options.params?.params.nonce ?? parseAuthzHeader(request.authorization, null)?.params.nonce)
    });
    return false;
  }
};
