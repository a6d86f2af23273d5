export * from './errors';
export { MAC_SCHEME, parseTimestamp, readParam, requireParam } from './params';
export type { MacParams, ParsedAuthorization } from './params';
export { parseAuthzHeader } from './header/parser';
export { serializeAuthzHeader } from './header/serializer';
export { defaultPort, getNormalizedRequestString, splitHost } from './canonical';
export type { HostAndPort } from './canonical';
export * from './request';
export { getId, getSignature, sign, signRequest } from './signer';
export type { SignOptions, SignatureOptions } from './signer';
export { verify } from './verifier';
export type { VerifyOptions } from './verifier';
export { getDefaultNonceCache, resetDefaultNonceCache } from './defaultNonceCache';
export { createLogger, hashToken, logWithContext, redactToken, sanitizeError } from './logging';
export type { SafeLogger } from './logging';
