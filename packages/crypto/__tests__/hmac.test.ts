import { describe, expect, it } from 'vitest';
import { assertHashAlgorithm, computeMac, isHashAlgorithm } from '../src/hmac';
import { UnsupportedAlgorithmError } from '../src/errors';

const message = '1\n2\nGET\n/\nexample.com\n80\n\n';

describe('computeMac', () => {
  it('defaults to HMAC-SHA1', () => {
    expect(computeMac('test-secret', message)).toBe('jHGMbOwaWo9f/xZ3eqEew3LgJEI=');
  });

  it('supports the sha2 family', () => {
    expect(computeMac('test-secret', message, 'sha256')).toBe('2Tj3az+ITsPnkWoeQp5BbFjOkennmQR5e+zAqKoE6kU=');
    expect(computeMac('test-secret', message, 'sha512')).toBe(
      'v06Lo1K5cRGfDF/eKi5AViGFqVg0W3bdTEFw0p0lZ535GRREF8BiEaDcOaiP/RqsLuvLs9UtkDA+wI5b0f45/A=='
    );
  });

  it('encodes key and message as UTF-8', () => {
    expect(computeMac('clé', 'héllo')).toBe('MmdQ/+Pjhx6f+RBFZvr9dkv4zqs=');
  });

  it('accepts binary keys', () => {
    const key = new TextEncoder().encode('test-secret');
    expect(computeMac(key, message)).toBe(computeMac('test-secret', message));
  });
});

describe('hash algorithm guard', () => {
  it('recognises supported names', () => {
    expect(isHashAlgorithm('sha384')).toBe(true);
    expect(isHashAlgorithm('md5')).toBe(false);
    expect(isHashAlgorithm(undefined)).toBe(false);
  });

  it('throws UnsupportedAlgorithmError for anything else', () => {
    expect(() => assertHashAlgorithm('md5')).toThrow(UnsupportedAlgorithmError);
    expect(() => assertHashAlgorithm('md5')).toThrow('unsupported hash algorithm: md5');
  });
});
