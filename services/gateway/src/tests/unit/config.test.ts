import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig, resetConfig } from '../../config';

describe('gateway config loader', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.MAC_KEYS;
    delete process.env.HTTP_PORT;
    delete process.env.HTTP_HOST;
    delete process.env.MAC_HASH_ALGORITHM;
    resetConfig();
  });

  afterEach(() => {
    process.env = originalEnv;
    resetConfig();
  });

  it('loads defaults when env not set', () => {
    const config = loadConfig();
    expect(config.HTTP_PORT).toBe(3000);
    expect(config.HTTP_HOST).toBe('0.0.0.0');
    expect(config.MAC_HASH_ALGORITHM).toBe('sha1');
    expect(config.MAC_KEYS.size).toBe(0);
  });

  it('parses identities and their secrets', () => {
    process.env.MAC_KEYS = 'alice:test-secret, bob:other:secret ,';
    process.env.HTTP_PORT = '8080';
    const config = loadConfig();
    expect([...config.MAC_KEYS]).toEqual([
      ['alice', 'test-secret'],
      ['bob', 'other:secret']
    ]);
    expect(config.HTTP_PORT).toBe(8080);
  });

  it('caches the parsed config', () => {
    const first = loadConfig();
    process.env.HTTP_PORT = '9000';
    expect(loadConfig()).toBe(first);
  });

  it('rejects entries without a secret', () => {
    process.env.MAC_KEYS = 'alice:test-secret,bob';
    expect(() => loadConfig()).toThrow('MAC_KEYS entries must look like id:secret');
  });

  it('rejects repeated identities', () => {
    process.env.MAC_KEYS = 'alice:one,alice:two';
    expect(() => loadConfig()).toThrow('MAC_KEYS lists alice more than once');
  });

  it('rejects unsupported hash algorithms', () => {
    process.env.MAC_HASH_ALGORITHM = 'md5';
    expect(() => loadConfig()).toThrow();
  });
});
