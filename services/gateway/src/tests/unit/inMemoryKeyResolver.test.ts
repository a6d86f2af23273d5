import { describe, expect, it } from 'vitest';
import { InMemoryKeyResolver } from '../../keys/inMemoryKeyResolver';

describe('InMemoryKeyResolver', () => {
  it('resolves known identities and returns null otherwise', async () => {
    const resolver = new InMemoryKeyResolver(new Map([['alice', 'test-secret']]));
    await expect(resolver.resolve('alice')).resolves.toBe('test-secret');
    await expect(resolver.resolve('mallory')).resolves.toBeNull();
  });

  it('supports adding and removing keys', async () => {
    const resolver = new InMemoryKeyResolver();
    resolver.set('bob', Buffer.from('binary-secret'));
    await expect(resolver.resolve('bob')).resolves.toEqual(Buffer.from('binary-secret'));
    expect(resolver.delete('bob')).toBe(true);
    await expect(resolver.resolve('bob')).resolves.toBeNull();
  });
});
