import type { MacKey } from '@macauth/crypto';
import type { KeyResolver } from './types';

export class InMemoryKeyResolver implements KeyResolver {
  private readonly keys: Map<string, MacKey>;

  constructor(keys: Iterable<readonly [string, MacKey]> = []) {
    this.keys = new Map(keys);
  }

  async resolve(id: string): Promise<MacKey | null> {
    return this.keys.get(id) ?? null;
  }

  set(id: string, key: MacKey) {
    this.keys.set(id, key);
  }

  delete(id: string) {
    return this.keys.delete(id);
  }
}
