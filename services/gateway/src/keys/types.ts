import type { MacKey } from '@macauth/crypto';

/** Looks up the shared secret of a MAC identity; `null` when the identity is unknown. */
export interface KeyResolver {
  resolve(id: string): Promise<MacKey | null>;
}
