import { describe, expect, it } from 'vitest';
import { randomNonce } from '../src/random';

describe('randomNonce', () => {
  it('returns two hex characters per byte', () => {
    expect(randomNonce()).toMatch(/^[0-9a-f]{10}$/);
    expect(randomNonce(8)).toMatch(/^[0-9a-f]{16}$/);
  });

  it('does not repeat across calls', () => {
    const seen = new Set(Array.from({ length: 50 }, () => randomNonce(16)));
    expect(seen.size).toBe(50);
  });

  it('rejects non-positive lengths', () => {
    expect(() => randomNonce(0)).toThrow(RangeError);
    expect(() => randomNonce(1.5)).toThrow('nonce length must be a positive integer');
  });
});
