import { randomBytes } from 'node:crypto';

export const DEFAULT_NONCE_BYTES = 5;

export const randomNonce = (length: number = DEFAULT_NONCE_BYTES) => {
  if (!Number.isInteger(length) || length < 1) {
    throw new RangeError('nonce length must be a positive integer');
  }
  return randomBytes(length).toString('hex');
};
