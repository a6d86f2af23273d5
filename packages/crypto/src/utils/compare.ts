import { timingSafeEqual } from 'node:crypto';

/**
 * Compares two strings in time that depends only on the length of `expected`.
 */
export const constantTimeEqual = (provided: string, expected: string) => {
  const expectedBytes = Buffer.from(expected, 'utf8');
  const providedBytes = Buffer.from(provided, 'utf8');
  if (providedBytes.length !== expectedBytes.length) {
    // keep the work proportional to the expected value
    timingSafeEqual(expectedBytes, expectedBytes);
    return false;
  }
  return timingSafeEqual(providedBytes, expectedBytes);
};
