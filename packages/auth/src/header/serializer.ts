import { InvalidParameterError } from '../errors';
import type { MacParams } from '../params';

const TOKEN = /^[^\s,="\\]+$/;
const LINE_BREAK = /[\r\n]/;

const quote = (value: string) => `"${value.replace(/[\\"]/g, (ch) => `\\${ch}`)}"`;

/**
 * Writes `Scheme k1="v1", k2="v2"` with every value quoted, in insertion order.
 */
export const serializeAuthzHeader = (scheme: string, params: MacParams): string => {
  if (!TOKEN.test(scheme)) {
    throw new InvalidParameterError(`invalid authorization scheme: ${scheme}`);
  }
  const pairs = Object.entries(params).map(([name, value]) => {
    if (!TOKEN.test(name)) {
      throw new InvalidParameterError(`invalid parameter name: ${name}`);
    }
    if (LINE_BREAK.test(value)) {
      throw new InvalidParameterError(`parameter ${name} contains a line break`);
    }
    return `${name}=${quote(value)}`;
  });
  return `${scheme} ${pairs.join(', ')}`;
};
