import { InvalidParameterError, MissingParameterError } from './errors';

export const MAC_SCHEME = 'MAC';

export type MacParams = Record<string, string>;

export interface ParsedAuthorization {
  scheme: string;
  params: MacParams;
}

const hasOwn = (params: MacParams, name: string) => Object.prototype.hasOwnProperty.call(params, name);

export const readParam = (params: MacParams, name: string): string | undefined =>
  hasOwn(params, name) ? params[name] : undefined;

export const requireParam = (params: MacParams, name: string): string => {
  const value = readParam(params, name);
  if (value === undefined) {
    throw new MissingParameterError(name);
  }
  return value;
};

const INTEGER = /^[+-]?\d+$/;

export const parseTimestamp = (raw: string): number => {
  const value = INTEGER.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
  if (!Number.isSafeInteger(value)) {
    throw new InvalidParameterError(`ts is not an integer: ${raw}`);
  }
  return value;
};
