import { MalformedHeaderError, type MalformedHeaderReason } from '../errors';
import type { ParsedAuthorization } from '../params';

type State =
  | 'scheme'
  | 'beforeKey'
  | 'key'
  | 'awaitingValue'
  | 'unquotedValue'
  | 'quotedValue'
  | 'escapeInQuotedValue'
  | 'afterValue';

const isWhitespace = (ch: string) => ch === ' ' || ch === '\t';

const fail = (reason: MalformedHeaderReason, position: number) => new MalformedHeaderError(reason, position);

const tokenize = (input: string | null | undefined): ParsedAuthorization => {
  const header = (input ?? '').trim();
  if (!header) {
    throw fail('EMPTY_HEADER', 0);
  }

  const params = new Map<string, string>();
  let state: State = 'scheme';
  let scheme = '';
  let key = '';
  let value = '';

  const commit = (position: number) => {
    if (params.has(key)) {
      throw fail('DUPLICATE_KEY', position);
    }
    params.set(key, value);
  };

  for (let i = 0; i < header.length; i += 1) {
    const ch = header[i];
    switch (state) {
      case 'scheme':
        if (isWhitespace(ch)) {
          state = 'beforeKey';
        } else {
          scheme += ch;
        }
        break;

      case 'beforeKey':
        if (isWhitespace(ch)) break;
        if (ch === ',') throw fail('STRAY_COMMA', i);
        if (ch === '=') throw fail('EMPTY_KEY', i);
        if (ch === '"') throw fail('UNEXPECTED_QUOTE', i);
        key = ch;
        state = 'key';
        break;

      case 'key':
        if (ch === '=') {
          state = 'awaitingValue';
        } else if (isWhitespace(ch) || ch === ',') {
          throw fail('MISSING_EQUALS', i);
        } else if (ch === '"') {
          throw fail('UNEXPECTED_QUOTE', i);
        } else {
          key += ch;
        }
        break;

      case 'awaitingValue':
        if (ch === '"') {
          value = '';
          state = 'quotedValue';
        } else if (isWhitespace(ch) || ch === ',') {
          throw fail('MISSING_VALUE', i);
        } else {
          value = ch;
          state = 'unquotedValue';
        }
        break;

      case 'unquotedValue':
        if (ch === '"') throw fail('UNEXPECTED_QUOTE', i);
        if (ch === ',') {
          commit(i);
          state = 'beforeKey';
        } else if (isWhitespace(ch)) {
          commit(i);
          state = 'afterValue';
        } else {
          value += ch;
        }
        break;

      case 'quotedValue':
        if (ch === '\\') {
          state = 'escapeInQuotedValue';
        } else if (ch === '"') {
          commit(i);
          state = 'afterValue';
        } else {
          value += ch;
        }
        break;

      case 'escapeInQuotedValue':
        value += ch;
        state = 'quotedValue';
        break;

      case 'afterValue':
        if (isWhitespace(ch)) break;
        if (ch === ',') {
          state = 'beforeKey';
          break;
        }
        throw fail(ch === '"' ? 'UNEXPECTED_QUOTE' : 'UNEXPECTED_CHARACTER', i);
    }
  }

  const end = header.length;
  switch (state) {
    case 'scheme':
      throw fail('MISSING_PARAMETERS', end);
    case 'beforeKey':
      // only reachable after a comma: whitespace after the scheme is trimmed away
      throw fail('STRAY_COMMA', end);
    case 'key':
      throw fail('MISSING_EQUALS', end);
    case 'awaitingValue':
      throw fail('MISSING_VALUE', end);
    case 'quotedValue':
    case 'escapeInQuotedValue':
      throw fail('UNTERMINATED_QUOTE', end);
    case 'unquotedValue':
      commit(end);
      break;
    case 'afterValue':
      break;
  }

  return { scheme, params: Object.fromEntries(params) };
};

/**
 * Parses an `Authorization` value of the form `Scheme k1=v1, k2="v2"`.
 *
 * Quoted values may contain commas and backslash escapes. Throws
 * {@link MalformedHeaderError} on bad input, or returns `fallback` when one is given.
 */
export function parseAuthzHeader(value: string | null | undefined): ParsedAuthorization;
export function parseAuthzHeader<T>(value: string | null | undefined, fallback: T): ParsedAuthorization | T;
export function parseAuthzHeader<T>(
  value: string | null | undefined,
  ...fallback: [] | [T]
): ParsedAuthorization | T {
  try {
    return tokenize(value);
  } catch (error) {
    if (fallback.length === 1 && error instanceof MalformedHeaderError) {
      return fallback[0];
    }
    throw error;
  }
}
