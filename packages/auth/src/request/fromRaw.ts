import { InvalidParameterError } from '../errors';
import type { MacRequest } from './types';

const REQUEST_LINE = /^([!#$%&'*+.^_`|~0-9A-Za-z-]+)\s+(\S+)\s+HTTP\/\d(?:\.\d)?$/;
const ABSOLUTE_FORM = /^([A-Za-z][A-Za-z0-9+.-]*):\/\/([^/?#]*)(.*)$/;

const readHeaders = (lines: string[]) => {
  const headers = new Map<string, string>();
  let previous: string | undefined;
  for (const line of lines) {
    if (/^[ \t]/.test(line) && previous) {
      // obsolete line folding
      headers.set(previous, `${headers.get(previous) ?? ''} ${line.trim()}`);
      continue;
    }
    const colon = line.indexOf(':');
    if (colon <= 0) {
      throw new InvalidParameterError(`malformed header line: ${line}`);
    }
    previous = line.slice(0, colon).trim().toLowerCase();
    const value = line.slice(colon + 1).trim();
    const existing = headers.get(previous);
    headers.set(previous, existing === undefined ? value : `${existing}, ${value}`);
  }
  return headers;
};

/**
 * Reads the request line and headers of an HTTP/1.x request. The body, if any, is ignored.
 */
export const requestFromRaw = (raw: string | Uint8Array, scheme = 'http'): MacRequest => {
  const text = typeof raw === 'string' ? raw : Buffer.from(raw).toString('utf8');
  const headEnd = text.search(/\r?\n\r?\n/);
  const head = headEnd === -1 ? text : text.slice(0, headEnd);
  const [requestLine = '', ...headerLines] = head.split(/\r?\n/);

  const match = REQUEST_LINE.exec(requestLine.trim());
  if (!match) {
    throw new InvalidParameterError('malformed request line');
  }
  const [, method, target] = match;
  const headers = readHeaders(headerLines.filter((line) => line.length > 0));

  const absolute = ABSOLUTE_FORM.exec(target);
  if (absolute) {
    const [, targetScheme, authority, rest] = absolute;
    return {
      method,
      url: rest.startsWith('/') ? rest.split('#')[0] : `/${rest.split('#')[0]}`,
      host: authority,
      scheme: targetScheme.toLowerCase(),
      authorization: headers.get('authorization')
    };
  }

  const host = headers.get('host');
  if (!host) {
    throw new InvalidParameterError('missing host header');
  }
  return { method, url: target, host, scheme, authorization: headers.get('authorization') };
};
