import type { MacRequest } from './types';

export type HeaderBag = Record<string, string | string[] | undefined>;

export const findHeader = (headers: HeaderBag | undefined, name: string): string | undefined => {
  if (!headers) return undefined;
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return Array.isArray(value) ? value.join(', ') : value;
    }
  }
  return undefined;
};

/** For outgoing requests built from a full URL. */
export const requestFromUrl = (method: string, url: string | URL, headers?: HeaderBag): MacRequest => {
  const parsed = typeof url === 'string' ? new URL(url) : url;
  return {
    method,
    url: `${parsed.pathname}${parsed.search}`,
    host: parsed.host,
    scheme: parsed.protocol.replace(/:$/, ''),
    authorization: findHeader(headers, 'authorization')
  };
};
