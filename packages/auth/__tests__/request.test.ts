import { IncomingMessage } from 'node:http';
import { Socket } from 'node:net';
import { describe, expect, it } from 'vitest';
import { InvalidParameterError } from '../src/errors';
import { findHeader, requestFromIncomingMessage, requestFromRaw, requestFromUrl } from '../src/request';
import { getSignature } from '../src/signer';

describe('requestFromRaw', () => {
  it('reads the request line and headers', () => {
    const request = requestFromRaw(
      'POST /resource/1?b=1&a=2 HTTP/1.1\r\n' +
        'Host: example.com\r\n' +
        'Content-Length: 11\r\n' +
        'Authorization: MAC id="h480djs93hd8"\r\n' +
        '\r\n' +
        'hello world'
    );
    expect(request).toEqual({
      method: 'POST',
      url: '/resource/1?b=1&a=2',
      host: 'example.com',
      scheme: 'http',
      authorization: 'MAC id="h480djs93hd8"'
    });
  });

  it('accepts buffers, bare newlines and a scheme', () => {
    const request = requestFromRaw(Buffer.from('GET / HTTP/1.0\nhost: example.com\n\n'), 'https');
    expect(request).toEqual({ method: 'GET', url: '/', host: 'example.com', scheme: 'https', authorization: undefined });
  });

  it('decodes buffers as UTF-8 so they sign like the same request text', () => {
    const text = 'GET /caf\u00e9?q=\u00fc HTTP/1.1\r\nHost: example.com\r\nAuthorization: MAC ext="\u00e9t\u00e9"\r\n\r\n';
    const fromText = requestFromRaw(text);
    const fromBuffer = requestFromRaw(Buffer.from(text, 'utf8'));
    const params = { ts: '1', nonce: '2' };

    expect(fromBuffer).toEqual(fromText);
    expect(fromBuffer.url).toBe('/caf\u00e9?q=\u00fc');
    expect(getSignature(fromBuffer, 'test-secret', { params })).toBe(getSignature(fromText, 'test-secret', { params }));
  });

  it('takes scheme and host from an absolute-form target', () => {
    const request = requestFromRaw('GET https://example.com:8443/a?b=1#frag HTTP/1.1\r\n\r\n');
    expect(request.url).toBe('/a?b=1');
    expect(request.host).toBe('example.com:8443');
    expect(request.scheme).toBe('https');
  });

  it('unfolds continuation lines', () => {
    const request = requestFromRaw(
      'GET / HTTP/1.1\r\nHost: example.com\r\nAuthorization: MAC id="a",\r\n  ts="1"\r\n\r\n'
    );
    expect(request.authorization).toBe('MAC id="a", ts="1"');
  });

  it('rejects malformed requests', () => {
    expect(() => requestFromRaw('nonsense\r\n\r\n')).toThrow('malformed request line');
    expect(() => requestFromRaw('GET / HTTP/1.1\r\n\r\n')).toThrow('missing host header');
    expect(() => requestFromRaw('GET / HTTP/1.1\r\nno colon here\r\n\r\n')).toThrow(InvalidParameterError);
  });
});

describe('requestFromUrl', () => {
  it('splits a URL into request parts', () => {
    const request = requestFromUrl('POST', 'https://Example.com/path?q=1', { Authorization: 'MAC id="x"' });
    expect(request).toEqual({
      method: 'POST',
      url: '/path?q=1',
      host: 'example.com',
      scheme: 'https',
      authorization: 'MAC id="x"'
    });
  });

  it('keeps a non-default port in the host', () => {
    expect(requestFromUrl('GET', new URL('http://localhost:3000/')).host).toBe('localhost:3000');
  });
});

describe('findHeader', () => {
  it('matches names case-insensitively and joins repeated values', () => {
    expect(findHeader({ 'X-Test': ['a', 'b'] }, 'x-test')).toBe('a, b');
    expect(findHeader({ other: 'x' }, 'authorization')).toBeUndefined();
    expect(findHeader(undefined, 'authorization')).toBeUndefined();
  });
});

describe('requestFromIncomingMessage', () => {
  const message = (headers: IncomingMessage['headers']) => {
    const incoming = new IncomingMessage(new Socket());
    incoming.method = 'PUT';
    incoming.url = '/items/7?draft=1';
    incoming.headers = headers;
    return incoming;
  };

  it('reads a plain http request', () => {
    const request = requestFromIncomingMessage(message({ host: 'example.com', authorization: 'MAC id="x"' }));
    expect(request).toEqual({
      method: 'PUT',
      url: '/items/7?draft=1',
      host: 'example.com',
      scheme: 'http',
      authorization: 'MAC id="x"'
    });
  });

  it('lets the caller override the scheme', () => {
    expect(requestFromIncomingMessage(message({ host: 'example.com' }), 'https').scheme).toBe('https');
  });

  it('requires a host header', () => {
    expect(() => requestFromIncomingMessage(message({}))).toThrow('missing host header');
  });
});
