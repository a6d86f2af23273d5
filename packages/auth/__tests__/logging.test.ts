import { describe, expect, it, vi } from 'vitest';
import { createLogger, hashToken, logWithContext, redactToken, sanitizeError } from '../src/logging';

const capture = () => {
  const lines: string[] = [];
  return { lines, stream: { write: (line: string) => void lines.push(line) } };
};

describe('createLogger', () => {
  it('redacts keys, macs and authorization headers', () => {
    const { lines, stream } = capture();
    const logger = createLogger({ level: 'info' }, stream);

    logger.info({ id: 'myid', key: 'test-secret', mac: 'abc=', headers: { authorization: 'MAC id="myid"' } }, 'signed');

    const entry: Record<string, unknown> = JSON.parse(lines[0]);
    expect(entry).toMatchObject({
      msg: 'signed',
      name: 'macauth',
      id: 'myid',
      key: '[Redacted]',
      mac: '[Redacted]',
      headers: { authorization: '[Redacted]' }
    });
  });

  it('honours the level', () => {
    const { lines, stream } = capture();
    createLogger({ level: 'warn' }, stream).info('quiet');
    expect(lines).toHaveLength(0);
  });
});

describe('log helpers', () => {
  it('hashes tokens to a short stable prefix', () => {
    expect(hashToken('n-0001')).toHaveLength(8);
    expect(hashToken('n-0001')).toBe(hashToken('n-0001'));
    expect(redactToken('n-0001')).toBe(`***${hashToken('n-0001')}`);
    expect(redactToken('')).toBeUndefined();
    expect(redactToken(null)).toBeUndefined();
  });

  it('skips loggers without the requested level', () => {
    const warn = vi.fn();
    logWithContext({ warn }, 'debug', 'ignored');
    logWithContext(undefined, 'warn', 'ignored');
    logWithContext({ warn }, 'warn', 'plain');
    logWithContext({ warn }, 'warn', 'with context', { id: 'x' });

    expect(warn.mock.calls).toEqual([['plain'], [{ id: 'x' }, 'with context']]);
  });

  it('reduces errors to name and message', () => {
    expect(sanitizeError(new RangeError('bad'))).toEqual({ name: 'RangeError', message: 'bad' });
    expect(sanitizeError('text')).toEqual({ message: 'text' });
    expect(sanitizeError(42)).toEqual({ message: 'unknown' });
  });
});
