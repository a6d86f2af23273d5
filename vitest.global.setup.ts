import { afterEach, vi } from 'vitest';

process.env.LOG_LEVEL ??= 'silent';

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});
