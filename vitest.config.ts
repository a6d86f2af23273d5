import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import path from 'node:path';

const rootDir = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@macauth/config': path.resolve(rootDir, 'packages/config/src/index.ts'),
      '@macauth/crypto': path.resolve(rootDir, 'packages/crypto/src/index.ts'),
      '@macauth/storage': path.resolve(rootDir, 'packages/storage/src/index.ts'),
      '@macauth/auth': path.resolve(rootDir, 'packages/auth/src/index.ts')
    }
  },
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    isolate: true,
    setupFiles: ['./vitest.global.setup.ts'],
    testTimeout: 15_000,
    hookTimeout: 30_000,
    projects: [
      {
        extends: true,
        test: {
          name: 'unit',
          include: [
            'packages/**/__tests__/**/*.test.ts',
            'services/**/src/tests/unit/**/*.test.ts'
          ],
          exclude: ['**/node_modules/**', '**/dist/**']
        }
      }
    ]
  }
});
