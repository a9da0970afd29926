import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@tracksync/contracts': path.resolve(rootDir, 'packages/contracts/src/index.ts'),
      '@tracksync/interop': path.resolve(rootDir, 'packages/interop/src/index.ts'),
      '@tracksync/providers-core': path.resolve(rootDir, 'packages/providers/core/src/index.ts'),
      '@tracksync/providers-spotify': path.resolve(rootDir, 'packages/providers/spotify/src/index.ts'),
    },
  },
  test: {
    include: ['packages/**/test/**/*.test.ts', 'apps/**/src/**/__tests__/**/*.test.ts'],
    testTimeout: 30000,
    pool: 'threads',
    server: {
      deps: {
        inline: ['@tracksync/contracts', 'nanoid', 'lru-cache'],
      },
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['apps/*/src/**', 'packages/*/src/**', 'packages/providers/*/src/**'],
      exclude: ['**/__tests__/**', '**/test/**', '**/*.test.ts', '**/node_modules/**', '**/dist/**'],
      thresholds: {
        lines: 70,
        functions: 70,
        branches: 70,
        statements: 70,
      },
      all: false, // Only report coverage for tested files
    },
  },
});
