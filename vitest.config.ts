import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@lexicon/types': path.resolve(root, 'packages/types/src/index.ts'),
      '@lexicon/core': path.resolve(root, 'packages/core/src/index.ts'),
      '@lexicon/loader': path.resolve(root, 'packages/loader/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.test.ts',
        'packages/*/src/**/index.ts',
        'packages/*/src/test-helpers.ts',
      ],
    },
  },
});
