import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
  // Workspace packages export TypeScript sources, so they are bundled in.
  noExternal: [/^@lexicon\//],
  banner: {
    js: '#!/usr/bin/env node',
  },
});
