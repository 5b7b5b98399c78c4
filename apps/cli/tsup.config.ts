import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  clean: true,
  bundle: true,
  splitting: false,
  treeshake: true,
  // Workspace packages export TypeScript sources, so they are bundled in
  noExternal: [/^@hopline\//],
  banner: {
    js: '#!/usr/bin/env node',
  },
});
