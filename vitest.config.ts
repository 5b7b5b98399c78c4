import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const src = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts', 'tests/**/*.test.ts'],
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
  resolve: {
    alias: {
      '@hopline/types': src('./packages/types/src/index.ts'),
      '@hopline/pool-registry': src('./packages/pool-registry/src/index.ts'),
      '@hopline/route-finder': src('./packages/route-finder/src/index.ts'),
    },
  },
});
