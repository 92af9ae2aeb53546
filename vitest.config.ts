import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    environment: 'node',
    pool: 'threads',
    include: [
      'packages/*/src/**/*.test.ts',
      'host/__tests__/**/*.spec.ts',
      'adapters/**/__tests__/**/*.spec.ts',
      'app/__tests__/**/*.spec.ts',
    ],
  },
  resolve: {
    alias: {
      // resolve the workspace package to its sources, no build step
      '@pattern-demos/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
});
