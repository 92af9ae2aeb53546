import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    environment: 'node',
    pool: 'threads',
    include: ['src/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@pattern-demos/core': fileURLToPath(new URL('./src/index.ts', import.meta.url)),
    },
  },
});
