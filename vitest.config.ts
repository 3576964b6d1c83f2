import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@jsonfields/logger/mock': fileURLToPath(new URL('./packages/logger/src/mock.ts', import.meta.url)),
      '@jsonfields/logger': fileURLToPath(new URL('./packages/logger/src/index.ts', import.meta.url)),
      '@jsonfields/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    globals: false,
    silent: true,
    environment: 'node',
    include: ['packages/*/test/**/*.test.ts'],
  },
});
