import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    testTimeout: 30000, // RSA key generation
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@jwscheck/core': fileURLToPath(new URL('./packages/jws-core/src/index.ts', import.meta.url)),
    },
  },
});
