import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['shared/tests/**/*.test.ts', 'server/tests/**/*.test.ts', 'client/tests/**/*.test.ts'],
    // Test timeout (10 seconds - no individual test should exceed this)
    testTimeout: 10000,
    env: {
      NODE_ENV: 'test',
    },
  },
  resolve: {
    alias: {
      '@shared': fileURLToPath(new URL('./shared/src', import.meta.url)),
    },
  },
});
