import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      STORE_DRIVER: 'memory',
      LOG_LEVEL: 'error',
    },
    testTimeout: 10000,
  },
});
