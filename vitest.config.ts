import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 15_000,
    env: {
      NODE_ENV: 'production',
      LOG_LEVEL: 'silent',
    },
  },
});
