import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      THREADSCAN_LOG_LEVEL: 'silent',
      THREADSCAN_LOG_FORMAT: 'json',
    },
  },
});
