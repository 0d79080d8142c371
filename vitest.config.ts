import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@src': path.resolve(__dirname, 'backend/src'),
    },
  },
  test: {
    include: ['backend/src/**/*.test.ts'],
    environment: 'node',
    env: {
      JET_LOGGER_MODE: 'OFF',
      NODE_ENV: 'test',
    },
    testTimeout: 10000,
  },
});
