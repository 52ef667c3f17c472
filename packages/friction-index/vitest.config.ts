import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'friction-index',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 30000,
    pool: 'forks',
    globals: true,
    env: {
      LOG_LEVEL: 'error',
    },
  },
});
