import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    environment: 'node',
    // Keep module-level pino loggers quiet during test runs
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
