import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['engine/src/**/*.test.ts', 'cli/src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
  },
});
