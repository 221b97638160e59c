import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    conditions: ['source'],
  },
  test: {
    include: ['engine/src/**/__tests__/**/*.test.ts', 'cli/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
