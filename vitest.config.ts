import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    pool: 'forks',
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    testTimeout: 10000
  }
});
