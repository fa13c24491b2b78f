import { defineConfig } from 'vitest/config';

// Single root run covering every workspace package.
export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10_000,
  },
});
