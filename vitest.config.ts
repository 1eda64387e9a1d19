import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: [
      'packages/*/tests/**/*.test.ts',
      'packages/api/server/**/*.test.ts',
    ],
    environment: 'node',
    testTimeout: 15_000,
  },
});
