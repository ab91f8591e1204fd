import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/test/**/*.test.ts', 'server/tests/**/*.test.ts'],
    testTimeout: 10_000,
  },
});
