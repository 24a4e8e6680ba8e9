import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['node/*/test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20_000,
  },
});
