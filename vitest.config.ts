// vitest.config.ts
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/tests/**/*.test.ts'],
    // Statistical convergence suites draw up to a million values
    testTimeout: 60000,
  },
});
