import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['tests/**/*.test.ts', 'tests/**/*.spec.ts'],
    setupFiles: [],
    testTimeout: 20000,
    coverage: {
      reporter: ['text', 'lcov'],
    },
  },
});
