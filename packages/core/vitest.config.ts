import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'core',
    globals: true,
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts', 'test/**/*.spec.ts'],
    // fast-check suites
    testTimeout: 10000,
  },
});
