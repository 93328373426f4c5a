import { defineConfig } from 'vitest/config';

/**
 * Workspace test configuration. Each package under packages/ is a project
 * with its own include patterns; options here apply to all of them.
 */

// Windows uses threads, Unix-like systems use forks
const pool = process.platform === 'win32' ? 'threads' : 'forks';

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',
    pool,
    retry: 0,
    fileParallelism: !isCI,

    // property-based suites run a few hundred cases each
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/__tests__/**', 'packages/*/src/**/*.test.ts'],
    },

    projects: ['packages/*'],
  },
});
