import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration for mixgraph
 *
 * Every query is synchronous and in-process, so one pool of forks with the
 * default worker count is enough. Logs stay silent unless
 * MIXGRAPH_LOG_LEVEL is set (see vitest.setup.ts).
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    setupFiles: ['./vitest.setup.ts'],
    pool: 'forks',
    testTimeout: 30000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', 'vitest.config.ts', 'vitest.setup.ts'],
    },
  },
});
