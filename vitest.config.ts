import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for ui-audit
 *
 * Unit tests live beside the sources in __tests__ directories; end-to-end
 * runs of the bundled corpus live under test/ as *.system.test.ts.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', 'vitest.config.ts'],
    },
  },
});
