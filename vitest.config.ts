import { defineConfig } from 'vitest/config';

/**
 * Root Vitest configuration.
 *
 * Projects are defined in vitest.workspace.ts; options here apply to the
 * whole run, which is where coverage is collected.
 */
export default defineConfig({
  test: {
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['**/src/**/*.ts'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', '**/__tests__/**'],
      thresholds: {
        statements: 80,
        branches: 75,
        functions: 80,
        lines: 80,
      },
    },
  },
});
