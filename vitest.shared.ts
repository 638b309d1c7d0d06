import { defineConfig } from 'vitest/config';

/**
 * Shared Vitest Configuration
 *
 * This configuration is extended by all projects in vitest.workspace.ts.
 * Workspace packages export their TypeScript sources, so tests run
 * against src without a build.
 */
export default defineConfig({
  test: {
    environment: 'node',
    pool: 'forks',
  },
});
