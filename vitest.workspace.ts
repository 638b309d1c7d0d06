/**
 * Vitest Workspace Configuration
 *
 * Stratifies tests into two categories:
 * - unit: Fast, isolated tests (*.unit.test.ts)
 * - integration: Tests that run several packages together (*.integration.test.ts)
 *
 * Usage:
 *   npm test                     # Run everything
 *   npm run test:unit            # Run only unit tests
 *   npm run test:integration     # Run only integration tests
 */
export default [
  {
    extends: './vitest.shared.ts',
    test: {
      name: 'unit',
      include: [
        'core/src/__tests__/**/*.unit.test.ts',
        'config/src/__tests__/**/*.unit.test.ts',
        'cli/src/__tests__/**/*.unit.test.ts',
      ],
      exclude: ['**/node_modules/**', '**/dist/**'],
    },
  },
  {
    extends: './vitest.shared.ts',
    test: {
      name: 'integration',
      include: [
        'core/src/__tests__/**/*.integration.test.ts',
        'config/src/__tests__/**/*.integration.test.ts',
        'cli/src/__tests__/**/*.integration.test.ts',
      ],
      exclude: ['**/node_modules/**', '**/dist/**'],
      // Integration tests touch the filesystem
      testTimeout: 15000,
    },
  },
];
