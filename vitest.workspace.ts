/**
 * Vitest Workspace Configuration
 *
 * Stratifies tests into two categories:
 * - unit: fast, isolated tests (*.unit.test.ts)
 * - integration: tests that drive several packages or touch the file system
 *   (*.integration.test.ts)
 *
 * Usage:
 *   npm test                            # Run everything
 *   npm run test:unit                   # Run only unit tests
 *   npm run test:integration            # Run only integration tests
 */
const packages = ['core', 'config', 'observability', 'query', 'benchmark'];

export default [
  {
    extends: './vitest.shared.ts',
    test: {
      name: 'unit',
      include: packages.map(pkg => `${pkg}/src/__tests__/**/*.unit.test.ts`),
      exclude: ['**/node_modules/**', '**/dist/**'],
    },
  },
  {
    extends: './vitest.shared.ts',
    test: {
      name: 'integration',
      include: packages.map(pkg => `${pkg}/src/__tests__/**/*.integration.test.ts`),
      exclude: ['**/node_modules/**', '**/dist/**'],
      testTimeout: 30000,
    },
  },
];
