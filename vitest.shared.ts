import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

/**
 * Shared Vitest Configuration
 *
 * Extended by every project in vitest.workspace.ts. Workspace packages are
 * aliased straight to their TypeScript sources so tests never need a build.
 */
const packageEntry = (name: string): string =>
  fileURLToPath(new URL(`./${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@shardflow/core': packageEntry('core'),
      '@shardflow/config': packageEntry('config'),
      '@shardflow/observability': packageEntry('observability'),
      '@shardflow/query': packageEntry('query'),
      '@shardflow/benchmark': packageEntry('benchmark'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    // Timing assertions compare runs, keep files from competing for the CPU
    fileParallelism: false,
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['*/src/**/*.ts'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', '**/__tests__/**'],
      thresholds: {
        statements: 80,
        branches: 70,
        functions: 80,
        lines: 80,
      },
    },
  },
});
