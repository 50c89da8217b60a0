/**
 * @shardflow/benchmark
 *
 * Synthetic transaction data and a harness that compares parallel runs of
 * an operation graph against the sequential baseline.
 *
 * @example
 * ```typescript
 * import { generateTransactions, createSalesByRegionGraph, runComparison, formatComparison } from '@shardflow/benchmark';
 *
 * const comparison = await runComparison({
 *   records: [...generateTransactions({ count: 100_000, seed: 7 })],
 *   graph: createSalesByRegionGraph(),
 *   targetPartitionSize: 10_000,
 *   concurrencyLevels: [2, 4, 8],
 * });
 * console.log(formatComparison(comparison, 'pretty'));
 * ```
 */

export { SeededRandom, createRandom } from './utils/random.js';

export {
  TRANSACTION_SCHEMA,
  DEFAULT_REGIONS,
  DEFAULT_CATEGORIES,
  generateTransactions,
  type TransactionGeneratorOptions,
} from './generators/transactions.js';

export {
  BENCHMARK_GRAPHS,
  createSalesByRegionGraph,
  createCentsByRegionGraph,
  isBenchmarkGraphName,
  type BenchmarkGraphName,
} from './graphs.js';

export {
  runComparison,
  formatComparison,
  type ComparisonOptions,
  type ComparisonEntry,
  type ComparisonResult,
  type ComparisonFormat,
} from './comparison.js';

export { createProgram, type CliIo } from './cli.js';
