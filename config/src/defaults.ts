/**
 * @shardflow/config - Default Configuration Values
 *
 * @packageDocumentation
 */

import type { ShardflowConfig } from './types.js';

/**
 * Default partitioning configuration.
 */
const DEFAULT_PARTITION_CONFIG = {
  targetPartitionSize: 10_000,
} as const;

/**
 * Default scheduler configuration.
 */
const DEFAULT_SCHEDULER_CONFIG = {
  concurrency: 4,
  yieldEveryRecords: 1_000,
} as const;

/**
 * Default observability configuration.
 */
const DEFAULT_OBSERVABILITY_CONFIG = {
  logLevel: 'info' as const,
  logFormat: 'json' as const,
  metricsEnabled: false,
} as const;

/**
 * Default configuration.
 *
 * @example
 * ```typescript
 * import { DEFAULT_CONFIG, createConfig } from '@shardflow/config';
 *
 * console.log(DEFAULT_CONFIG.scheduler.concurrency); // 4
 *
 * const config = createConfig({
 *   scheduler: { concurrency: 8 },
 * });
 * ```
 */
export const DEFAULT_CONFIG: ShardflowConfig = Object.freeze({
  partition: Object.freeze(DEFAULT_PARTITION_CONFIG),
  scheduler: Object.freeze(DEFAULT_SCHEDULER_CONFIG),
  observability: Object.freeze(DEFAULT_OBSERVABILITY_CONFIG),
});
