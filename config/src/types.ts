/**
 * @shardflow/config - Type Definitions
 *
 * Configuration schema shared by the partitioner, scheduler and benchmark.
 *
 * Naming Conventions:
 * - Durations: *Ms (milliseconds)
 * - Counts and sizes: *Size, *Records, concurrency
 *
 * @packageDocumentation
 * @module @shardflow/config
 */

import type { LogLevel } from '@shardflow/core';

// =============================================================================
// Sections
// =============================================================================

/**
 * Partitioning configuration.
 *
 * @example
 * ```typescript
 * const partition: PartitionConfig = { targetPartitionSize: 50_000 };
 * ```
 */
export interface PartitionConfig {
  /** Maximum records per partition; also the read-ahead bound */
  readonly targetPartitionSize: number;
}

/**
 * Worker pool configuration.
 */
export interface SchedulerConfig {
  /** Number of partition tasks allowed in flight at once (1 = sequential baseline) */
  readonly concurrency: number;

  /** Records a task processes before yielding to the event loop */
  readonly yieldEveryRecords: number;
}

/**
 * Log output format.
 */
export type LogFormat = 'json' | 'pretty';

/**
 * Observability configuration.
 */
export interface ObservabilityConfig {
  /** Minimum log level */
  readonly logLevel: LogLevel;

  /** Log output format */
  readonly logFormat: LogFormat;

  /** Record scheduler metrics into a registry */
  readonly metricsEnabled: boolean;
}

/**
 * Complete shardflow configuration.
 */
export interface ShardflowConfig {
  readonly partition: PartitionConfig;
  readonly scheduler: SchedulerConfig;
  readonly observability: ObservabilityConfig;
}

/**
 * Partial overrides accepted by createConfig() and mergeConfigs().
 * Every field of every section is optional.
 */
export type ConfigOverrides = {
  [Section in keyof ShardflowConfig]?: Partial<ShardflowConfig[Section]>;
};

// =============================================================================
// Validation Types
// =============================================================================

/**
 * Validation error details.
 */
export interface ValidationError {
  /** Path to the invalid field (e.g., 'scheduler.concurrency') */
  path: string;

  message: string;

  /** The invalid value */
  value: unknown;

  suggestion?: string;
}

/**
 * Validation warning details.
 */
export interface ValidationWarning {
  path: string;
  message: string;
  value: unknown;
  recommendation?: string;
}

/**
 * Configuration validation result.
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

// =============================================================================
// Environment Configuration Types
// =============================================================================

/**
 * Options for loading configuration from environment variables.
 */
export interface EnvConfigOptions {
  /** Environment variable prefix (default: 'SHARDFLOW') */
  prefix?: string;

  /** Custom environment object (default: process.env) */
  env?: Record<string, string | undefined>;
}
