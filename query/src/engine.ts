/**
 * @shardflow/query - Engine
 *
 * Binds one configuration to the partitioner and the scheduler: the
 * configured partition size and concurrency, a logger in the configured
 * level and format, and a metrics collection when metrics are enabled.
 *
 * @example
 * ```typescript
 * import { createConfig } from '@shardflow/config';
 * import { createEngine, OperationGraph } from '@shardflow/query';
 *
 * const engine = createEngine({ config: createConfig({ scheduler: { concurrency: 8 } }) });
 * const { result, report } = await engine.run(graph, readNdjsonRecords('orders.ndjson', schema));
 * ```
 */

import { DEFAULT_CONFIG, assertValidConfig, type ShardflowConfig } from '@shardflow/config';
import {
  createConsoleLogger,
  partitionAsync,
  withContext,
  type ExecutionObserver,
  type Logger,
  type Partition,
  type RecordSource,
  type SchedulerMetricsCollection,
} from '@shardflow/core';
import { SchedulerMetrics } from '@shardflow/observability';
import type { OperationGraph } from './graph.js';
import { run } from './scheduler.js';
import type { RunResult } from './types.js';

export interface EngineOptions {
  /** Defaults to DEFAULT_CONFIG */
  config?: ShardflowConfig;
  /** Replaces the console logger built from the observability config */
  logger?: Logger;
  /** Replaces the collection created when metrics are enabled */
  metrics?: SchedulerMetricsCollection;
}

/**
 * Per-call overrides of the engine's configuration
 */
export interface EngineRunOptions {
  concurrency?: number;
  signal?: AbortSignal;
  observers?: readonly ExecutionObserver[];
}

export interface Engine {
  readonly config: ShardflowConfig;
  readonly logger: Logger;
  /** Present when metrics are enabled or a collection was given */
  readonly metrics?: SchedulerMetricsCollection;

  /** Partition a record source at the configured size */
  partition(records: RecordSource): AsyncGenerator<Partition>;

  /** Partition `records` and run `graph` over them */
  run(graph: OperationGraph, records: RecordSource, options?: EngineRunOptions): Promise<RunResult>;

  /** Run `graph` over partitions produced elsewhere */
  runPartitions(
    graph: OperationGraph,
    partitions: Iterable<Partition> | AsyncIterable<Partition>,
    options?: EngineRunOptions
  ): Promise<RunResult>;
}

/**
 * Create an engine.
 *
 * @throws InvalidConfigurationError when the configuration does not validate
 */
export function createEngine(options: EngineOptions = {}): Engine {
  const config = options.config ?? DEFAULT_CONFIG;
  assertValidConfig(config);

  const logger = withContext(
    options.logger ??
      createConsoleLogger({ minLevel: config.observability.logLevel, format: config.observability.logFormat }),
    { service: 'shardflow' }
  );
  const metrics = options.metrics ?? (config.observability.metricsEnabled ? SchedulerMetrics.create() : undefined);

  const runPartitions = (
    graph: OperationGraph,
    partitions: Iterable<Partition> | AsyncIterable<Partition>,
    runOptions: EngineRunOptions = {}
  ): Promise<RunResult> =>
    run(graph, partitions, {
      concurrency: runOptions.concurrency ?? config.scheduler.concurrency,
      yieldEveryRecords: config.scheduler.yieldEveryRecords,
      logger,
      metrics,
      signal: runOptions.signal,
      observers: runOptions.observers,
    });

  const partition = (records: RecordSource): AsyncGenerator<Partition> =>
    partitionAsync(records, config.partition.targetPartitionSize);

  return {
    config,
    logger,
    metrics,
    partition,
    run: (graph, records, runOptions) => runPartitions(graph, partition(records), runOptions),
    runPartitions,
  };
}
