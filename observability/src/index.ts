/**
 * @shardflow/observability
 *
 * Metrics registry with Prometheus export, and the Execution Monitor that
 * builds run reports and compares parallel runs with a sequential baseline.
 *
 * Logging lives in @shardflow/core so every package can accept a Logger
 * without depending on this one; it is re-exported here for convenience.
 *
 * @example
 * ```typescript
 * import { SchedulerMetrics, formatPrometheus, summarizeReport } from '@shardflow/observability';
 *
 * const metrics = SchedulerMetrics.create();
 * const { report } = await run(graph, partitions, { concurrency: 4, metrics });
 *
 * console.log(summarizeReport(report));
 * console.log(formatPrometheus(metrics.registry));
 * ```
 */

export {
  DEFAULT_BUCKETS,
  createMetricsRegistry,
  createCounter,
  createGauge,
  createHistogram,
  formatPrometheus,
  SchedulerMetrics,
} from './metrics.js';

export {
  ExecutionMonitor,
  compareReports,
  summarizeReport,
  percentile,
  type ExecutionMonitorOptions,
  type ReportSummary,
} from './monitor.js';

export {
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  withContext,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogContext,
  type MetricsRegistry,
  type SchedulerMetricsCollection,
} from '@shardflow/core';
