/**
 * Metrics type definitions for shardflow
 *
 * Core only declares the metric interfaces. The implementations and the
 * Prometheus text export live in @shardflow/observability, so code that
 * accepts an optional registry does not pull them in.
 *
 * ```typescript
 * import type { MetricsRegistry } from '@shardflow/core';
 *
 * function runNightlyLoad(metrics?: MetricsRegistry): void {
 *   // metrics are optional
 * }
 * ```
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Labels for a metric (key-value pairs)
 */
export type MetricLabels = Record<string, string>;

export type MetricType = 'counter' | 'gauge' | 'histogram';

/**
 * One exported line of a metric: `<name><suffix>{labels} value`
 */
export interface MetricSample {
  /** Appended to the metric name, e.g. '_bucket' (empty for plain values) */
  readonly suffix: string;
  readonly labels: MetricLabels;
  readonly value: number;
}

/**
 * Base metric interface
 */
export interface Metric {
  /** Metric name (must match [a-zA-Z_:][a-zA-Z0-9_:]*) */
  readonly name: string;
  readonly help: string;
  readonly type: MetricType;
  /** Current samples for every label combination seen so far */
  collect(): MetricSample[];
  /** Reset metric to initial state */
  reset(): void;
}

/**
 * Counter metric - a monotonically increasing value
 */
export interface Counter extends Metric {
  readonly type: 'counter';
  inc(value?: number): void;
  get(): number;
  labels(labels: MetricLabels): LabeledCounter;
}

export interface LabeledCounter {
  inc(value?: number): void;
  get(): number;
}

/**
 * Gauge metric - a value that can go up or down
 */
export interface Gauge extends Metric {
  readonly type: 'gauge';
  set(value: number): void;
  inc(value?: number): void;
  dec(value?: number): void;
  get(): number;
  labels(labels: MetricLabels): LabeledGauge;
}

export interface LabeledGauge {
  set(value: number): void;
  inc(value?: number): void;
  dec(value?: number): void;
  get(): number;
}

/**
 * Histogram data for a single label set
 */
export interface HistogramData {
  /** Total number of observations */
  count: number;
  /** Sum of all observed values */
  sum: number;
  /** Cumulative bucket counts (bucket upper bound -> count) */
  buckets: Record<number, number>;
}

/**
 * Timer end function - returns observed duration in seconds
 */
export type TimerEnd = () => number;

/**
 * Histogram metric - distribution of values
 */
export interface Histogram extends Metric {
  readonly type: 'histogram';
  readonly buckets: readonly number[];
  observe(value: number): void;
  /** Start a timer and return a function to stop it */
  startTimer(): TimerEnd;
  get(): HistogramData;
  labels(labels: MetricLabels): LabeledHistogram;
}

export interface LabeledHistogram {
  observe(value: number): void;
  startTimer(): TimerEnd;
  get(): HistogramData;
}

export interface CounterConfig {
  name: string;
  help: string;
  labelNames?: string[];
}

export type GaugeConfig = CounterConfig;

export interface HistogramConfig extends CounterConfig {
  /** Bucket boundaries (default: [.005, .01, .025, .05, .1, .25, .5, 1, 2.5, 5, 10]) */
  buckets?: number[];
}

/**
 * Metrics registry - container for all metrics
 */
export interface MetricsRegistry {
  getMetrics(): Metric[];
  getMetric(name: string): Metric | undefined;
  /** Add a metric; names are unique within a registry */
  register(metric: Metric): void;
  /** Remove all registered metrics */
  clear(): void;
  /** Reset all metric values */
  resetAll(): void;
}

/**
 * Metrics recorded by the partition scheduler
 */
export interface SchedulerMetricsCollection {
  registry: MetricsRegistry;
  /** Finished partition tasks, labelled by `status` */
  partitionTasksTotal: Counter;
  /** Partition task duration (seconds) */
  partitionTaskDurationSeconds: Histogram;
  /** Partition tasks currently running */
  activePartitionTasks: Gauge;
}
