/**
 * Metrics for shardflow
 *
 * A lightweight metrics registry with Prometheus text export:
 * - Counter: monotonically increasing value (e.g., finished partition tasks)
 * - Gauge: value that can go up or down (e.g., tasks in flight)
 * - Histogram: distribution of values with configurable buckets (e.g., task duration)
 *
 * @example
 * ```typescript
 * import { createMetricsRegistry, createCounter, formatPrometheus } from '@shardflow/observability';
 *
 * const registry = createMetricsRegistry();
 * const loads = createCounter(registry, {
 *   name: 'loads_total',
 *   help: 'Total loads',
 *   labelNames: ['target'],
 * });
 *
 * loads.labels({ target: 'warehouse' }).inc();
 * const body = formatPrometheus(registry);
 * ```
 */

import type {
  MetricLabels,
  Metric,
  MetricSample,
  Counter,
  LabeledCounter,
  Gauge,
  LabeledGauge,
  HistogramData,
  TimerEnd,
  Histogram,
  LabeledHistogram,
  CounterConfig,
  GaugeConfig,
  HistogramConfig,
  MetricsRegistry,
  SchedulerMetricsCollection,
} from '@shardflow/core';

// =============================================================================
// Default Values
// =============================================================================

/**
 * Default histogram buckets (same as Prometheus client default)
 */
export const DEFAULT_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10] as const;

const METRIC_NAME_PATTERN = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;

// =============================================================================
// Metrics Registry
// =============================================================================

/**
 * Create a new metrics registry
 */
export function createMetricsRegistry(): MetricsRegistry {
  const metrics = new Map<string, Metric>();

  return {
    getMetrics(): Metric[] {
      return Array.from(metrics.values());
    },

    getMetric(name: string): Metric | undefined {
      return metrics.get(name);
    },

    register(metric: Metric): void {
      if (!METRIC_NAME_PATTERN.test(metric.name)) {
        throw new Error(`Invalid metric name ${metric.name}`);
      }
      if (metrics.has(metric.name)) {
        throw new Error(`Metric ${metric.name} already registered`);
      }
      metrics.set(metric.name, metric);
    },

    clear(): void {
      metrics.clear();
    },

    resetAll(): void {
      for (const metric of metrics.values()) {
        metric.reset();
      }
    },
  };
}

// =============================================================================
// Label Keys
// =============================================================================

/**
 * Stable key for a label set; label order does not matter.
 */
function labelsToKey(labels: MetricLabels): string {
  return JSON.stringify(Object.entries(labels).sort((a, b) => a[0].localeCompare(b[0])));
}

/**
 * A per-label-set store shared by every metric kind.
 * The unlabeled series uses the key of the empty label set.
 */
class SeriesStore<T> {
  private readonly series = new Map<string, { labels: MetricLabels; value: T }>();

  constructor(private readonly initial: () => T) {}

  entry(labels: MetricLabels): { labels: MetricLabels; value: T } {
    const key = labelsToKey(labels);
    let entry = this.series.get(key);
    if (!entry) {
      entry = { labels: { ...labels }, value: this.initial() };
      this.series.set(key, entry);
    }
    return entry;
  }

  entries(): Array<{ labels: MetricLabels; value: T }> {
    return Array.from(this.series.values());
  }

  reset(): void {
    for (const entry of this.series.values()) {
      entry.value = this.initial();
    }
  }
}

function requireUnlabeled(kind: string, labelNames: readonly string[]): void {
  if (labelNames.length > 0) {
    throw new Error(`${kind} with labels requires using .labels() method`);
  }
}

function checkLabels(name: string, labelNames: readonly string[], labels: MetricLabels): void {
  for (const key of Object.keys(labels)) {
    if (!labelNames.includes(key)) {
      throw new Error(`Metric ${name} has no label "${key}"`);
    }
  }
}

// =============================================================================
// Counter
// =============================================================================

/**
 * Create a counter metric and register it.
 */
export function createCounter(registry: MetricsRegistry, config: CounterConfig): Counter {
  const { name, help, labelNames = [] } = config;
  const store = new SeriesStore<number>(() => 0);
  if (labelNames.length === 0) {
    store.entry({});
  }

  const labeled = (labels: MetricLabels): LabeledCounter => {
    checkLabels(name, labelNames, labels);
    const entry = store.entry(labels);
    return {
      inc(value = 1): void {
        if (value < 0) {
          throw new Error('Counter cannot be decremented');
        }
        entry.value += value;
      },
      get: () => entry.value,
    };
  };

  const counter: Counter = {
    name,
    help,
    type: 'counter',
    inc(value = 1): void {
      requireUnlabeled('Counter', labelNames);
      labeled({}).inc(value);
    },
    get(): number {
      requireUnlabeled('Counter', labelNames);
      return store.entry({}).value;
    },
    labels: labeled,
    collect: (): MetricSample[] => store.entries().map(({ labels, value }) => ({ suffix: '', labels, value })),
    reset: () => store.reset(),
  };

  registry.register(counter);
  return counter;
}

// =============================================================================
// Gauge
// =============================================================================

/**
 * Create a gauge metric and register it.
 */
export function createGauge(registry: MetricsRegistry, config: GaugeConfig): Gauge {
  const { name, help, labelNames = [] } = config;
  const store = new SeriesStore<number>(() => 0);
  if (labelNames.length === 0) {
    store.entry({});
  }

  const labeled = (labels: MetricLabels): LabeledGauge => {
    checkLabels(name, labelNames, labels);
    const entry = store.entry(labels);
    return {
      set(value: number): void {
        entry.value = value;
      },
      inc(value = 1): void {
        entry.value += value;
      },
      dec(value = 1): void {
        entry.value -= value;
      },
      get: () => entry.value,
    };
  };

  const unlabeled = (): LabeledGauge => {
    requireUnlabeled('Gauge', labelNames);
    return labeled({});
  };

  const gauge: Gauge = {
    name,
    help,
    type: 'gauge',
    set: value => unlabeled().set(value),
    inc: value => unlabeled().inc(value),
    dec: value => unlabeled().dec(value),
    get: () => unlabeled().get(),
    labels: labeled,
    collect: (): MetricSample[] => store.entries().map(({ labels, value }) => ({ suffix: '', labels, value })),
    reset: () => store.reset(),
  };

  registry.register(gauge);
  return gauge;
}

// =============================================================================
// Histogram
// =============================================================================

interface HistogramState {
  count: number;
  sum: number;
  /** Non-cumulative counts per bucket; cumulated on read */
  buckets: number[];
}

/**
 * Create a histogram metric and register it.
 */
export function createHistogram(registry: MetricsRegistry, config: HistogramConfig): Histogram {
  const { name, help, labelNames = [], buckets: configBuckets } = config;
  const buckets: number[] = configBuckets ? [...configBuckets].sort((a, b) => a - b) : [...DEFAULT_BUCKETS];
  const store = new SeriesStore<HistogramState>(() => ({ count: 0, sum: 0, buckets: buckets.map(() => 0) }));
  if (labelNames.length === 0) {
    store.entry({});
  }

  const observeInto = (state: HistogramState, value: number): void => {
    state.count++;
    state.sum += value;
    const slot = buckets.findIndex(bound => value <= bound);
    if (slot >= 0) {
      state.buckets[slot]++;
    }
  };

  const toData = (state: HistogramState): HistogramData => {
    const cumulative: Record<number, number> = {};
    let running = 0;
    buckets.forEach((bound, i) => {
      running += state.buckets[i];
      cumulative[bound] = running;
    });
    return { count: state.count, sum: state.sum, buckets: cumulative };
  };

  const labeled = (labels: MetricLabels): LabeledHistogram => {
    checkLabels(name, labelNames, labels);
    const entry = store.entry(labels);
    return {
      observe: value => observeInto(entry.value, value),
      startTimer(): TimerEnd {
        const start = performance.now();
        return (): number => {
          const seconds = (performance.now() - start) / 1000;
          observeInto(entry.value, seconds);
          return seconds;
        };
      },
      get: () => toData(entry.value),
    };
  };

  const unlabeled = (): LabeledHistogram => {
    requireUnlabeled('Histogram', labelNames);
    return labeled({});
  };

  const histogram: Histogram = {
    name,
    help,
    type: 'histogram',
    buckets,
    observe: value => unlabeled().observe(value),
    startTimer: () => unlabeled().startTimer(),
    get: () => unlabeled().get(),
    labels: labeled,
    collect(): MetricSample[] {
      const samples: MetricSample[] = [];
      for (const { labels, value } of store.entries()) {
        const data = toData(value);
        for (const bound of buckets) {
          samples.push({ suffix: '_bucket', labels: { ...labels, le: String(bound) }, value: data.buckets[bound] });
        }
        samples.push({ suffix: '_bucket', labels: { ...labels, le: '+Inf' }, value: data.count });
        samples.push({ suffix: '_sum', labels, value: data.sum });
        samples.push({ suffix: '_count', labels, value: data.count });
      }
      return samples;
    },
    reset: () => store.reset(),
  };

  registry.register(histogram);
  return histogram;
}

// =============================================================================
// Prometheus Format Export
// =============================================================================

/**
 * Escape label value for Prometheus format
 * Prometheus requires escaping: backslash, newline, double-quote
 */
function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function formatLabels(labels: MetricLabels): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) return '';
  // `le` stays last, the way Prometheus clients print buckets
  const parts = entries
    .sort((a, b) => (a[0] === 'le' ? 1 : b[0] === 'le' ? -1 : a[0].localeCompare(b[0])))
    .map(([k, v]) => `${k}="${escapeLabelValue(v)}"`);
  return `{${parts.join(',')}}`;
}

/**
 * Format a metric registry as Prometheus text format
 *
 * @example
 * ```typescript
 * const body = formatPrometheus(registry);
 * await writeFile('metrics.prom', body);
 * ```
 */
export function formatPrometheus(registry: MetricsRegistry): string {
  const lines: string[] = [];

  for (const metric of registry.getMetrics()) {
    lines.push(`# HELP ${metric.name} ${metric.help}`);
    lines.push(`# TYPE ${metric.name} ${metric.type}`);
    for (const sample of metric.collect()) {
      lines.push(`${metric.name}${sample.suffix}${formatLabels(sample.labels)} ${sample.value}`);
    }
    lines.push('');
  }

  return lines.join('\n').trim();
}

// =============================================================================
// Scheduler Metrics
// =============================================================================

/**
 * Partition task duration buckets (seconds)
 */
const TASK_DURATION_BUCKETS = [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30];

/**
 * Factory for the metrics the scheduler records.
 *
 * @example
 * ```typescript
 * const metrics = SchedulerMetrics.create();
 * await run(graph, partitions, { concurrency: 4, metrics });
 * console.log(formatPrometheus(metrics.registry));
 * ```
 */
export const SchedulerMetrics = {
  create(registry?: MetricsRegistry): SchedulerMetricsCollection {
    const reg = registry ?? createMetricsRegistry();

    return {
      registry: reg,
      partitionTasksTotal: createCounter(reg, {
        name: 'shardflow_partition_tasks_total',
        help: 'Finished partition tasks',
        labelNames: ['status'],
      }),
      partitionTaskDurationSeconds: createHistogram(reg, {
        name: 'shardflow_partition_task_duration_seconds',
        help: 'Duration of partition tasks in seconds',
        buckets: TASK_DURATION_BUCKETS,
      }),
      activePartitionTasks: createGauge(reg, {
        name: 'shardflow_active_partition_tasks',
        help: 'Partition tasks currently running',
      }),
    };
  },
};
