/**
 * Execution Monitor
 *
 * Observes a scheduler run and turns what it saw into an ExecutionReport:
 * overall wall-clock time, per-partition timings and the peak number of
 * partition tasks in flight. It only records; results never pass through it.
 *
 * @example
 * ```typescript
 * import { ExecutionMonitor, compareReports } from '@shardflow/observability';
 *
 * const baseline = await run(graph, partitions, { concurrency: 1 });
 * const parallel = await run(graph, partitions, { concurrency: 8 });
 * console.log(`speedup ${compareReports(parallel.report, baseline.report).toFixed(2)}x`);
 * ```
 */

import {
  InvalidConfigurationError,
  type ExecutionObserver,
  type ExecutionReport,
  type PartitionTiming,
  type RunStartEvent,
  type SchedulerMetricsCollection,
  type TaskEndEvent,
  type TaskStartEvent,
} from '@shardflow/core';

export interface ExecutionMonitorOptions {
  /** Record task counts, durations and the active gauge here */
  metrics?: SchedulerMetricsCollection;
  /** Monotonic clock in milliseconds (default: performance.now) */
  clock?: () => number;
  /** Wall clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
}

interface RunningTask {
  workerId: number;
  startedAt: number;
}

/**
 * ExecutionObserver that builds the report of one run. Reusable: each
 * onRunStart clears what the previous run recorded.
 */
export class ExecutionMonitor implements ExecutionObserver {
  private readonly metrics?: SchedulerMetricsCollection;
  private readonly clock: () => number;
  private readonly now: () => number;

  private concurrency = 0;
  private runStartedAt = 0;
  private runStartedAtEpoch = 0;
  private runFinishedAt?: number;
  private runFinishedAtEpoch = 0;
  private active = 0;
  private peak = 0;
  private readonly running = new Map<number, RunningTask>();
  private timings: PartitionTiming[] = [];

  constructor(options: ExecutionMonitorOptions = {}) {
    this.metrics = options.metrics;
    this.clock = options.clock ?? (() => performance.now());
    this.now = options.now ?? Date.now;
  }

  onRunStart(event: RunStartEvent): void {
    this.concurrency = event.concurrency;
    this.runStartedAt = this.clock();
    this.runStartedAtEpoch = this.now();
    this.runFinishedAt = undefined;
    this.active = 0;
    this.peak = 0;
    this.running.clear();
    this.timings = [];
  }

  onTaskStart(event: TaskStartEvent): void {
    this.running.set(event.partitionIndex, { workerId: event.workerId, startedAt: this.clock() });
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    this.metrics?.activePartitionTasks.inc();
  }

  onTaskEnd(event: TaskEndEvent): void {
    const endedAt = this.clock();
    const task = this.running.get(event.partitionIndex);
    const startedAt = task?.startedAt ?? endedAt;
    this.running.delete(event.partitionIndex);
    this.active = Math.max(0, this.active - 1);

    const durationMs = endedAt - startedAt;
    this.timings.push(
      Object.freeze({
        partitionIndex: event.partitionIndex,
        workerId: event.workerId,
        startedAtMs: startedAt - this.runStartedAt,
        durationMs,
        recordsIn: event.recordsIn,
        recordsOut: event.recordsOut,
        status: event.status,
      })
    );

    if (this.metrics) {
      this.metrics.activePartitionTasks.dec();
      this.metrics.partitionTasksTotal.labels({ status: event.status }).inc();
      this.metrics.partitionTaskDurationSeconds.observe(durationMs / 1000);
    }
  }

  onRunEnd(): void {
    this.runFinishedAt = this.clock();
    this.runFinishedAtEpoch = this.now();
  }

  /** Partition tasks currently in flight */
  get activeTasks(): number {
    return this.active;
  }

  /** Highest number of tasks observed in flight at once */
  get peakConcurrency(): number {
    return this.peak;
  }

  /**
   * Freeze what was recorded into a report. Before onRunEnd the duration runs
   * up to the moment of the call.
   */
  buildReport(): ExecutionReport {
    const finishedAt = this.runFinishedAt ?? this.clock();
    const timings = [...this.timings].sort((a, b) => a.partitionIndex - b.partitionIndex);
    const failed = timings.filter(t => t.status === 'failed').length;

    return Object.freeze({
      totalDurationMs: Math.max(0, finishedAt - this.runStartedAt),
      startedAt: this.runStartedAtEpoch,
      finishedAt: this.runFinishedAt === undefined ? this.now() : this.runFinishedAtEpoch,
      partitionCount: timings.length,
      concurrency: this.concurrency,
      peakConcurrency: this.peak,
      partitionTimings: Object.freeze(timings),
      succeeded: timings.length - failed,
      failed,
    });
  }
}

// =============================================================================
// Comparison
// =============================================================================

/**
 * Speedup of a parallel run over a sequential baseline:
 * `sequential.totalDurationMs / parallel.totalDurationMs`.
 *
 * Two zero-duration runs compare as 1.
 *
 * @throws InvalidConfigurationError when only the parallel run took no time
 */
export function compareReports(parallel: ExecutionReport, sequential: ExecutionReport): number {
  if (parallel.totalDurationMs === 0) {
    if (sequential.totalDurationMs === 0) {
      return 1;
    }
    throw new InvalidConfigurationError(
      'Cannot compare against a parallel run that took no measurable time',
      'parallel.totalDurationMs',
      { suggestion: 'Use more records so each run takes measurable time' }
    );
  }
  return sequential.totalDurationMs / parallel.totalDurationMs;
}

/**
 * Partition duration statistics for logs and benchmark output
 */
export interface ReportSummary {
  partitionCount: number;
  concurrency: number;
  peakConcurrency: number;
  totalDurationMs: number;
  recordsIn: number;
  recordsOut: number;
  failed: number;
  minTaskMs: number;
  maxTaskMs: number;
  meanTaskMs: number;
  p50TaskMs: number;
  p95TaskMs: number;
}

/**
 * Percentile of an ascending array, interpolating between neighbours
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return 0;
  if (sorted.length === 1) return sorted[0];

  const index = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  const weight = index - lower;

  return sorted[lower] * (1 - weight) + sorted[upper] * weight;
}

export function summarizeReport(report: ExecutionReport): ReportSummary {
  const durations = report.partitionTimings.map(t => t.durationMs).sort((a, b) => a - b);
  const total = durations.reduce((sum, d) => sum + d, 0);

  return {
    partitionCount: report.partitionCount,
    concurrency: report.concurrency,
    peakConcurrency: report.peakConcurrency,
    totalDurationMs: report.totalDurationMs,
    recordsIn: report.partitionTimings.reduce((sum, t) => sum + t.recordsIn, 0),
    recordsOut: report.partitionTimings.reduce((sum, t) => sum + t.recordsOut, 0),
    failed: report.failed,
    minTaskMs: durations.length > 0 ? durations[0] : 0,
    maxTaskMs: durations.length > 0 ? durations[durations.length - 1] : 0,
    meanTaskMs: durations.length > 0 ? total / durations.length : 0,
    p50TaskMs: percentile(durations, 50),
    p95TaskMs: percentile(durations, 95),
  };
}
