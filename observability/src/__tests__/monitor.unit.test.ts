/**
 * Execution Monitor tests, driven through the observer hooks with a fake clock
 */

import { describe, it, expect } from 'vitest';
import { InvalidConfigurationError, type ExecutionReport } from '@shardflow/core';
import { ExecutionMonitor, compareReports, summarizeReport, percentile } from '../monitor.js';
import { SchedulerMetrics, formatPrometheus } from '../metrics.js';

function fakeClock(): { clock: () => number; advance: (ms: number) => void } {
  let time = 1_000;
  return {
    clock: () => time,
    advance: (ms: number) => {
      time += ms;
    },
  };
}

function report(totalDurationMs: number): ExecutionReport {
  return {
    totalDurationMs,
    startedAt: 0,
    finishedAt: totalDurationMs,
    partitionCount: 0,
    concurrency: 1,
    peakConcurrency: 0,
    partitionTimings: [],
    succeeded: 0,
    failed: 0,
  };
}

describe('ExecutionMonitor', () => {
  it('records timings, peak concurrency and totals', () => {
    const { clock, advance } = fakeClock();
    const monitor = new ExecutionMonitor({ clock, now: () => 5_000 });

    monitor.onRunStart({ concurrency: 2 });
    monitor.onTaskStart({ partitionIndex: 1, workerId: 0, recordsIn: 10 });
    advance(5);
    monitor.onTaskStart({ partitionIndex: 0, workerId: 1, recordsIn: 10 });
    expect(monitor.activeTasks).toBe(2);
    advance(10);
    monitor.onTaskEnd({ partitionIndex: 1, workerId: 0, recordsIn: 10, recordsOut: 4, status: 'succeeded' });
    advance(5);
    monitor.onTaskEnd({
      partitionIndex: 0,
      workerId: 1,
      recordsIn: 10,
      recordsOut: 0,
      status: 'failed',
      error: new Error('bad'),
    });
    advance(2);
    monitor.onRunEnd();

    const built = monitor.buildReport();

    expect(built).toEqual({
      totalDurationMs: 22,
      startedAt: 5_000,
      finishedAt: 5_000,
      partitionCount: 2,
      concurrency: 2,
      peakConcurrency: 2,
      partitionTimings: [
        {
          partitionIndex: 0,
          workerId: 1,
          startedAtMs: 5,
          durationMs: 15,
          recordsIn: 10,
          recordsOut: 0,
          status: 'failed',
        },
        {
          partitionIndex: 1,
          workerId: 0,
          startedAtMs: 0,
          durationMs: 15,
          recordsIn: 10,
          recordsOut: 4,
          status: 'succeeded',
        },
      ],
      succeeded: 1,
      failed: 1,
    });
    expect(Object.isFrozen(built)).toBe(true);
    expect(Object.isFrozen(built.partitionTimings)).toBe(true);
    expect(monitor.activeTasks).toBe(0);
  });

  it('starts fresh on every run', () => {
    const { clock } = fakeClock();
    const monitor = new ExecutionMonitor({ clock });

    monitor.onRunStart({ concurrency: 1 });
    monitor.onTaskStart({ partitionIndex: 0, workerId: 0, recordsIn: 1 });
    monitor.onTaskEnd({ partitionIndex: 0, workerId: 0, recordsIn: 1, recordsOut: 1, status: 'succeeded' });
    monitor.onRunEnd();

    monitor.onRunStart({ concurrency: 3 });
    monitor.onRunEnd();

    const built = monitor.buildReport();
    expect(built.partitionCount).toBe(0);
    expect(built.partitionTimings).toEqual([]);
    expect(built.peakConcurrency).toBe(0);
    expect(built.concurrency).toBe(3);
  });

  it('feeds scheduler metrics', () => {
    const { clock, advance } = fakeClock();
    const metrics = SchedulerMetrics.create();
    const monitor = new ExecutionMonitor({ clock, metrics });

    monitor.onRunStart({ concurrency: 1 });
    monitor.onTaskStart({ partitionIndex: 0, workerId: 0, recordsIn: 3 });
    expect(metrics.activePartitionTasks.get()).toBe(1);
    advance(250);
    monitor.onTaskEnd({ partitionIndex: 0, workerId: 0, recordsIn: 3, recordsOut: 3, status: 'succeeded' });
    monitor.onRunEnd();

    expect(metrics.activePartitionTasks.get()).toBe(0);
    expect(metrics.partitionTasksTotal.labels({ status: 'succeeded' }).get()).toBe(1);
    expect(metrics.partitionTaskDurationSeconds.get().sum).toBe(0.25);
    expect(formatPrometheus(metrics.registry)).toContain('shardflow_partition_tasks_total{status="succeeded"} 1');
  });
});

describe('compareReports', () => {
  it('divides sequential time by parallel time', () => {
    expect(compareReports(report(50), report(200))).toBe(4);
    expect(compareReports(report(200), report(100))).toBe(0.5);
  });

  it('treats two zero-duration runs as equal', () => {
    expect(compareReports(report(0), report(0))).toBe(1);
  });

  it('rejects a zero-duration parallel run against a measurable baseline', () => {
    expect(() => compareReports(report(0), report(10))).toThrow(InvalidConfigurationError);
  });
});

describe('summarizeReport', () => {
  it('summarises partition durations', () => {
    const base = report(40);
    const timings = [10, 30, 20, 40].map((durationMs, partitionIndex) => ({
      partitionIndex,
      workerId: 0,
      startedAtMs: 0,
      durationMs,
      recordsIn: 5,
      recordsOut: 2,
      status: 'succeeded' as const,
    }));

    const summary = summarizeReport({ ...base, partitionCount: 4, partitionTimings: timings, succeeded: 4 });

    expect(summary).toMatchObject({
      partitionCount: 4,
      concurrency: 1,
      peakConcurrency: 0,
      totalDurationMs: 40,
      recordsIn: 20,
      recordsOut: 8,
      failed: 0,
      minTaskMs: 10,
      maxTaskMs: 40,
      meanTaskMs: 25,
      p50TaskMs: 25,
    });
    expect(summary.p95TaskMs).toBeCloseTo(38.5, 9);
  });

  it('handles an empty report', () => {
    const summary = summarizeReport(report(0));
    expect(summary.meanTaskMs).toBe(0);
    expect(summary.p95TaskMs).toBe(0);
  });
});

describe('percentile', () => {
  it('interpolates between neighbours', () => {
    expect(percentile([1, 2, 3, 4, 5], 50)).toBe(3);
    expect(percentile([10, 20], 25)).toBe(12.5);
    expect(percentile([7], 99)).toBe(7);
  });
});
