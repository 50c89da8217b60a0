/**
 * Comparison harness tests: result agreement, validation and formatting
 */

import { describe, it, expect } from 'vitest';
import { InvalidConfigurationError, createTestLogger, partition, type ExecutionReport } from '@shardflow/core';
import { summarizeReport } from '@shardflow/observability';
import { run, toRows } from '@shardflow/query';
import { formatComparison, runComparison, type ComparisonEntry, type ComparisonResult } from '../comparison.js';
import { generateTransactions } from '../generators/transactions.js';
import { createCentsByRegionGraph, createSalesByRegionGraph } from '../graphs.js';

const records = [...generateTransactions({ count: 2000, seed: 17 })];

describe('runComparison', () => {
  it('runs the baseline and every level over the same partitions', async () => {
    const comparison = await runComparison({
      records,
      graph: createSalesByRegionGraph(),
      targetPartitionSize: 250,
      concurrencyLevels: [2, 4],
    });

    expect(comparison.recordCount).toBe(2000);
    expect(comparison.baseline.concurrency).toBe(1);
    expect(comparison.baseline.speedup).toBe(1);
    expect(comparison.runs.map(entry => entry.concurrency)).toEqual([2, 4]);
    for (const entry of [comparison.baseline, ...comparison.runs]) {
      expect(entry.report.partitionCount).toBe(8);
      expect(entry.summary.recordsIn).toBe(2000);
      expect(entry.speedup).toBeGreaterThan(0);
    }
  });

  it('returns the sequential result', async () => {
    const graph = createCentsByRegionGraph();
    const direct = await run(graph, partition(records, 300), { concurrency: 1 });

    const comparison = await runComparison({
      records,
      graph,
      targetPartitionSize: 300,
      concurrencyLevels: [3],
    });

    expect(toRows(comparison.result)).toEqual(toRows(direct.result));
  });

  it('logs each compared run', async () => {
    const logger = createTestLogger();

    await runComparison({
      records: records.slice(0, 100),
      graph: createSalesByRegionGraph(),
      targetPartitionSize: 20,
      concurrencyLevels: [2, 5],
      logger,
    });

    const finished = logger.getLogs().filter(entry => entry.message === 'Comparison run finished');
    expect(finished.map(entry => entry.context?.concurrency)).toEqual([2, 5]);
  });

  it('rejects invalid levels and partition sizes before running', async () => {
    const graph = createSalesByRegionGraph();

    await expect(
      runComparison({ records, graph, targetPartitionSize: 100, concurrencyLevels: [2, 0] })
    ).rejects.toThrow(InvalidConfigurationError);
    await expect(
      runComparison({ records, graph, targetPartitionSize: 0, concurrencyLevels: [2] })
    ).rejects.toThrow(InvalidConfigurationError);
  });
});

function entry(concurrency: number, totalDurationMs: number, speedup: number): ComparisonEntry {
  const report: ExecutionReport = {
    totalDurationMs,
    startedAt: 0,
    finishedAt: totalDurationMs,
    partitionCount: 4,
    concurrency,
    peakConcurrency: concurrency,
    partitionTimings: [],
    succeeded: 4,
    failed: 0,
  };
  return { concurrency, report, summary: summarizeReport(report), speedup };
}

const fixedComparison: ComparisonResult = {
  recordCount: 40,
  targetPartitionSize: 10,
  baseline: entry(1, 10, 1),
  runs: [entry(4, 4, 2.5)],
  result: { kind: 'rows', schema: { columns: [] }, rows: [] },
};

describe('formatComparison', () => {
  it('renders a right-aligned table', () => {
    expect(formatComparison(fixedComparison, 'pretty').split('\n')).toEqual([
      '40 records, target partition size 10',
      'concurrency  partitions  peak  total ms  p95 task ms  speedup',
      ['          1', '         4', '   1', '   10.00', '       0.00', '  1.00x'].join('  '),
      ['          4', '         4', '   4', '    4.00', '       0.00', '  2.50x'].join('  '),
    ]);
  });

  it('renders JSON with one entry per run', () => {
    const parsed: unknown = JSON.parse(formatComparison(fixedComparison, 'json'));

    expect(parsed).toMatchObject({
      records: 40,
      targetPartitionSize: 10,
      runs: [
        { concurrency: 1, totalDurationMs: 10, speedup: 1 },
        { concurrency: 4, totalDurationMs: 4, speedup: 2.5 },
      ],
    });
  });
});
