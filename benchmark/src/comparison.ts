/**
 * @shardflow/benchmark - Sequential vs parallel comparison
 *
 * Runs one graph over the same records at concurrency 1 and at each
 * requested level, checks every run produced the sequential result and
 * reports the speedups.
 */

import { isDeepStrictEqual } from 'node:util';
import {
  MergeError,
  assertPartitionSize,
  createNoopLogger,
  partition,
  type ExecutionReport,
  type Logger,
  type Row,
} from '@shardflow/core';
import { compareReports, summarizeReport, type ReportSummary } from '@shardflow/observability';
import { assertConcurrency, run, toRows, type FinalResult, type OperationGraph } from '@shardflow/query';

export interface ComparisonOptions {
  records: readonly Row[];
  graph: OperationGraph;
  targetPartitionSize: number;
  /** Levels compared against the sequential baseline; 1 may be listed too */
  concurrencyLevels: readonly number[];
  yieldEveryRecords?: number;
  logger?: Logger;
}

export interface ComparisonEntry {
  concurrency: number;
  report: ExecutionReport;
  summary: ReportSummary;
  /** Sequential duration divided by this run's duration */
  speedup: number;
}

export interface ComparisonResult {
  recordCount: number;
  targetPartitionSize: number;
  baseline: ComparisonEntry;
  runs: ComparisonEntry[];
  /** The result every run agreed on */
  result: FinalResult;
}

export type ComparisonFormat = 'json' | 'pretty';

export async function runComparison(options: ComparisonOptions): Promise<ComparisonResult> {
  const { records, graph, targetPartitionSize, concurrencyLevels, yieldEveryRecords } = options;
  const logger = options.logger ?? createNoopLogger();
  assertPartitionSize(targetPartitionSize);
  concurrencyLevels.forEach(assertConcurrency);

  const execute = (concurrency: number) =>
    run(graph, partition(records, targetPartitionSize), { concurrency, yieldEveryRecords, logger });

  const sequential = await execute(1);
  const expected = toRows(sequential.result);
  const baseline: ComparisonEntry = {
    concurrency: 1,
    report: sequential.report,
    summary: summarizeReport(sequential.report),
    speedup: 1,
  };

  const runs: ComparisonEntry[] = [];
  for (const concurrency of concurrencyLevels) {
    const { result, report } = await execute(concurrency);
    if (!isDeepStrictEqual(toRows(result), expected)) {
      throw new MergeError(`Run at concurrency ${concurrency} produced a different result than the sequential run`);
    }
    const speedup = compareReports(report, sequential.report);
    logger.info('Comparison run finished', { concurrency, durationMs: report.totalDurationMs, speedup });
    runs.push({ concurrency, report, summary: summarizeReport(report), speedup });
  }

  return {
    recordCount: records.length,
    targetPartitionSize,
    baseline,
    runs,
    result: sequential.result,
  };
}

const COLUMNS = ['concurrency', 'partitions', 'peak', 'total ms', 'p95 task ms', 'speedup'] as const;

function tableRow(entry: ComparisonEntry): string[] {
  return [
    String(entry.concurrency),
    String(entry.summary.partitionCount),
    String(entry.summary.peakConcurrency),
    entry.summary.totalDurationMs.toFixed(2),
    entry.summary.p95TaskMs.toFixed(2),
    `${entry.speedup.toFixed(2)}x`,
  ];
}

/**
 * Render a comparison as JSON or as a right-aligned text table.
 */
export function formatComparison(comparison: ComparisonResult, format: ComparisonFormat): string {
  const entries = [comparison.baseline, ...comparison.runs];

  if (format === 'json') {
    return JSON.stringify(
      {
        records: comparison.recordCount,
        targetPartitionSize: comparison.targetPartitionSize,
        runs: entries.map(entry => ({ ...entry.summary, speedup: entry.speedup })),
      },
      null,
      2
    );
  }

  const rows = [[...COLUMNS], ...entries.map(tableRow)];
  const widths = COLUMNS.map((_, column) => Math.max(...rows.map(row => row[column].length)));
  const lines = rows.map(row => row.map((cell, column) => cell.padStart(widths[column])).join('  '));
  return [
    `${comparison.recordCount} records, target partition size ${comparison.targetPartitionSize}`,
    ...lines,
  ].join('\n');
}
