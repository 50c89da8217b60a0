/**
 * Partition scheduler
 *
 * Runs an operation graph over a stream of partitions with a bounded pool
 * of in-process workers. Every worker pulls the next partition from one
 * shared iterator, so at most `concurrency` partitions are read ahead and
 * a slow source applies backpressure. When every task has settled the
 * partials are merged in partition index order and any stages after the
 * first groupAggregate run on the merged rows.
 *
 * A failing partition does not stop the others; the run rejects with a
 * PartitionFailure listing every failed partition once all have settled.
 * Aborting the signal stops dispatch; tasks already running finish and the
 * run rejects with ExecutionCancelledError. An observer that throws stops
 * dispatch the same way and the run rejects with the observer's error.
 */

import {
  ExecutionCancelledError,
  InvalidConfigurationError,
  PartitionFailure,
  createNoopLogger,
  toError,
  type ExecutionObserver,
  type Logger,
  type Partition,
  type PartitionTaskFailure,
  type RunEndEvent,
} from '@shardflow/core';
import { ExecutionMonitor } from '@shardflow/observability';
import { applyStages, executePartition, partialSize, DEFAULT_YIELD_EVERY_RECORDS } from './executor.js';
import type { OperationGraph } from './graph.js';
import { mergeSegment, toRows } from './merger.js';
import type { FinalResult, PartialResult, RunOptions, RunResult } from './types.js';

/**
 * @throws InvalidConfigurationError unless `concurrency` is a positive integer
 */
export function assertConcurrency(concurrency: number): void {
  if (!Number.isSafeInteger(concurrency) || concurrency <= 0) {
    throw new InvalidConfigurationError(
      `concurrency must be a positive integer, got ${concurrency}`,
      'scheduler.concurrency',
      { suggestion: 'Use 1 for a sequential run or the number of available cores' }
    );
  }
}

function assertYieldEvery(yieldEveryRecords: number): void {
  if (!Number.isSafeInteger(yieldEveryRecords) || yieldEveryRecords <= 0) {
    throw new InvalidConfigurationError(
      `yieldEveryRecords must be a positive integer, got ${yieldEveryRecords}`,
      'scheduler.yieldEveryRecords'
    );
  }
}

async function* fromSource(partitions: Iterable<Partition> | AsyncIterable<Partition>): AsyncGenerator<Partition> {
  yield* partitions;
}

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Apply the stages after the first groupAggregate to the merged result.
 */
async function finishAfterMerge(
  graph: OperationGraph,
  merged: FinalResult,
  yieldEveryRecords: number
): Promise<FinalResult> {
  let result = merged;
  for (const segment of graph.segments().slice(1)) {
    const partial: PartialResult = await applyStages(segment, toRows(result), { yieldEveryRecords });
    result = mergeSegment(segment, [partial]);
  }
  return result;
}

/**
 * Evaluate `graph` over `partitions` with up to `options.concurrency`
 * partition tasks in flight.
 *
 * @throws InvalidConfigurationError for a bad concurrency, before anything runs
 * @throws PartitionFailure when one or more partition tasks failed
 * @throws ExecutionCancelledError when the signal aborted the run
 * @throws EvaluationError when the source or a post-merge stage failed
 *
 * @example
 * ```typescript
 * const partitions = partition(records, 10_000);
 * const { result, report } = await run(graph, partitions, { concurrency: 4 });
 * ```
 */
export async function run(
  graph: OperationGraph,
  partitions: Iterable<Partition> | AsyncIterable<Partition>,
  options: RunOptions
): Promise<RunResult> {
  const { concurrency, signal } = options;
  const yieldEveryRecords = options.yieldEveryRecords ?? DEFAULT_YIELD_EVERY_RECORDS;
  assertConcurrency(concurrency);
  assertYieldEvery(yieldEveryRecords);
  if (signal?.aborted) {
    throw new ExecutionCancelledError('Execution cancelled before it started');
  }

  const logger: Logger = options.logger ?? createNoopLogger();
  const monitor = options.monitor ?? new ExecutionMonitor({ metrics: options.metrics });
  const observers: ExecutionObserver[] = [monitor, ...(options.observers ?? [])];
  const finish = (status: RunEndEvent['status']): void => {
    for (const observer of observers) observer.onRunEnd?.({ status });
  };

  const partitionCount = Array.isArray(partitions) ? partitions.length : undefined;
  for (const observer of observers) observer.onRunStart?.({ concurrency, partitionCount });
  logger.info('Run started', {
    operation: 'run',
    concurrency,
    ...(partitionCount !== undefined && { partitionCount }),
  });

  const source = fromSource(partitions);
  const partials: PartialResult[] = [];
  const failures: PartitionTaskFailure[] = [];
  const state: { cancelled: boolean; exhausted: boolean; sourceError?: Error; observerError?: Error } = {
    cancelled: false,
    exhausted: false,
  };

  // An observer that throws stops dispatch; the run rejects with its error once tasks settle
  const notify = (call: (observer: ExecutionObserver) => void): void => {
    for (const observer of observers) {
      try {
        call(observer);
      } catch (thrown) {
        state.observerError ??= toError(thrown);
      }
    }
  };

  const runTask = async (task: Partition, workerId: number): Promise<void> => {
    const started = { partitionIndex: task.index, workerId, recordsIn: task.records.length };
    notify(observer => observer.onTaskStart?.(started));
    logger.debug('Partition task started', { operation: 'partition', ...started });

    let outcome: { partial: PartialResult } | { error: Error };
    try {
      outcome = { partial: await executePartition(graph, task, { yieldEveryRecords }) };
    } catch (thrown) {
      outcome = { error: toError(thrown) };
    }

    if ('partial' in outcome) {
      partials.push(outcome.partial);
      const recordsOut = partialSize(outcome.partial);
      notify(observer => observer.onTaskEnd?.({ ...started, status: 'succeeded', recordsOut }));
      logger.debug('Partition task finished', { operation: 'partition', ...started, recordsOut });
      return;
    }

    const { error } = outcome;
    failures.push({ partitionIndex: task.index, error });
    notify(observer => observer.onTaskEnd?.({ ...started, status: 'failed', recordsOut: 0, error }));
    logger.warn('Partition task failed', {
      operation: 'partition',
      ...started,
      errorCode: errorCode(error),
      reason: error.message,
    });
  };

  const worker = async (workerId: number): Promise<void> => {
    for (;;) {
      if (signal?.aborted) {
        state.cancelled = true;
        return;
      }
      if (state.observerError) return;
      let next: IteratorResult<Partition>;
      try {
        next = await source.next();
      } catch (thrown) {
        state.sourceError ??= toError(thrown);
        state.exhausted = true;
        return;
      }
      if (next.done) {
        state.exhausted = true;
        return;
      }
      if (signal?.aborted) {
        state.cancelled = true;
        return;
      }
      await runTask(next.value, workerId);
    }
  };

  await Promise.all(Array.from({ length: concurrency }, (_, workerId) => worker(workerId)));
  if (!state.exhausted) {
    await source.return(undefined);
  }

  if (state.cancelled) {
    logger.warn('Run cancelled', { operation: 'run', completed: partials.length, failed: failures.length });
    finish('cancelled');
    throw new ExecutionCancelledError(
      `Execution cancelled after ${partials.length + failures.length} partition task(s)`,
      { details: { completed: partials.length, failed: failures.length } }
    );
  }
  const { sourceError } = state;
  if (sourceError) {
    logger.warn('Partition source failed', { operation: 'run', reason: sourceError.message });
    finish('failed');
    throw sourceError;
  }
  const { observerError } = state;
  if (observerError) {
    logger.warn('Observer failed', { operation: 'run', reason: observerError.message });
    finish('failed');
    throw observerError;
  }
  if (failures.length > 0) {
    const failure = new PartitionFailure(failures, partials.length);
    logger.warn('Run failed', { operation: 'run', errorCode: failure.code, reason: failure.message });
    finish('failed');
    throw failure;
  }

  let result: FinalResult;
  try {
    result = await finishAfterMerge(graph, mergeSegment(graph.segments()[0], partials), yieldEveryRecords);
  } catch (thrown) {
    const error = toError(thrown);
    logger.warn('Merge failed', { operation: 'merge', reason: error.message });
    finish('failed');
    throw error;
  }
  finish('succeeded');

  const report = monitor.buildReport();
  logger.info('Run finished', {
    operation: 'run',
    concurrency,
    partitionCount: report.partitionCount,
    durationMs: report.totalDurationMs,
    recordsOut: result.kind === 'rows' ? result.rows.length : result.groups.size,
  });

  return { result, report };
}
