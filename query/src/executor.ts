/**
 * Partition executor
 *
 * Applies one segment of an operation graph to a block of records. Record
 * order is kept for row results; aggregating segments fold rows into one
 * accumulator set per group. The loop yields to the event loop every
 * `yieldEveryRecords` records so concurrent tasks interleave.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { ErrorCode, EvaluationError, findRowProblem, toError, type Partition, type Row } from '@shardflow/core';
import { accumulate, createAccumulator, type AccumulatorState } from './accumulators.js';
import type { OperationGraph } from './graph.js';
import type {
  ExecuteOptions,
  FilterNode,
  GroupAggregateNode,
  GroupState,
  MapNode,
  PartialResult,
  Segment,
} from './types.js';
import { encodeGroupKey } from './merger.js';

export const DEFAULT_YIELD_EVERY_RECORDS = 1_000;

export interface ApplyStagesOptions extends ExecuteOptions {
  /** Partition the records came from; omitted for post-merge segments */
  partitionIndex?: number;
  /** Check each record against the segment's input schema before its stages run */
  checkRecords?: boolean;
}

function malformedRecord(problem: string, recordIndex: number, record: Row, partitionIndex: number | undefined): EvaluationError {
  const where = partitionIndex === undefined ? `Merged row ${recordIndex}` : `Record ${recordIndex} of partition ${partitionIndex}`;
  return new EvaluationError(
    `${where} does not match the input schema: ${problem}`,
    { partitionIndex, recordIndex, record },
    ErrorCode.MALFORMED_RECORD
  );
}

function stageFailure(
  error: unknown,
  stage: FilterNode | MapNode,
  recordIndex: number,
  record: Row,
  partitionIndex: number | undefined
): EvaluationError {
  const cause = toError(error);
  const where = partitionIndex === undefined ? `merged row ${recordIndex}` : `record ${recordIndex} of partition ${partitionIndex}`;
  return new EvaluationError(`${stage.label} failed on ${where}: ${cause.message}`, {
    partitionIndex,
    recordIndex,
    record,
    stage: stage.label,
    cause,
  });
}

function applyRowStages(
  stages: readonly (FilterNode | MapNode)[],
  record: Row,
  recordIndex: number,
  partitionIndex: number | undefined
): Row | undefined {
  let row = record;
  for (const stage of stages) {
    try {
      if (stage.kind === 'filter') {
        if (!stage.test(row)) return undefined;
      } else {
        row = stage.project(row);
      }
    } catch (error) {
      throw stageFailure(error, stage, recordIndex, row, partitionIndex);
    }
  }
  return row;
}

function foldIntoGroup(groups: Map<string, GroupState>, aggregate: GroupAggregateNode, row: Row): void {
  const key = aggregate.keyColumns.map(column => row[column]);
  const encoded = encodeGroupKey(key);

  let group = groups.get(encoded);
  if (!group) {
    const accumulators: Record<string, AccumulatorState> = {};
    for (const spec of aggregate.aggregates) {
      accumulators[spec.output] = createAccumulator(spec.kind);
    }
    group = { key, accumulators };
    groups.set(encoded, group);
  }

  for (const spec of aggregate.aggregates) {
    accumulate(group.accumulators[spec.output], spec.read(row));
  }
}

/**
 * Apply a segment to records. Filter and map stages run first, in order;
 * an aggregating segment then folds the surviving rows into groups.
 *
 * @throws EvaluationError naming the stage, record and partition that failed,
 *   or MALFORMED_RECORD when `checkRecords` is set and a record breaks the schema
 */
export async function applyStages(
  segment: Segment,
  records: readonly Row[],
  options: ApplyStagesOptions = {}
): Promise<PartialResult> {
  const yieldEvery = options.yieldEveryRecords ?? DEFAULT_YIELD_EVERY_RECORDS;
  const partitionIndex = options.partitionIndex;
  const { aggregate, rowStages } = segment;

  const rows: Row[] = [];
  const groups = new Map<string, GroupState>();

  for (let i = 0; i < records.length; i++) {
    if (i > 0 && i % yieldEvery === 0) {
      await yieldToEventLoop();
    }

    if (options.checkRecords) {
      const problem = findRowProblem(records[i], segment.inputSchema);
      if (problem !== null) throw malformedRecord(problem, i, records[i], partitionIndex);
    }

    const row = applyRowStages(rowStages, records[i], i, partitionIndex);
    if (row === undefined) continue;

    if (aggregate) {
      foldIntoGroup(groups, aggregate, row);
    } else {
      rows.push(row);
    }
  }

  const index = partitionIndex ?? 0;
  return aggregate
    ? { kind: 'groups', partitionIndex: index, groups }
    : { kind: 'rows', partitionIndex: index, rows };
}

/**
 * Evaluate the per-partition part of a graph (everything up to and
 * including its first groupAggregate) on one partition. Every record is
 * checked against the graph's source schema.
 *
 * @throws EvaluationError
 */
export async function executePartition(
  graph: OperationGraph,
  partition: Partition,
  options: ExecuteOptions = {}
): Promise<PartialResult> {
  const [segment] = graph.segments();
  return applyStages(segment, partition.records, { ...options, partitionIndex: partition.index, checkRecords: true });
}

/**
 * Rows or groups a partial result carries
 */
export function partialSize(partial: PartialResult): number {
  return partial.kind === 'rows' ? partial.rows.length : partial.groups.size;
}
