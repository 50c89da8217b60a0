/**
 * Partial result merger
 *
 * Combines the partial results of every partition into the final result.
 * Row partials are concatenated in partition index order; group partials
 * are combined group by group, then finalised and sorted by key. The
 * outcome depends only on the partials, never on the order they arrive in.
 */

import {
  MergeError,
  compareScalarTuples,
  type Row,
  type Scalar,
  type Schema,
} from '@shardflow/core';
import { combineAccumulators, finalizeAccumulator, type AccumulatorState } from './accumulators.js';
import type { OperationGraph } from './graph.js';
import type {
  FinalResult,
  GroupRow,
  GroupState,
  GroupsResult,
  PartialResult,
  Segment,
} from './types.js';

/**
 * Canonical string form of a group key. Timestamps are keyed by epoch
 * milliseconds so equal instants share a group.
 */
export function encodeGroupKey(key: readonly Scalar[]): string {
  return JSON.stringify(key.map(value => (value instanceof Date ? { $ts: value.getTime() } : value)));
}

function combineGroups(target: Map<string, GroupState>, encoded: string, incoming: GroupState): void {
  const existing = target.get(encoded);
  if (!existing) {
    target.set(encoded, { key: incoming.key, accumulators: { ...incoming.accumulators } });
    return;
  }

  const accumulators: Record<string, AccumulatorState> = {};
  for (const [output, state] of Object.entries(existing.accumulators)) {
    const other = incoming.accumulators[output];
    if (other === undefined) {
      throw new MergeError(`Group ${encoded} is missing aggregate "${output}" in one partial result`, { output });
    }
    accumulators[output] = combineAccumulators(state, other);
  }
  target.set(encoded, { key: existing.key, accumulators });
}

/**
 * Merge the partials of one segment.
 *
 * @throws MergeError when a partial does not match the segment's shape
 */
export function mergeSegment(segment: Segment, partials: readonly PartialResult[]): FinalResult {
  const ordered = [...partials].sort((a, b) => a.partitionIndex - b.partitionIndex);
  const expected = segment.aggregate ? 'groups' : 'rows';

  for (const partial of ordered) {
    if (partial.kind !== expected) {
      throw new MergeError(`Partition ${partial.partitionIndex} produced ${partial.kind}, expected ${expected}`, {
        partitionIndex: partial.partitionIndex,
      });
    }
  }

  if (!segment.aggregate) {
    const rows: Row[] = [];
    for (const partial of ordered) {
      if (partial.kind !== 'rows') continue;
      for (const row of partial.rows) rows.push(row);
    }
    return { kind: 'rows', schema: segment.outputSchema, rows };
  }

  const combined = new Map<string, GroupState>();
  for (const partial of ordered) {
    if (partial.kind !== 'groups') continue;
    for (const [encoded, group] of partial.groups) {
      combineGroups(combined, encoded, group);
    }
  }

  const finalized: [string, GroupRow][] = [];
  for (const [encoded, group] of combined) {
    const values: Record<string, Scalar> = {};
    for (const spec of segment.aggregate.aggregates) {
      const state = group.accumulators[spec.output];
      if (state === undefined) {
        throw new MergeError(`Group ${encoded} has no accumulator for "${spec.output}"`, { output: spec.output });
      }
      values[spec.output] = finalizeAccumulator(state);
    }
    finalized.push([encoded, Object.freeze({ key: Object.freeze([...group.key]), values: Object.freeze(values) })]);
  }
  finalized.sort(([, a], [, b]) => compareScalarTuples(a.key, b.key));

  return {
    kind: 'groups',
    schema: segment.outputSchema,
    keyColumns: segment.aggregate.keyColumns,
    groups: new Map(finalized),
  };
}

/**
 * Merge per-partition results of a graph's first segment. Stages after the
 * first groupAggregate are not applied here; the scheduler runs them on
 * the merged rows.
 *
 * @throws MergeError
 */
export function mergePartialResults(graph: OperationGraph, partials: readonly PartialResult[]): FinalResult {
  const [segment] = graph.segments();
  return mergeSegment(segment, partials);
}

function groupToRow(schema: Schema, result: GroupsResult, group: GroupRow): Row {
  const row: Record<string, Scalar> = {};
  result.keyColumns.forEach((column, i) => {
    row[column] = group.key[i];
  });
  for (const column of schema.columns) {
    if (!(column.name in row)) row[column.name] = group.values[column.name] ?? null;
  }
  return row;
}

/**
 * Final result as rows. Groups become one row each, key columns first,
 * in key order.
 */
export function toRows(result: FinalResult): Row[] {
  if (result.kind === 'rows') return [...result.rows];
  return Array.from(result.groups.values(), group => groupToRow(result.schema, result, group));
}
