/**
 * @shardflow/query - Lazy operation graphs over partitioned records
 *
 * Build a graph of filter, map and group-aggregate stages, evaluate it per
 * partition on a bounded worker pool and merge the partial results.
 *
 * @example
 * ```typescript
 * import { defineSchema, partition } from '@shardflow/core';
 * import { OperationGraph, run, toRows } from '@shardflow/query';
 *
 * const schema = defineSchema([
 *   { name: 'amount', type: 'float' },
 *   { name: 'region', type: 'text' },
 * ]);
 *
 * const graph = OperationGraph.from(schema)
 *   .filter({ column: 'amount', operator: 'gt', value: 0 })
 *   .groupAggregate(['region'], {
 *     total: { column: 'amount', kind: 'sum' },
 *     count: { kind: 'count' },
 *   });
 *
 * const { result, report } = await run(graph, partition(records, 100), { concurrency: 4 });
 * console.log(toRows(result), report.totalDurationMs);
 * ```
 */

// =============================================================================
// Type Exports
// =============================================================================

export type {
  ComparisonOperator,
  PredicateOperator,
  ColumnPredicate,
  RowPredicate,
  Predicate,
  ComputedColumn,
  Projection,
  AggregateKind,
  AggregateSpec,
  AggregateSpecs,
  CompiledAggregate,
  SourceNode,
  FilterNode,
  MapNode,
  GroupAggregateNode,
  OperationNode,
  StageNode,
  Segment,
  GroupState,
  RowsPartialResult,
  GroupsPartialResult,
  PartialResult,
  GroupRow,
  RowsResult,
  GroupsResult,
  FinalResult,
  ExecuteOptions,
  RunOptions,
  RunResult,
} from './types.js';

export { AGGREGATE_KINDS } from './types.js';

// =============================================================================
// Graph
// =============================================================================

export { OperationGraph } from './graph.js';
export { compilePredicate, createRowGuard, type CompiledPredicate } from './predicates.js';

// =============================================================================
// Execution
// =============================================================================

export {
  createAccumulator,
  accumulate,
  combineAccumulators,
  finalizeAccumulator,
  type AccumulatorState,
  type CountState,
  type SumState,
  type MinState,
  type MaxState,
  type AverageState,
} from './accumulators.js';

export {
  executePartition,
  applyStages,
  partialSize,
  DEFAULT_YIELD_EVERY_RECORDS,
  type ApplyStagesOptions,
} from './executor.js';

export { mergePartialResults, mergeSegment, encodeGroupKey, toRows } from './merger.js';

export { run, assertConcurrency } from './scheduler.js';

export { createEngine, type Engine, type EngineOptions, type EngineRunOptions } from './engine.js';
