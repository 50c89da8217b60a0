/**
 * @shardflow/query - Type Definitions
 *
 * Types for building operation graphs, the partial results produced per
 * partition and the final merged result.
 *
 * @packageDocumentation
 * @module @shardflow/query
 */

import type {
  ColumnType,
  ExecutionObserver,
  ExecutionReport,
  Logger,
  Row,
  Scalar,
  Schema,
  SchedulerMetricsCollection,
} from '@shardflow/core';
import type { ExecutionMonitor } from '@shardflow/observability';
import type { AccumulatorState } from './accumulators.js';

// =============================================================================
// Predicates and Projections
// =============================================================================

/**
 * Comparison operators for declarative column predicates.
 */
export type ComparisonOperator = 'eq' | 'ne' | 'gt' | 'gte' | 'lt' | 'lte';

export type PredicateOperator = ComparisonOperator | 'in' | 'notIn' | 'isNull' | 'isNotNull';

/**
 * Declarative predicate over one column, checked against the schema when
 * the graph is built.
 *
 * @example
 * ```typescript
 * const positive: ColumnPredicate = { column: 'amount', operator: 'gt', value: 0 };
 * const coastal: ColumnPredicate = { column: 'region', operator: 'in', value: ['east', 'west'] };
 * ```
 */
export interface ColumnPredicate {
  column: string;
  operator: PredicateOperator;
  /** Comparison value; a list for in/notIn; omitted for isNull/isNotNull */
  value?: Scalar | readonly Scalar[];
}

/**
 * Predicate function. Must return a boolean; any other value fails the
 * record with an EvaluationError.
 */
export type RowPredicate = (row: Row) => boolean;

/**
 * Anything filter() accepts. A list of column predicates is a conjunction.
 */
export type Predicate = RowPredicate | ColumnPredicate | readonly ColumnPredicate[];

/**
 * A projected column computed from the input row.
 */
export interface ComputedColumn {
  type: ColumnType;
  /** Whether compute may return null (default: true) */
  nullable?: boolean;
  compute: (row: Row) => Scalar;
}

/**
 * Output column name to either a source column name (copied as is) or a
 * computed column. Output columns appear in declaration order.
 *
 * @example
 * ```typescript
 * const projection: Projection = {
 *   region: 'region',
 *   amount_cents: { type: 'integer', compute: row => Math.round(Number(row.amount) * 100) },
 * };
 * ```
 */
export type Projection = Record<string, string | ComputedColumn>;

// =============================================================================
// Aggregation
// =============================================================================

export type AggregateKind = 'count' | 'sum' | 'min' | 'max' | 'average';

export const AGGREGATE_KINDS: readonly AggregateKind[] = ['count', 'sum', 'min', 'max', 'average'];

/**
 * One aggregate output. `count` without a column counts rows; with a
 * column it counts non-null values. Other kinds require a column.
 */
export interface AggregateSpec {
  column?: string;
  kind: AggregateKind;
}

/**
 * Output column name to aggregate spec.
 *
 * @example
 * ```typescript
 * const specs: AggregateSpecs = {
 *   total: { column: 'amount', kind: 'sum' },
 *   count: { kind: 'count' },
 * };
 * ```
 */
export type AggregateSpecs = Record<string, AggregateSpec>;

/**
 * An aggregate spec checked against its input schema.
 */
export interface CompiledAggregate {
  readonly output: string;
  readonly kind: AggregateKind;
  readonly column?: string;
  /** Value fed to the accumulator for a row */
  readonly read: (row: Row) => Scalar;
}

// =============================================================================
// Operation Nodes
// =============================================================================

interface NodeBase {
  /** Output schema of this node */
  readonly schema: Schema;
  /** Human-readable form used in plans and error messages */
  readonly label: string;
}

export interface SourceNode extends NodeBase {
  readonly kind: 'source';
}

export interface FilterNode extends NodeBase {
  readonly kind: 'filter';
  readonly upstream: OperationNode;
  /** Throws EvaluationError for a non-boolean result or an undeclared column */
  readonly test: (row: Row) => boolean;
}

export interface MapNode extends NodeBase {
  readonly kind: 'map';
  readonly upstream: OperationNode;
  readonly project: (row: Row) => Row;
}

export interface GroupAggregateNode extends NodeBase {
  readonly kind: 'groupAggregate';
  readonly upstream: OperationNode;
  readonly keyColumns: readonly string[];
  readonly aggregates: readonly CompiledAggregate[];
}

export type OperationNode = SourceNode | FilterNode | MapNode | GroupAggregateNode;

/** Every node but the source */
export type StageNode = FilterNode | MapNode | GroupAggregateNode;

/**
 * A run of stages ending at (and including) a GroupAggregate, or the
 * trailing run without one. The first segment runs per partition; the
 * following ones run once over the merged rows.
 */
export interface Segment {
  readonly inputSchema: Schema;
  readonly outputSchema: Schema;
  /** Filter and map stages, in declared order */
  readonly rowStages: readonly (FilterNode | MapNode)[];
  readonly aggregate?: GroupAggregateNode;
}

// =============================================================================
// Results
// =============================================================================

/**
 * Accumulators of one group inside one partition
 */
export interface GroupState {
  readonly key: readonly Scalar[];
  /** Output column name to accumulator */
  readonly accumulators: Record<string, AccumulatorState>;
}

export interface RowsPartialResult {
  readonly kind: 'rows';
  readonly partitionIndex: number;
  readonly rows: readonly Row[];
}

export interface GroupsPartialResult {
  readonly kind: 'groups';
  readonly partitionIndex: number;
  /** Encoded group key to group state */
  readonly groups: ReadonlyMap<string, GroupState>;
}

export type PartialResult = RowsPartialResult | GroupsPartialResult;

/**
 * One finalised group
 */
export interface GroupRow {
  readonly key: readonly Scalar[];
  /** Aggregate output column to finalised value */
  readonly values: Readonly<Record<string, Scalar>>;
}

export interface RowsResult {
  readonly kind: 'rows';
  readonly schema: Schema;
  readonly rows: readonly Row[];
}

export interface GroupsResult {
  readonly kind: 'groups';
  readonly schema: Schema;
  readonly keyColumns: readonly string[];
  /** Encoded group key to group, in ascending key order */
  readonly groups: ReadonlyMap<string, GroupRow>;
}

export type FinalResult = RowsResult | GroupsResult;

// =============================================================================
// Execution
// =============================================================================

export interface ExecuteOptions {
  /** Records processed between yields to the event loop (default: 1000) */
  yieldEveryRecords?: number;
}

export interface RunOptions extends ExecuteOptions {
  /** Partition tasks in flight at once; 1 is the sequential baseline */
  concurrency: number;
  logger?: Logger;
  /** Monitor that builds the report (default: a fresh ExecutionMonitor) */
  monitor?: ExecutionMonitor;
  /** Extra observers notified alongside the monitor */
  observers?: readonly ExecutionObserver[];
  /** Metrics fed by the default monitor */
  metrics?: SchedulerMetricsCollection;
  /** Stops dispatching new partitions once aborted */
  signal?: AbortSignal;
}

export interface RunResult {
  readonly result: FinalResult;
  readonly report: ExecutionReport;
}
