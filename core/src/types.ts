/**
 * @shardflow/core - Data Model Types
 *
 * Records, schemas, partitions and execution reports shared by every
 * shardflow package.
 *
 * @packageDocumentation
 */

// =============================================================================
// Scalars and Columns
// =============================================================================

/**
 * A single column value.
 *
 * Integers and floats are both carried as `number`; timestamps are `Date`
 * instances. `null` marks a missing value.
 */
export type Scalar = number | string | boolean | Date | null;

/**
 * Declared column types
 */
export type ColumnType = 'integer' | 'float' | 'text' | 'timestamp' | 'boolean';

/**
 * All column types, in declaration order
 */
export const COLUMN_TYPES: readonly ColumnType[] = [
  'integer',
  'float',
  'text',
  'timestamp',
  'boolean',
] as const;

/**
 * A column in a dataset schema
 */
export interface ColumnDefinition {
  /** Column name, unique within the schema */
  readonly name: string;
  /** Value type for every record in the dataset */
  readonly type: ColumnType;
  /** Whether null is an accepted value (default: true) */
  readonly nullable: boolean;
}

/**
 * Column declaration accepted by defineSchema()
 */
export interface ColumnInput {
  name: string;
  type: ColumnType;
  nullable?: boolean;
}

/**
 * Fixed, ordered set of columns shared by all records of a dataset.
 */
export interface Schema {
  readonly columns: readonly ColumnDefinition[];
}

// =============================================================================
// Records and Partitions
// =============================================================================

/**
 * A record: an ordered mapping from column name to scalar value.
 *
 * Insertion order of the keys follows the schema's column order.
 */
export type Row = Readonly<Record<string, Scalar>>;

/**
 * An immutable, contiguous chunk of the input stream.
 *
 * @example
 * ```typescript
 * const first: Partition = { index: 0, records: [{ amount: 10, region: 'north' }] };
 * ```
 */
export interface Partition {
  /** Zero-based index; indices of one input form a contiguous range */
  readonly index: number;
  /** Records in emission order */
  readonly records: readonly Row[];
}

// =============================================================================
// Execution Reports
// =============================================================================

/**
 * Outcome of one partition task
 */
export type PartitionTaskStatus = 'succeeded' | 'failed';

/**
 * Timing of one partition task
 */
export interface PartitionTiming {
  readonly partitionIndex: number;
  /** Pool worker that ran the task */
  readonly workerId: number;
  /** Start offset relative to the run start, in milliseconds */
  readonly startedAtMs: number;
  readonly durationMs: number;
  /** Records read from the partition */
  readonly recordsIn: number;
  /** Rows (or groups, for aggregating graphs) produced */
  readonly recordsOut: number;
  readonly status: PartitionTaskStatus;
}

/**
 * Immutable summary of one graph evaluation.
 */
export interface ExecutionReport {
  /** Wall-clock time from dispatch of the first task to the end of the merge */
  readonly totalDurationMs: number;
  /** Unix epoch milliseconds at run start */
  readonly startedAt: number;
  /** Unix epoch milliseconds at run end */
  readonly finishedAt: number;
  readonly partitionCount: number;
  /** Configured worker pool size */
  readonly concurrency: number;
  /** Highest number of partition tasks observed in flight at once */
  readonly peakConcurrency: number;
  /** Per-partition timings, ordered by partition index */
  readonly partitionTimings: readonly PartitionTiming[];
  readonly succeeded: number;
  readonly failed: number;
}

// =============================================================================
// Utility Types
// =============================================================================

/**
 * Source of records the core can read forward-only
 */
export type RecordSource = Iterable<Row> | AsyncIterable<Row>;
