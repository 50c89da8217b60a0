/**
 * Execution observer hooks
 *
 * The scheduler calls these while it runs; the Execution Monitor in
 * @shardflow/observability implements them. Observers never see or alter
 * partial results.
 */

import type { PartitionTaskStatus } from './types.js';

export interface RunStartEvent {
  concurrency: number;
  /** Known up front only when partitions were passed as an array */
  partitionCount?: number;
}

export interface TaskStartEvent {
  partitionIndex: number;
  workerId: number;
  recordsIn: number;
}

export interface TaskEndEvent extends TaskStartEvent {
  status: PartitionTaskStatus;
  recordsOut: number;
  error?: Error;
}

export interface RunEndEvent {
  /** Whether the run produced a result */
  status: 'succeeded' | 'failed' | 'cancelled';
}

/**
 * Hooks invoked by the scheduler. All are optional and synchronous.
 */
export interface ExecutionObserver {
  onRunStart?(event: RunStartEvent): void;
  onTaskStart?(event: TaskStartEvent): void;
  onTaskEnd?(event: TaskEndEvent): void;
  onRunEnd?(event: RunEndEvent): void;
}

