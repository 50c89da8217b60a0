/**
 * @shardflow/core - Partitioner
 *
 * Splits a forward-only record stream into bounded-size partitions. At most
 * `targetPartitionSize` records are buffered before the partition is handed
 * to the consumer, so the input never has to fit in memory.
 *
 * @example
 * ```typescript
 * import { partition } from '@shardflow/core';
 *
 * for (const part of partition(records, 10_000)) {
 *   console.log(part.index, part.records.length);
 * }
 * ```
 */

import type { Partition, Row } from './types.js';
import { InvalidConfigurationError } from './errors.js';

/**
 * Validate a partition size. Exported so callers can fail before opening a
 * source.
 *
 * @throws InvalidConfigurationError unless the size is a positive safe integer
 */
export function assertPartitionSize(targetPartitionSize: number): void {
  if (!Number.isSafeInteger(targetPartitionSize) || targetPartitionSize <= 0) {
    throw new InvalidConfigurationError(
      `targetPartitionSize must be a positive integer, got ${targetPartitionSize}`,
      'partition.targetPartitionSize',
      { suggestion: 'Use a size between a few thousand and a few hundred thousand records' }
    );
  }
}

function freezePartition(index: number, records: Row[]): Partition {
  return Object.freeze({ index, records: Object.freeze(records) });
}

/**
 * Partition a synchronous record sequence.
 *
 * The size is validated when called, before the first record is read. The
 * returned generator yields partitions in emission order with contiguous
 * indices from zero; only the last may be short. An empty input yields nothing.
 *
 * @throws InvalidConfigurationError if `targetPartitionSize` is not positive
 */
export function partition(records: Iterable<Row>, targetPartitionSize: number): Generator<Partition> {
  assertPartitionSize(targetPartitionSize);
  return partitionGenerator(records, targetPartitionSize);
}

function* partitionGenerator(records: Iterable<Row>, size: number): Generator<Partition> {
  let index = 0;
  let buffer: Row[] = [];

  for (const record of records) {
    buffer.push(record);
    if (buffer.length === size) {
      yield freezePartition(index++, buffer);
      buffer = [];
    }
  }

  if (buffer.length > 0) {
    yield freezePartition(index, buffer);
  }
}

/**
 * Partition an asynchronous (or synchronous) record source, such as a file
 * reader.
 *
 * @throws InvalidConfigurationError if `targetPartitionSize` is not positive
 */
export function partitionAsync(
  records: AsyncIterable<Row> | Iterable<Row>,
  targetPartitionSize: number
): AsyncGenerator<Partition> {
  assertPartitionSize(targetPartitionSize);
  return partitionAsyncGenerator(records, targetPartitionSize);
}

async function* partitionAsyncGenerator(
  records: AsyncIterable<Row> | Iterable<Row>,
  size: number
): AsyncGenerator<Partition> {
  let index = 0;
  let buffer: Row[] = [];

  for await (const record of records) {
    buffer.push(record);
    if (buffer.length === size) {
      yield freezePartition(index++, buffer);
      buffer = [];
    }
  }

  if (buffer.length > 0) {
    yield freezePartition(index, buffer);
  }
}

/**
 * Materialise every partition of an in-memory sequence.
 */
export function collectPartitions(records: Iterable<Row>, targetPartitionSize: number): Partition[] {
  return Array.from(partition(records, targetPartitionSize));
}

/**
 * Number of partitions `recordCount` records produce at a given size.
 */
export function partitionCount(recordCount: number, targetPartitionSize: number): number {
  assertPartitionSize(targetPartitionSize);
  return Math.ceil(recordCount / targetPartitionSize);
}
