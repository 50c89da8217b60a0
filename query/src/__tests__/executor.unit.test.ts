/**
 * Partition executor tests
 */

import { describe, it, expect } from 'vitest';
import { ErrorCode, EvaluationError, defineSchema, type Partition, type Row } from '@shardflow/core';
import { OperationGraph } from '../graph.js';
import { executePartition, partialSize } from '../executor.js';
import { encodeGroupKey } from '../merger.js';
import type { PartialResult, RowPredicate } from '../types.js';

const schema = defineSchema([
  { name: 'id', type: 'integer', nullable: false },
  { name: 'amount', type: 'float' },
  { name: 'region', type: 'text' },
]);

const records: Row[] = [
  { id: 0, amount: 10, region: 'north' },
  { id: 1, amount: -5, region: 'south' },
  { id: 2, amount: 7.5, region: 'north' },
  { id: 3, amount: null, region: 'south' },
];

const block: Partition = { index: 3, records };
const source = OperationGraph.from(schema);

async function evaluationErrorOf(pending: Promise<PartialResult>): Promise<EvaluationError> {
  try {
    await pending;
  } catch (error) {
    if (error instanceof EvaluationError) return error;
    throw error;
  }
  throw new Error('expected an EvaluationError');
}

describe('executePartition', () => {
  it('filters rows in record order', async () => {
    const graph = source.filter({ column: 'amount', operator: 'gt', value: 0 });

    const partial = await executePartition(graph, block);

    expect(partial).toEqual({ kind: 'rows', partitionIndex: 3, rows: [records[0], records[2]] });
    expect(partialSize(partial)).toBe(2);
  });

  it('applies stages in declared order', async () => {
    const graph = source
      .filter({ column: 'region', operator: 'eq', value: 'north' })
      .map({ id: 'id', doubled: { type: 'float', compute: row => Number(row.amount) * 2 } })
      .filter({ column: 'doubled', operator: 'lt', value: 20 });

    const partial = await executePartition(graph, block);

    expect(partial).toEqual({ kind: 'rows', partitionIndex: 3, rows: [{ id: 2, doubled: 15 }] });
  });

  it('folds rows into one accumulator set per group', async () => {
    const graph = source.groupAggregate(['region'], {
      total: { column: 'amount', kind: 'sum' },
      rows: { kind: 'count' },
      priced: { column: 'amount', kind: 'count' },
    });

    const partial = await executePartition(graph, block);

    expect(partial.kind).toBe('groups');
    if (partial.kind !== 'groups') return;
    expect(partial.groups.get(encodeGroupKey(['north']))).toEqual({
      key: ['north'],
      accumulators: {
        total: { kind: 'sum', sum: 17.5 },
        rows: { kind: 'count', count: 2 },
        priced: { kind: 'count', count: 2 },
      },
    });
    expect(partial.groups.get(encodeGroupKey(['south']))).toEqual({
      key: ['south'],
      accumulators: {
        total: { kind: 'sum', sum: -5 },
        rows: { kind: 'count', count: 2 },
        priced: { kind: 'count', count: 1 },
      },
    });
  });

  it('returns an empty partial when every row is filtered out', async () => {
    const graph = source
      .filter({ column: 'amount', operator: 'gt', value: 1000 })
      .groupAggregate(['region'], { n: { kind: 'count' } });

    const partial = await executePartition(graph, block);

    expect(partialSize(partial)).toBe(0);
  });

  it('rejects records that break the source schema before any stage runs', async () => {
    const graph = source
      .filter({ column: 'amount', operator: 'gt', value: 0 })
      .groupAggregate(['region'], { total: { column: 'amount', kind: 'sum' } });
    const malformed: Partition = {
      index: 5,
      records: [
        { id: 0, amount: 5, region: 'north' },
        { id: 1, amount: 'abc', region: 'north' },
      ],
    };

    const error = await evaluationErrorOf(executePartition(graph, malformed));

    expect(error.code).toBe(ErrorCode.MALFORMED_RECORD);
    expect(error.message).toBe(
      'Record 1 of partition 5 does not match the input schema: column "amount" expects nullable float, got text'
    );
    expect(error.partitionIndex).toBe(5);
    expect(error.recordIndex).toBe(1);
    expect(error.record).toEqual({ id: 1, amount: 'abc', region: 'north' });
  });

  it('rejects records carrying undeclared columns', async () => {
    const extra: Partition = { index: 0, records: [{ id: 0, amount: 1, region: 'north', note: 'x' }] };

    const error = await evaluationErrorOf(executePartition(source, extra));

    expect(error.code).toBe(ErrorCode.MALFORMED_RECORD);
    expect(error.message).toBe('Record 0 of partition 0 does not match the input schema: unexpected column "note"');
  });

  it('names the partition, record and stage of a failing predicate', async () => {
    const rejectTwo: RowPredicate = row => {
      if (row.id === 2) throw new Error('boom');
      return true;
    };

    const error = await evaluationErrorOf(executePartition(source.filter(rejectTwo), block));

    expect(error.message).toBe('filter(rejectTwo) failed on record 2 of partition 3: boom');
    expect(error.partitionIndex).toBe(3);
    expect(error.recordIndex).toBe(2);
    expect(error.record).toEqual(records[2]);
    expect(error.stage).toBe('filter(rejectTwo)');
  });

  it('rejects predicates that return a non-boolean', async () => {
    function sloppy(row: Row): boolean {
      return JSON.parse(row.id === 0 ? 'true' : '1');
    }

    const error = await evaluationErrorOf(executePartition(source.filter(sloppy), block));

    expect(error.message).toBe('filter(sloppy) failed on record 1 of partition 3: Predicate returned integer, expected boolean');
  });

  it('rejects reads of undeclared columns', async () => {
    const misspelt: RowPredicate = row => row.regoin === 'north';

    const error = await evaluationErrorOf(executePartition(source.filter(misspelt), block));

    expect(error.message).toBe('filter(misspelt) failed on record 0 of partition 3: Read of undeclared column "regoin"');
  });

  it('type-checks computed columns', async () => {
    const graph = source.map({ label: { type: 'integer', nullable: false, compute: row => String(row.region) } });

    const error = await evaluationErrorOf(executePartition(graph, block));

    expect(error.message).toBe(
      'map(label: integer) failed on record 0 of partition 3: Column "label" expects integer, got text'
    );
  });

  it('yields between record batches so partitions interleave', async () => {
    const tagged = defineSchema([{ name: 'tag', type: 'text' }]);
    const seen: string[] = [];
    const graph = OperationGraph.from(tagged).filter(row => {
      seen.push(String(row.tag));
      return true;
    });
    const make = (index: number, prefix: string): Partition => ({
      index,
      records: [0, 1, 2, 3].map(i => ({ tag: `${prefix}${i}` })),
    });

    await Promise.all([
      executePartition(graph, make(0, 'a'), { yieldEveryRecords: 2 }),
      executePartition(graph, make(1, 'b'), { yieldEveryRecords: 2 }),
    ]);

    expect(seen).toEqual(['a0', 'a1', 'b0', 'b1', 'a2', 'a3', 'b2', 'b3']);
  });
});
