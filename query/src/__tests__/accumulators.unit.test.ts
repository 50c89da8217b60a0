/**
 * Accumulator tests: folding, combining and finalising every aggregate kind
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { MergeError, type Scalar } from '@shardflow/core';
import {
  accumulate,
  combineAccumulators,
  createAccumulator,
  finalizeAccumulator,
  type AccumulatorState,
} from '../accumulators.js';
import { AGGREGATE_KINDS, type AggregateKind } from '../types.js';

function fold(kind: AggregateKind, values: readonly Scalar[]): AccumulatorState {
  const state = createAccumulator(kind);
  for (const value of values) accumulate(state, value);
  return state;
}

describe('accumulate / finalizeAccumulator', () => {
  it('counts non-null values', () => {
    expect(finalizeAccumulator(fold('count', [1, null, 'x']))).toBe(2);
  });

  it('sums numbers and skips nulls', () => {
    expect(finalizeAccumulator(fold('sum', [3, null, 4]))).toBe(7);
  });

  it('averages as sum over count', () => {
    const state = fold('average', [2, 4, null]);

    expect(state).toEqual({ kind: 'average', sum: 6, count: 2 });
    expect(finalizeAccumulator(state)).toBe(3);
  });

  it('orders text and timestamps for min and max', () => {
    expect(finalizeAccumulator(fold('min', ['b', 'a', 'c']))).toBe('a');
    expect(finalizeAccumulator(fold('max', ['b', 'a', 'c']))).toBe('c');
    expect(finalizeAccumulator(fold('max', [new Date(5), new Date(9), new Date(1)]))).toEqual(new Date(9));
  });

  it('finalises empty accumulators', () => {
    expect(finalizeAccumulator(createAccumulator('count'))).toBe(0);
    expect(finalizeAccumulator(createAccumulator('sum'))).toBe(0);
    expect(finalizeAccumulator(createAccumulator('average'))).toBeNull();
    expect(finalizeAccumulator(createAccumulator('min'))).toBeNull();
    expect(finalizeAccumulator(createAccumulator('max'))).toBeNull();
  });
});

describe('combineAccumulators', () => {
  it('combines without modifying its inputs', () => {
    const left = fold('count', [1, 1]);
    const right = fold('count', [1, 1, 1]);

    expect(combineAccumulators(left, right)).toEqual({ kind: 'count', count: 5 });
    expect(left).toEqual({ kind: 'count', count: 2 });
    expect(right).toEqual({ kind: 'count', count: 3 });
  });

  it('treats an empty min as identity', () => {
    expect(combineAccumulators(createAccumulator('min'), fold('min', [5]))).toEqual({ kind: 'min', value: 5 });
    expect(combineAccumulators(fold('max', [5]), createAccumulator('max'))).toEqual({ kind: 'max', value: 5 });
  });

  it('rejects accumulators of different kinds', () => {
    expect(() => combineAccumulators(createAccumulator('sum'), createAccumulator('average'))).toThrow(MergeError);
    expect(() => combineAccumulators(createAccumulator('sum'), createAccumulator('average'))).toThrow(
      'Cannot combine a sum accumulator with a average accumulator'
    );
  });

  it('equals a single fold for any split of the input', () => {
    fc.assert(
      fc.property(
        fc.constantFrom(...AGGREGATE_KINDS),
        fc.array(fc.oneof(fc.integer({ min: -1000, max: 1000 }), fc.constant(null)), { maxLength: 50 }),
        fc.nat(),
        (kind, values, cut) => {
          const at = values.length === 0 ? 0 : cut % (values.length + 1);
          const whole = finalizeAccumulator(fold(kind, values));
          const left = fold(kind, values.slice(0, at));
          const right = fold(kind, values.slice(at));

          expect(finalizeAccumulator(combineAccumulators(left, right))).toEqual(whole);
          expect(finalizeAccumulator(combineAccumulators(right, left))).toEqual(whole);
        }
      )
    );
  });

  it('is associative', () => {
    fc.assert(
      fc.property(
        fc.constantFrom(...AGGREGATE_KINDS),
        fc.array(fc.integer({ min: -100, max: 100 }), { maxLength: 10 }),
        fc.array(fc.integer({ min: -100, max: 100 }), { maxLength: 10 }),
        fc.array(fc.integer({ min: -100, max: 100 }), { maxLength: 10 }),
        (kind, a, b, c) => {
          const [x, y, z] = [fold(kind, a), fold(kind, b), fold(kind, c)];

          expect(combineAccumulators(combineAccumulators(x, y), z)).toEqual(
            combineAccumulators(x, combineAccumulators(y, z))
          );
        }
      )
    );
  });
});
