/**
 * Mergeable aggregate accumulators
 *
 * Each partition task folds its rows into one accumulator per group and
 * aggregate; the merger combines accumulators of the same group across
 * partitions. Combining is associative and commutative, with the fresh
 * accumulator as identity, so the merge order never changes the result.
 *
 * Null inputs are skipped by every kind. `count(*)` reads a constant, so it
 * counts every row.
 */

import { compareScalars, MergeError, type Scalar } from '@shardflow/core';
import type { AggregateKind } from './types.js';

export interface CountState {
  readonly kind: 'count';
  count: number;
}

export interface SumState {
  readonly kind: 'sum';
  sum: number;
}

export interface MinState {
  readonly kind: 'min';
  /** null until a value is seen */
  value: Scalar;
}

export interface MaxState {
  readonly kind: 'max';
  value: Scalar;
}

export interface AverageState {
  readonly kind: 'average';
  sum: number;
  count: number;
}

export type AccumulatorState = CountState | SumState | MinState | MaxState | AverageState;

/**
 * Identity accumulator for a kind.
 */
export function createAccumulator(kind: AggregateKind): AccumulatorState {
  switch (kind) {
    case 'count':
      return { kind, count: 0 };
    case 'sum':
      return { kind, sum: 0 };
    case 'min':
    case 'max':
      return { kind, value: null };
    case 'average':
      return { kind, sum: 0, count: 0 };
  }
}

function numeric(value: Scalar): number {
  return typeof value === 'number' ? value : Number(value);
}

/**
 * Fold one value into a worker-owned accumulator, in place.
 */
export function accumulate(state: AccumulatorState, value: Scalar): void {
  if (value === null) return;

  switch (state.kind) {
    case 'count':
      state.count++;
      break;
    case 'sum':
      state.sum += numeric(value);
      break;
    case 'min':
      if (state.value === null || compareScalars(value, state.value) < 0) state.value = value;
      break;
    case 'max':
      if (state.value === null || compareScalars(value, state.value) > 0) state.value = value;
      break;
    case 'average':
      state.sum += numeric(value);
      state.count++;
      break;
  }
}

function lesser(a: Scalar, b: Scalar): Scalar {
  if (a === null) return b;
  if (b === null) return a;
  return compareScalars(b, a) < 0 ? b : a;
}

function greater(a: Scalar, b: Scalar): Scalar {
  if (a === null) return b;
  if (b === null) return a;
  return compareScalars(b, a) > 0 ? b : a;
}

/**
 * Combine two accumulators of the same kind into a new one. Neither input
 * is modified.
 *
 * @throws MergeError when the kinds differ
 */
export function combineAccumulators(a: AccumulatorState, b: AccumulatorState): AccumulatorState {
  if (a.kind === 'count' && b.kind === 'count') {
    return { kind: 'count', count: a.count + b.count };
  }
  if (a.kind === 'sum' && b.kind === 'sum') {
    return { kind: 'sum', sum: a.sum + b.sum };
  }
  if (a.kind === 'min' && b.kind === 'min') {
    return { kind: 'min', value: lesser(a.value, b.value) };
  }
  if (a.kind === 'max' && b.kind === 'max') {
    return { kind: 'max', value: greater(a.value, b.value) };
  }
  if (a.kind === 'average' && b.kind === 'average') {
    return { kind: 'average', sum: a.sum + b.sum, count: a.count + b.count };
  }
  throw new MergeError(`Cannot combine a ${a.kind} accumulator with a ${b.kind} accumulator`, {
    left: a.kind,
    right: b.kind,
  });
}

/**
 * Final value of an accumulator. An empty sum is 0; an empty average,
 * min or max is null.
 */
export function finalizeAccumulator(state: AccumulatorState): Scalar {
  switch (state.kind) {
    case 'count':
      return state.count;
    case 'sum':
      return state.sum;
    case 'min':
    case 'max':
      return state.value;
    case 'average':
      return state.count === 0 ? null : state.sum / state.count;
  }
}
