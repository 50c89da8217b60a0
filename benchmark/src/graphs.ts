/**
 * @shardflow/benchmark - Benchmark graphs over TRANSACTION_SCHEMA
 */

import { OperationGraph } from '@shardflow/query';
import { TRANSACTION_SCHEMA } from './generators/transactions.js';

/**
 * Sales per region and category, refunds excluded.
 */
export function createSalesByRegionGraph(): OperationGraph {
  return OperationGraph.from(TRANSACTION_SCHEMA)
    .filter([
      { column: 'is_refund', operator: 'eq', value: false },
      { column: 'amount', operator: 'gt', value: 0 },
    ])
    .groupAggregate(['region', 'category'], {
      total: { column: 'amount', kind: 'sum' },
      orders: { kind: 'count' },
      average: { column: 'amount', kind: 'average' },
      largest: { column: 'amount', kind: 'max' },
    });
}

/**
 * Amounts converted to cents with a computed column, then totalled per
 * region. Exercises map stages with user code in every record.
 */
export function createCentsByRegionGraph(): OperationGraph {
  return OperationGraph.from(TRANSACTION_SCHEMA)
    .map({
      region: 'region',
      cents: { type: 'integer', nullable: false, compute: row => Math.round(Number(row.amount) * 100) },
    })
    .groupAggregate(['region'], {
      cents: { column: 'cents', kind: 'sum' },
      smallest: { column: 'cents', kind: 'min' },
    });
}

export const BENCHMARK_GRAPHS = {
  'sales-by-region': createSalesByRegionGraph,
  'cents-by-region': createCentsByRegionGraph,
} as const;

export type BenchmarkGraphName = keyof typeof BENCHMARK_GRAPHS;

export function isBenchmarkGraphName(name: string): name is BenchmarkGraphName {
  return Object.prototype.hasOwnProperty.call(BENCHMARK_GRAPHS, name);
}
