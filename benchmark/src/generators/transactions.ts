/**
 * @shardflow/benchmark - Transaction Generator
 *
 * Reproducible synthetic transaction records for benchmarks and examples.
 * The same seed and options always produce the same records.
 */

import { defineSchema, InvalidConfigurationError, type Row } from '@shardflow/core';
import { createRandom } from '../utils/random.js';

export const TRANSACTION_SCHEMA = defineSchema([
  { name: 'id', type: 'integer', nullable: false },
  { name: 'amount', type: 'float', nullable: false },
  { name: 'region', type: 'text', nullable: false },
  { name: 'category', type: 'text', nullable: false },
  { name: 'timestamp', type: 'timestamp', nullable: false },
  { name: 'is_refund', type: 'boolean', nullable: false },
]);

export const DEFAULT_REGIONS: readonly string[] = ['north', 'south', 'east', 'west'];

export const DEFAULT_CATEGORIES: readonly string[] = [
  'books',
  'electronics',
  'groceries',
  'garden',
  'toys',
  'apparel',
];

export interface TransactionGeneratorOptions {
  count: number;
  /** Default: 42 */
  seed?: number;
  regions?: readonly string[];
  categories?: readonly string[];
  /** Share of refunds, whose amounts are negative (default: 0.05) */
  refundRate?: number;
  /** Epoch milliseconds of the earliest timestamp (default: 2024-01-01T00:00:00Z) */
  startTime?: number;
  /** Timestamps fall within this many milliseconds of startTime (default: 30 days) */
  spanMs?: number;
}

const DEFAULT_START_TIME = Date.UTC(2024, 0, 1);
const THIRTY_DAYS_MS = 30 * 24 * 60 * 60 * 1000;

/**
 * Lazily generate `count` transactions.
 *
 * Amounts are log-normally distributed around 40 with two decimals.
 *
 * @throws InvalidConfigurationError for a negative count or empty region/category lists
 */
export function generateTransactions(options: TransactionGeneratorOptions): Generator<Row> {
  const { count } = options;
  if (!Number.isSafeInteger(count) || count < 0) {
    throw new InvalidConfigurationError(`count must be a non-negative integer, got ${count}`, 'count');
  }
  const regions = options.regions ?? DEFAULT_REGIONS;
  const categories = options.categories ?? DEFAULT_CATEGORIES;
  if (regions.length === 0 || categories.length === 0) {
    throw new InvalidConfigurationError('regions and categories must not be empty', 'regions');
  }
  return transactions(options, count, regions, categories);
}

function* transactions(
  options: TransactionGeneratorOptions,
  count: number,
  regions: readonly string[],
  categories: readonly string[]
): Generator<Row> {
  const random = createRandom(options.seed ?? 42);
  const refundRate = options.refundRate ?? 0.05;
  const startTime = options.startTime ?? DEFAULT_START_TIME;
  const spanMs = options.spanMs ?? THIRTY_DAYS_MS;

  for (let id = 0; id < count; id++) {
    const isRefund = random.bool(refundRate);
    const magnitude = Math.max(0.01, Math.round(Math.exp(random.gaussian(Math.log(40), 0.8)) * 100) / 100);

    yield {
      id,
      amount: isRefund ? -magnitude : magnitude,
      region: random.pick(regions),
      category: random.pick(categories),
      timestamp: new Date(startTime + random.int(0, spanMs)),
      is_refund: isRefund,
    };
  }
}
