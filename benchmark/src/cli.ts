/**
 * @shardflow/benchmark CLI
 *
 * Generates synthetic transactions and compares parallel runs of a
 * benchmark graph against the sequential baseline.
 *
 *   shardflow-bench --records 1000000 --partition-size 50000 --concurrency 2,4,8
 *
 * Defaults for partition size, yield interval and logging come from
 * SHARDFLOW_* environment variables; flags override them.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { createLogger, formatLogEntry, LogLevels, type LogLevel } from '@shardflow/core';
import { assertValidConfig, createConfig, getConfigFromEnv } from '@shardflow/config';
import { formatComparison, runComparison, type ComparisonFormat } from './comparison.js';
import { generateTransactions } from './generators/transactions.js';
import { BENCHMARK_GRAPHS, isBenchmarkGraphName } from './graphs.js';

export interface CliIo {
  out(text: string): void;
  err(text: string): void;
  env?: Record<string, string | undefined>;
}

interface CliOptions {
  records: number;
  partitionSize?: number;
  concurrency?: number[];
  seed: number;
  graph: string;
  format: ComparisonFormat;
  logLevel?: LogLevel;
}

const DEFAULT_LEVELS: readonly number[] = [2, 4, 8];

const consoleIo: CliIo = {
  out: text => console.log(text),
  err: text => console.error(text),
};

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Expected an integer.');
  }
  return parsed;
}

function collectLevels(value: string, previous: number[] | undefined): number[] {
  return [...(previous ?? []), ...value.split(',').map(level => parsePositiveInteger(level.trim()))];
}

function parseLogLevel(value: string): LogLevel {
  if (!LogLevels.isLogLevel(value)) {
    throw new InvalidArgumentError('Expected one of debug, info, warn, error.');
  }
  return value;
}

export function createProgram(io: CliIo = consoleIo): Command {
  const program = new Command();

  program
    .name('shardflow-bench')
    .description('Compare parallel partition runs against the sequential baseline')
    .version('0.1.0')
    .option('-n, --records <count>', 'Number of generated transactions', parsePositiveInteger, 100_000)
    .option('-p, --partition-size <size>', 'Target records per partition', parsePositiveInteger)
    .option('-c, --concurrency <levels>', 'Concurrency levels, comma-separated or repeated (default: 2,4,8)', collectLevels)
    .option('--seed <seed>', 'Generator seed', parseInteger, 42)
    .addOption(
      new Option('-g, --graph <name>', 'Benchmark graph')
        .choices(Object.keys(BENCHMARK_GRAPHS))
        .default('sales-by-region')
    )
    .addOption(new Option('-f, --format <format>', 'Output format').choices(['json', 'pretty']).default('pretty'))
    .option('--log-level <level>', 'Minimum log level', parseLogLevel)
    .action(async (options: CliOptions) => {
      const config = createConfig(
        {
          partition: { targetPartitionSize: options.partitionSize },
          observability: { logLevel: options.logLevel },
        },
        getConfigFromEnv({ env: io.env })
      );
      assertValidConfig(config);

      if (!isBenchmarkGraphName(options.graph)) {
        throw new InvalidArgumentError(`Unknown graph "${options.graph}".`);
      }

      const logger = createLogger({
        minLevel: config.observability.logLevel,
        output: entry => io.err(formatLogEntry(entry, config.observability.logFormat)),
      });

      const records = [...generateTransactions({ count: options.records, seed: options.seed })];
      logger.info('Generated transactions', { count: records.length, seed: options.seed });

      const comparison = await runComparison({
        records,
        graph: BENCHMARK_GRAPHS[options.graph](),
        targetPartitionSize: config.partition.targetPartitionSize,
        concurrencyLevels: options.concurrency ?? DEFAULT_LEVELS,
        yieldEveryRecords: config.scheduler.yieldEveryRecords,
        logger,
      });

      io.out(formatComparison(comparison, options.format));
    });

  return program;
}
