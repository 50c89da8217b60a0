/**
 * Engine integration tests: configuration, logging and file sources wired
 * through createEngine()
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createConfig } from '@shardflow/config';
import {
  InvalidConfigurationError,
  createTestLogger,
  defineSchema,
  readNdjsonRecords,
  type Row,
} from '@shardflow/core';
import { formatPrometheus } from '@shardflow/observability';
import { createEngine } from '../engine.js';
import { OperationGraph } from '../graph.js';
import { toRows } from '../merger.js';

const schema = defineSchema([
  { name: 'amount', type: 'integer' },
  { name: 'region', type: 'text', nullable: false },
]);

const graph = OperationGraph.from(schema).groupAggregate(['region'], {
  total: { column: 'amount', kind: 'sum' },
  count: { kind: 'count' },
});

function records(count: number): Row[] {
  return Array.from({ length: count }, (_, i) => ({ amount: i, region: i % 2 === 0 ? 'even' : 'odd' }));
}

describe('createEngine', () => {
  it('partitions at the configured size and runs at the configured concurrency', async () => {
    const engine = createEngine({
      config: createConfig({ partition: { targetPartitionSize: 25 }, scheduler: { concurrency: 2 } }),
      logger: createTestLogger(),
    });

    const { result, report } = await engine.run(graph, records(100));

    expect(report.partitionCount).toBe(4);
    expect(report.concurrency).toBe(2);
    expect(toRows(result)).toEqual([
      { region: 'even', total: 2450, count: 50 },
      { region: 'odd', total: 2500, count: 50 },
    ]);
  });

  it('lets a call override the concurrency', async () => {
    const engine = createEngine({ logger: createTestLogger() });

    const { report } = await engine.run(graph, records(10), { concurrency: 1 });

    expect(report.concurrency).toBe(1);
  });

  it('tags log entries with the service name', async () => {
    const logger = createTestLogger();
    const engine = createEngine({ logger });

    await engine.run(graph, records(3));

    const [started] = logger.getLogsByLevel('info');
    expect(started.message).toBe('Run started');
    expect(started.context?.service).toBe('shardflow');
  });

  it('collects metrics when enabled', async () => {
    const engine = createEngine({
      config: createConfig({ partition: { targetPartitionSize: 5 }, observability: { metricsEnabled: true } }),
      logger: createTestLogger(),
    });

    await engine.run(graph, records(12));

    const { metrics } = engine;
    expect(metrics).toBeDefined();
    if (!metrics) return;
    expect(metrics.partitionTasksTotal.labels({ status: 'succeeded' }).get()).toBe(3);
    expect(formatPrometheus(metrics.registry)).toContain('shardflow_partition_tasks_total{status="succeeded"} 3');
  });

  it('creates no metrics when disabled', () => {
    expect(createEngine({ logger: createTestLogger() }).metrics).toBeUndefined();
  });

  it('rejects invalid configuration up front', () => {
    expect(() => createEngine({ config: createConfig({ scheduler: { concurrency: 0 } }) })).toThrow(
      InvalidConfigurationError
    );
  });
});

describe('createEngine with file sources', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'shardflow-engine-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('runs a graph over an NDJSON file', async () => {
    const path = join(dir, 'orders.ndjson');
    await writeFile(
      path,
      [
        '{"amount": 3, "region": "east"}',
        '{"amount": 4, "region": "west"}',
        '',
        '{"amount": null, "region": "east"}',
        '{"amount": 5, "region": "east"}',
      ].join('\n')
    );
    const engine = createEngine({
      config: createConfig({ partition: { targetPartitionSize: 2 } }),
      logger: createTestLogger(),
    });

    const { result, report } = await engine.run(graph, readNdjsonRecords(path, schema));

    expect(report.partitionCount).toBe(2);
    expect(toRows(result)).toEqual([
      { region: 'east', total: 8, count: 3 },
      { region: 'west', total: 4, count: 1 },
    ]);
  });
});
