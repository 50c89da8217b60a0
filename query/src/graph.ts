/**
 * Operation graph builder
 *
 * A graph is a chain of stages rooted at a source schema. Every builder
 * call checks its column references against the upstream output schema
 * and returns a new handle; existing handles are never modified, so one
 * prefix can be extended in several directions.
 *
 * Nothing runs while a graph is built. The scheduler evaluates it per
 * partition.
 *
 * @example
 * ```typescript
 * const graph = OperationGraph.from(schema)
 *   .filter({ column: 'amount', operator: 'gt', value: 0 })
 *   .groupAggregate(['region'], {
 *     total: { column: 'amount', kind: 'sum' },
 *     orders: { kind: 'count' },
 *   });
 *
 * console.log(graph.describe());
 * ```
 */

import {
  COLUMN_TYPES,
  ErrorCode,
  EvaluationError,
  SchemaError,
  defineSchema,
  describeValue,
  isNumericType,
  isOrderableType,
  isScalar,
  requireColumn,
  valueFitsColumn,
  type ColumnDefinition,
  type ColumnInput,
  type Row,
  type Scalar,
  type Schema,
} from '@shardflow/core';
import { compilePredicate, createRowGuard } from './predicates.js';
import {
  AGGREGATE_KINDS,
  type AggregateSpecs,
  type CompiledAggregate,
  type ComputedColumn,
  type FilterNode,
  type GroupAggregateNode,
  type MapNode,
  type OperationNode,
  type Predicate,
  type Projection,
  type Segment,
  type SourceNode,
  type StageNode,
} from './types.js';

const COUNT_STAR_VALUE: Scalar = 1;

// =============================================================================
// Stage Compilation
// =============================================================================

function isComputedColumn(spec: unknown): spec is ComputedColumn {
  if (typeof spec !== 'object' || spec === null) return false;
  return (
    'compute' in spec &&
    typeof spec.compute === 'function' &&
    'type' in spec &&
    isColumnType(spec.type)
  );
}

function isColumnType(value: unknown): boolean {
  return COLUMN_TYPES.some(type => type === value);
}

type ProjectedColumn =
  | { readonly name: string; readonly source: string }
  | { readonly name: string; readonly definition: ColumnDefinition; readonly compute: (row: Row) => Scalar };

function buildMapNode(upstream: OperationNode, projection: Projection): MapNode {
  const input = upstream.schema;
  const entries = Object.entries(projection);
  if (entries.length === 0) {
    throw new SchemaError('Projection needs at least one output column');
  }

  const columns: ColumnInput[] = [];
  const parts: string[] = [];
  const projected: ProjectedColumn[] = [];
  let computesAny = false;

  for (const [name, spec] of entries) {
    if (typeof spec === 'string') {
      const source = requireColumn(input, spec, `in map column "${name}"`);
      columns.push({ name, type: source.type, nullable: source.nullable });
      projected.push({ name, source: spec });
      parts.push(name === spec ? name : `${name} = ${spec}`);
    } else if (isComputedColumn(spec)) {
      const definition: ColumnDefinition = { name, type: spec.type, nullable: spec.nullable ?? true };
      columns.push(definition);
      projected.push({ name, definition, compute: spec.compute });
      parts.push(`${name}: ${spec.type}`);
      computesAny = true;
    } else {
      throw new SchemaError(
        `Map column "${name}" must name a source column or give { type, compute }`,
        ErrorCode.SCHEMA_ERROR,
        name
      );
    }
  }

  const schema = defineSchema(columns);
  const label = `map(${parts.join(', ')})`;
  const guard = createRowGuard(input);

  const project = (row: Row): Row => {
    const view = computesAny ? guard(row) : row;
    const output: Record<string, Scalar> = {};

    for (const column of projected) {
      if ('source' in column) {
        output[column.name] = row[column.source];
        continue;
      }
      const value: unknown = column.compute(view);
      if (!isScalar(value) || !valueFitsColumn(value, column.definition)) {
        const { definition } = column;
        throw new EvaluationError(
          `Column "${column.name}" expects ${definition.nullable ? 'nullable ' : ''}${definition.type}, got ${describeValue(value)}`
        );
      }
      output[column.name] = value;
    }
    return output;
  };

  const node: MapNode = { kind: 'map', upstream, schema, label, project };
  return Object.freeze(node);
}

function compileAggregates(
  input: Schema,
  specs: AggregateSpecs
): { aggregates: CompiledAggregate[]; columns: ColumnInput[]; parts: string[] } {
  const entries = Object.entries(specs);
  if (entries.length === 0) {
    throw new SchemaError('groupAggregate needs at least one aggregate');
  }

  const aggregates: CompiledAggregate[] = [];
  const columns: ColumnInput[] = [];
  const parts: string[] = [];

  for (const [output, spec] of entries) {
    const { kind } = spec;
    if (!AGGREGATE_KINDS.includes(kind)) {
      throw new SchemaError(`Unknown aggregate kind "${String(kind)}" for "${output}"`, ErrorCode.SCHEMA_ERROR, output, {
        suggestion: `Use one of: ${AGGREGATE_KINDS.join(', ')}`,
      });
    }

    if (spec.column === undefined) {
      if (kind !== 'count') {
        throw new SchemaError(`${kind} aggregate "${output}" needs a column`, ErrorCode.SCHEMA_ERROR, output);
      }
      aggregates.push({ output, kind, read: () => COUNT_STAR_VALUE });
      columns.push({ name: output, type: 'integer', nullable: false });
      parts.push(`${output} = count(*)`);
      continue;
    }

    const column = requireColumn(input, spec.column, `in aggregate "${output}"`);
    const name = column.name;

    if ((kind === 'sum' || kind === 'average') && !isNumericType(column.type)) {
      throw new SchemaError(
        `${kind} aggregate "${output}" needs a numeric column, "${name}" is ${column.type}`,
        ErrorCode.TYPE_MISMATCH,
        name
      );
    }
    if ((kind === 'min' || kind === 'max') && !isOrderableType(column.type)) {
      throw new SchemaError(
        `${kind} aggregate "${output}" cannot order ${column.type} column "${name}"`,
        ErrorCode.TYPE_MISMATCH,
        name
      );
    }

    aggregates.push({ output, kind, column: name, read: row => row[name] });
    switch (kind) {
      case 'count':
        columns.push({ name: output, type: 'integer', nullable: false });
        break;
      case 'sum':
        columns.push({ name: output, type: column.type, nullable: false });
        break;
      case 'average':
        columns.push({ name: output, type: 'float', nullable: true });
        break;
      case 'min':
      case 'max':
        columns.push({ name: output, type: column.type, nullable: true });
        break;
    }
    parts.push(`${output} = ${kind}(${name})`);
  }

  return { aggregates, columns, parts };
}

function buildGroupAggregateNode(
  upstream: OperationNode,
  keyColumns: readonly string[],
  specs: AggregateSpecs
): GroupAggregateNode {
  const input = upstream.schema;
  if (keyColumns.length === 0) {
    throw new SchemaError('groupAggregate needs at least one key column');
  }
  const seen = new Set<string>();
  const keyDefinitions = keyColumns.map(key => {
    if (seen.has(key)) {
      throw new SchemaError(`Group key "${key}" listed twice`, ErrorCode.SCHEMA_ERROR, key);
    }
    seen.add(key);
    return requireColumn(input, key, 'as group key');
  });

  const { aggregates, columns, parts } = compileAggregates(input, specs);
  const schema = defineSchema([...keyDefinitions, ...columns]);

  const node: GroupAggregateNode = {
    kind: 'groupAggregate',
    upstream,
    schema,
    label: `groupAggregate([${keyColumns.join(', ')}]; ${parts.join(', ')})`,
    keyColumns: Object.freeze([...keyColumns]),
    aggregates: Object.freeze(aggregates),
  };
  return Object.freeze(node);
}

// =============================================================================
// Graph Handle
// =============================================================================

/**
 * Immutable handle on the last stage of an operation chain.
 */
export class OperationGraph {
  private cachedSegments?: readonly Segment[];

  private constructor(private readonly tail: OperationNode) {}

  /**
   * Start a graph reading records of `schema`.
   *
   * @throws SchemaError when the schema itself is malformed
   */
  static from(schema: Schema): OperationGraph {
    const checked = defineSchema(schema.columns);
    const columns = checked.columns.map(column => `${column.name}: ${column.type}`).join(', ');
    const source: SourceNode = { kind: 'source', schema: checked, label: `source(${columns})` };
    return new OperationGraph(Object.freeze(source));
  }

  /** Output schema of the last stage */
  get schema(): Schema {
    return this.tail.schema;
  }

  get sourceSchema(): Schema {
    return sourceNode(this.tail).schema;
  }

  /** Last node of the chain */
  get node(): OperationNode {
    return this.tail;
  }

  /**
   * Keep rows matching `predicate`. Declarative predicates are checked
   * against the current schema now; functions are checked per record.
   *
   * @throws SchemaError
   */
  filter(predicate: Predicate): OperationGraph {
    const compiled = compilePredicate(predicate, this.tail.schema);
    const node: FilterNode = {
      kind: 'filter',
      upstream: this.tail,
      schema: this.tail.schema,
      label: `filter(${compiled.description})`,
      test: compiled.test,
    };
    return new OperationGraph(Object.freeze(node));
  }

  /**
   * Project each row onto new columns.
   *
   * @throws SchemaError
   */
  map(projection: Projection): OperationGraph {
    return new OperationGraph(buildMapNode(this.tail, projection));
  }

  /**
   * Group rows by `keyColumns` and compute mergeable aggregates. Stages
   * chained after this one run on the merged groups.
   *
   * @throws SchemaError
   */
  groupAggregate(keyColumns: readonly string[], specs: AggregateSpecs): OperationGraph {
    return new OperationGraph(buildGroupAggregateNode(this.tail, keyColumns, specs));
  }

  /** Stages from the source to this handle, in application order */
  stages(): StageNode[] {
    const stages: StageNode[] = [];
    let node = this.tail;
    while (node.kind !== 'source') {
      stages.push(node);
      node = node.upstream;
    }
    return stages.reverse();
  }

  /** Whether any stage aggregates */
  hasAggregate(): boolean {
    return this.stages().some(stage => stage.kind === 'groupAggregate');
  }

  /**
   * Split the chain after every groupAggregate. Always returns at least one
   * segment; the first runs per partition, the rest after the merge.
   */
  segments(): readonly Segment[] {
    if (this.cachedSegments) return this.cachedSegments;

    const segments: Segment[] = [];
    let inputSchema = this.sourceSchema;
    let outputSchema = inputSchema;
    let rowStages: (FilterNode | MapNode)[] = [];

    for (const stage of this.stages()) {
      if (stage.kind === 'groupAggregate') {
        segments.push(Object.freeze({ inputSchema, outputSchema: stage.schema, rowStages, aggregate: stage }));
        inputSchema = stage.schema;
        rowStages = [];
      } else {
        rowStages.push(stage);
      }
      outputSchema = stage.schema;
    }

    if (rowStages.length > 0 || segments.length === 0) {
      segments.push(Object.freeze({ inputSchema, outputSchema, rowStages }));
    }

    this.cachedSegments = Object.freeze(segments);
    return this.cachedSegments;
  }

  /**
   * Plan as text: `source(...) → filter(...) → ...`. Stages that run on the
   * merged result are marked `[after merge]`.
   */
  describe(): string {
    const parts = [sourceNode(this.tail).label];
    let merged = false;
    for (const stage of this.stages()) {
      parts.push(merged ? `[after merge] ${stage.label}` : stage.label);
      if (stage.kind === 'groupAggregate') merged = true;
    }
    return parts.join(' → ');
  }
}

function sourceNode(node: OperationNode): SourceNode {
  let current = node;
  while (current.kind !== 'source') current = current.upstream;
  return current;
}
