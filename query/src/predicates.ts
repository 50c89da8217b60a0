/**
 * Predicate compilation
 *
 * Turns what filter() accepts into a row test. Declarative column
 * predicates are checked against the input schema up front; predicate
 * functions are checked per record and see a guarded view of the row that
 * rejects reads of undeclared columns.
 */

import {
  ErrorCode,
  EvaluationError,
  SchemaError,
  columnNames,
  compareScalars,
  describeValue,
  isOrderableType,
  isScalar,
  requireColumn,
  scalarMatchesType,
  type ColumnDefinition,
  type Row,
  type Scalar,
  type Schema,
} from '@shardflow/core';
import type { ColumnPredicate, Predicate, PredicateOperator, RowPredicate } from './types.js';

export interface CompiledPredicate {
  readonly test: (row: Row) => boolean;
  /** Rendering used in plans, e.g. `amount gt 0` */
  readonly description: string;
}

const OPERATORS: readonly PredicateOperator[] = [
  'eq',
  'ne',
  'gt',
  'gte',
  'lt',
  'lte',
  'in',
  'notIn',
  'isNull',
  'isNotNull',
];

// =============================================================================
// Guarded Rows
// =============================================================================

/**
 * Build a wrapper that hands user functions a view of the row which throws
 * EvaluationError when a column outside `schema` is read.
 */
export function createRowGuard(schema: Schema): (row: Row) => Row {
  const known = new Set(columnNames(schema));

  const handler: ProxyHandler<Row> = {
    get(target, property, receiver) {
      if (
        typeof property === 'string' &&
        !known.has(property) &&
        property !== 'toJSON' &&
        !(property in Object.prototype)
      ) {
        throw new EvaluationError(`Read of undeclared column "${property}"`);
      }
      return Reflect.get(target, property, receiver);
    },
  };

  return row => new Proxy(row, handler);
}

// =============================================================================
// Compilation
// =============================================================================

function isColumnPredicateList(predicate: Predicate): predicate is readonly ColumnPredicate[] {
  return Array.isArray(predicate);
}

function isScalarList(value: Scalar | readonly Scalar[] | undefined): value is readonly Scalar[] {
  return Array.isArray(value);
}

function formatScalar(value: Scalar): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string') return JSON.stringify(value);
  return String(value);
}

/**
 * Whether a comparison value can be compared with a column's values.
 * Numeric columns compare with any finite number.
 */
function fitsComparison(value: unknown, column: ColumnDefinition): value is Scalar {
  if (!isScalar(value) || value === null) return false;
  if (column.type === 'integer' || column.type === 'float') {
    return typeof value === 'number' && Number.isFinite(value);
  }
  return scalarMatchesType(value, column.type);
}

function typeMismatch(predicate: ColumnPredicate, column: ColumnDefinition, value: unknown): SchemaError {
  return new SchemaError(
    `Cannot apply ${predicate.operator} to ${column.type} column "${column.name}" with ${describeValue(value)} value`,
    ErrorCode.TYPE_MISMATCH,
    column.name
  );
}

function compileColumnPredicate(predicate: ColumnPredicate, schema: Schema): CompiledPredicate {
  const column = requireColumn(schema, predicate.column, 'in filter');
  const name = column.name;
  const { operator, value } = predicate;

  if (!OPERATORS.includes(operator)) {
    throw new SchemaError(`Unknown predicate operator "${String(operator)}"`, ErrorCode.SCHEMA_ERROR, name, {
      suggestion: `Use one of: ${OPERATORS.join(', ')}`,
    });
  }

  if (operator === 'isNull' || operator === 'isNotNull') {
    if (value !== undefined) {
      throw new SchemaError(`Operator ${operator} takes no value`, ErrorCode.SCHEMA_ERROR, name);
    }
    const wantNull = operator === 'isNull';
    return { test: row => (row[name] === null) === wantNull, description: `${name} ${operator}` };
  }

  if (operator === 'in' || operator === 'notIn') {
    if (!isScalarList(value)) {
      throw new SchemaError(`Operator ${operator} takes a list of values`, ErrorCode.SCHEMA_ERROR, name);
    }
    const candidates: Scalar[] = [];
    for (const candidate of value) {
      if (!fitsComparison(candidate, column)) throw typeMismatch(predicate, column, candidate);
      candidates.push(candidate);
    }
    const wantMember = operator === 'in';
    return {
      test: row => {
        const cell = row[name];
        if (cell === null) return false;
        return candidates.some(candidate => compareScalars(cell, candidate) === 0) === wantMember;
      },
      description: `${name} ${operator} [${candidates.map(formatScalar).join(', ')}]`,
    };
  }

  if (isScalarList(value) || !fitsComparison(value, column)) {
    throw typeMismatch(predicate, column, value);
  }
  if (operator !== 'eq' && operator !== 'ne' && !isOrderableType(column.type)) {
    throw typeMismatch(predicate, column, value);
  }

  const accepts: (order: number) => boolean = {
    eq: (order: number) => order === 0,
    ne: (order: number) => order !== 0,
    gt: (order: number) => order > 0,
    gte: (order: number) => order >= 0,
    lt: (order: number) => order < 0,
    lte: (order: number) => order <= 0,
  }[operator];

  return {
    test: row => {
      const cell = row[name];
      return cell !== null && accepts(compareScalars(cell, value));
    },
    description: `${name} ${operator} ${formatScalar(value)}`,
  };
}

function compileFunctionPredicate(predicate: RowPredicate, schema: Schema): CompiledPredicate {
  const guard = createRowGuard(schema);

  return {
    test: row => {
      const result: unknown = predicate(guard(row));
      if (typeof result !== 'boolean') {
        throw new EvaluationError(`Predicate returned ${describeValue(result)}, expected boolean`);
      }
      return result;
    },
    description: predicate.name || 'predicate',
  };
}

/**
 * Compile a filter predicate against the schema it will see.
 *
 * @throws SchemaError for unknown columns, operators or mistyped values
 */
export function compilePredicate(predicate: Predicate, schema: Schema): CompiledPredicate {
  if (typeof predicate === 'function') {
    return compileFunctionPredicate(predicate, schema);
  }

  if (isColumnPredicateList(predicate)) {
    if (predicate.length === 0) {
      throw new SchemaError('Filter needs at least one predicate');
    }
    const parts = predicate.map(part => compileColumnPredicate(part, schema));
    return {
      test: row => parts.every(part => part.test(row)),
      description: parts.map(part => part.description).join(' and '),
    };
  }

  if (typeof predicate !== 'object' || predicate === null) {
    throw new SchemaError(`Unsupported predicate: ${describeValue(predicate)}`);
  }
  return compileColumnPredicate(predicate, schema);
}
