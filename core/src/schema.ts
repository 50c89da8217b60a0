/**
 * @shardflow/core - Schema helpers
 *
 * Declares dataset schemas and checks scalar values against column types.
 */

import type { ColumnDefinition, ColumnInput, ColumnType, Row, Scalar, Schema } from './types.js';
import { COLUMN_TYPES } from './types.js';
import { ErrorCode, EvaluationError, SchemaError } from './errors.js';

const COLUMN_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

// =============================================================================
// Schema construction
// =============================================================================

/**
 * Declare a schema. Column names must be identifiers and unique.
 *
 * @throws SchemaError on a duplicate or malformed column, or an unknown type
 *
 * @example
 * ```typescript
 * const schema = defineSchema([
 *   { name: 'amount', type: 'float' },
 *   { name: 'region', type: 'text', nullable: false },
 * ]);
 * ```
 */
export function defineSchema(columns: readonly ColumnInput[]): Schema {
  const seen = new Set<string>();
  const definitions: ColumnDefinition[] = [];

  for (const column of columns) {
    if (!COLUMN_NAME_PATTERN.test(column.name)) {
      throw new SchemaError(`Invalid column name "${column.name}"`, ErrorCode.SCHEMA_ERROR, column.name, {
        suggestion: 'Column names start with a letter or underscore and contain only letters, digits and underscores',
      });
    }
    if (seen.has(column.name)) {
      throw new SchemaError(`Duplicate column "${column.name}"`, ErrorCode.SCHEMA_ERROR, column.name);
    }
    if (!COLUMN_TYPES.includes(column.type)) {
      throw new SchemaError(
        `Unknown type "${String(column.type)}" for column "${column.name}"`,
        ErrorCode.TYPE_MISMATCH,
        column.name
      );
    }
    seen.add(column.name);
    definitions.push(Object.freeze({ name: column.name, type: column.type, nullable: column.nullable ?? true }));
  }

  return Object.freeze({ columns: Object.freeze(definitions) });
}

export function columnNames(schema: Schema): string[] {
  return schema.columns.map(column => column.name);
}

export function findColumn(schema: Schema, name: string): ColumnDefinition | undefined {
  return schema.columns.find(column => column.name === name);
}

/**
 * Look up a column or fail the way graph construction reports it.
 *
 * @throws SchemaError with code UNKNOWN_COLUMN
 */
export function requireColumn(schema: Schema, name: string, usage = 'referenced'): ColumnDefinition {
  const column = findColumn(schema, name);
  if (!column) {
    throw new SchemaError(
      `Unknown column "${name}" ${usage}; schema has: ${columnNames(schema).join(', ') || '(no columns)'}`,
      ErrorCode.UNKNOWN_COLUMN,
      name
    );
  }
  return column;
}

// =============================================================================
// Type checks
// =============================================================================

export function isNumericType(type: ColumnType): boolean {
  return type === 'integer' || type === 'float';
}

/** Types min/max can order */
export function isOrderableType(type: ColumnType): boolean {
  return type !== 'boolean';
}

/**
 * Whether a non-null value fits a column type. Integers must be safe
 * integers, floats finite numbers and timestamps valid dates.
 */
export function scalarMatchesType(value: Scalar, type: ColumnType): boolean {
  switch (type) {
    case 'integer':
      return typeof value === 'number' && Number.isSafeInteger(value);
    case 'float':
      return typeof value === 'number' && Number.isFinite(value);
    case 'text':
      return typeof value === 'string';
    case 'boolean':
      return typeof value === 'boolean';
    case 'timestamp':
      return value instanceof Date && !Number.isNaN(value.getTime());
  }
}

/**
 * Narrow an unknown value to a Scalar.
 */
export function isScalar(value: unknown): value is Scalar {
  return (
    value === null ||
    typeof value === 'number' ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    value instanceof Date
  );
}

/**
 * Human-readable type of a runtime value, for error messages.
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (value instanceof Date) return 'timestamp';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'float';
  if (typeof value === 'string') return 'text';
  return typeof value;
}

/**
 * Check one value against a column: nulls only where the column is nullable.
 */
export function valueFitsColumn(value: Scalar, column: ColumnDefinition): boolean {
  if (value === null) return column.nullable;
  return scalarMatchesType(value, column.type);
}

/**
 * Validate that a record carries exactly the schema's columns with fitting
 * values. Returns the problem description, or null when the record is valid.
 */
export function findRowProblem(row: Row, schema: Schema): string | null {
  for (const column of schema.columns) {
    if (!Object.prototype.hasOwnProperty.call(row, column.name)) {
      return `missing column "${column.name}"`;
    }
    const value = row[column.name];
    if (!valueFitsColumn(value, column)) {
      return `column "${column.name}" expects ${column.nullable ? 'nullable ' : ''}${column.type}, got ${describeValue(value)}`;
    }
  }
  for (const key of Object.keys(row)) {
    if (!findColumn(schema, key)) {
      return `unexpected column "${key}"`;
    }
  }
  return null;
}

// =============================================================================
// Ordering
// =============================================================================

/**
 * Total order over scalars used by min/max and group ordering.
 * null sorts first; values of different kinds order by kind name.
 */
export function compareScalars(a: Scalar, b: Scalar): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;

  if (typeof a === 'number' && typeof b === 'number') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'boolean' && typeof b === 'boolean') return a === b ? 0 : a ? 1 : -1;
  if (a instanceof Date && b instanceof Date) return Math.sign(a.getTime() - b.getTime());

  const kindA = describeValue(a);
  const kindB = describeValue(b);
  return kindA < kindB ? -1 : kindA > kindB ? 1 : 0;
}

/**
 * Lexicographic comparison of scalar tuples (group keys).
 */
export function compareScalarTuples(a: readonly Scalar[], b: readonly Scalar[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const order = compareScalars(a[i], b[i]);
    if (order !== 0) return order;
  }
  return a.length - b.length;
}

// =============================================================================
// Coercion from text sources
// =============================================================================

/**
 * Parse a textual field into a column's type. Empty text is null.
 *
 * @throws EvaluationError (MALFORMED_RECORD) when the text does not parse
 */
export function parseScalar(text: string, column: ColumnDefinition): Scalar {
  if (text === '') {
    return null;
  }

  let parsed: Scalar;
  switch (column.type) {
    case 'text':
      return text;
    case 'integer':
    case 'float':
      parsed = Number(text);
      break;
    case 'boolean':
      parsed = text === 'true' || text === '1' ? true : text === 'false' || text === '0' ? false : null;
      break;
    case 'timestamp': {
      const asNumber = Number(text);
      parsed = new Date(Number.isFinite(asNumber) ? asNumber : text);
      break;
    }
  }

  if (parsed === null || !scalarMatchesType(parsed, column.type)) {
    throw new EvaluationError(
      `Cannot read "${text}" as ${column.type} for column "${column.name}"`,
      {},
      ErrorCode.MALFORMED_RECORD
    );
  }
  return parsed;
}

/**
 * Convert a decoded JSON value into a column's type. Timestamps may be
 * ISO strings or epoch milliseconds.
 *
 * @throws EvaluationError (MALFORMED_RECORD) when the value does not fit
 */
export function coerceJsonValue(value: unknown, column: ColumnDefinition): Scalar {
  if (value === null || value === undefined) {
    return null;
  }
  const candidate: unknown =
    column.type === 'timestamp' && (typeof value === 'string' || typeof value === 'number')
      ? new Date(value)
      : value;

  if (isScalar(candidate) && candidate !== null && scalarMatchesType(candidate, column.type)) {
    return candidate;
  }
  throw new EvaluationError(
    `Column "${column.name}" expects ${column.type}, got ${describeValue(value)}`,
    {},
    ErrorCode.MALFORMED_RECORD
  );
}
