/**
 * @shardflow/core - Record Sources
 *
 * Forward-only readers producing schema-conforming records from memory,
 * newline-delimited JSON and CSV files. File readers stream line by line.
 */

import { createReadStream } from 'node:fs';
import { createInterface } from 'node:readline';
import type { Row, Scalar, Schema } from './types.js';
import { ErrorCode, EvaluationError } from './errors.js';
import { coerceJsonValue, columnNames, findRowProblem, parseScalar } from './schema.js';

export interface SourceOptions {
  /**
   * Check every record against the schema as it is read (default: false).
   * The partition executor checks records itself, so a bad record only
   * fails its own partition; turn this on to fail at the source instead.
   */
  validate?: boolean;
}

export interface CsvSourceOptions {
  /** Field delimiter (default: ',') */
  delimiter?: string;
}

/**
 * Wrap an in-memory array as a forward-only record source.
 *
 * @throws EvaluationError (MALFORMED_RECORD) naming the record index, with `validate`
 */
export function* fromArray(records: readonly Row[], schema: Schema, options: SourceOptions = {}): Generator<Row> {
  const validate = options.validate ?? false;
  for (let i = 0; i < records.length; i++) {
    const record = records[i];
    if (validate) {
      const problem = findRowProblem(record, schema);
      if (problem !== null) {
        throw new EvaluationError(
          `Record ${i} does not match schema: ${problem}`,
          { recordIndex: i, record },
          ErrorCode.MALFORMED_RECORD
        );
      }
    }
    yield record;
  }
}

async function* readLines(path: string): AsyncGenerator<{ line: string; lineNumber: number }> {
  const lines = createInterface({
    input: createReadStream(path, { encoding: 'utf8' }),
    crlfDelay: Infinity,
  });
  let lineNumber = 0;
  try {
    for await (const line of lines) {
      lineNumber++;
      yield { line, lineNumber };
    }
  } finally {
    lines.close();
  }
}

function malformed(message: string, lineNumber: number, cause?: unknown): EvaluationError {
  return new EvaluationError(`Line ${lineNumber}: ${message}`, { recordIndex: lineNumber, cause }, ErrorCode.MALFORMED_RECORD);
}

function rethrowAtLine(error: unknown, lineNumber: number): never {
  throw malformed(error instanceof Error ? error.message : String(error), lineNumber, error);
}

/**
 * Read newline-delimited JSON objects. Blank lines are skipped; timestamp
 * columns accept ISO strings or epoch milliseconds.
 *
 * @throws EvaluationError (MALFORMED_RECORD) naming the 1-based line number
 */
export async function* readNdjsonRecords(path: string, schema: Schema): AsyncGenerator<Row> {
  for await (const { line, lineNumber } of readLines(path)) {
    if (line.trim() === '') continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      throw malformed('invalid JSON', lineNumber, error);
    }
    if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw malformed('expected a JSON object', lineNumber);
    }

    const fields = new Map<string, unknown>(Object.entries(parsed));
    for (const key of fields.keys()) {
      if (!schema.columns.some(column => column.name === key)) {
        throw malformed(`unexpected column "${key}"`, lineNumber);
      }
    }

    const row: Record<string, Scalar> = {};
    for (const column of schema.columns) {
      let value: Scalar;
      try {
        value = coerceJsonValue(fields.get(column.name), column);
      } catch (error) {
        rethrowAtLine(error, lineNumber);
      }
      if (value === null && !column.nullable) {
        throw malformed(`column "${column.name}" is not nullable`, lineNumber);
      }
      row[column.name] = value;
    }
    yield row;
  }
}

/**
 * Split one CSV line into fields. Fields may be quoted with `"`; a doubled
 * quote inside a quoted field is a literal quote.
 */
export function parseCsvLine(line: string, delimiter = ','): string[] {
  const fields: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (quoted) {
      if (char === '"' && line[i + 1] === '"') {
        field += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        field += char;
      }
    } else if (char === '"' && field === '') {
      quoted = true;
    } else if (char === delimiter) {
      fields.push(field);
      field = '';
    } else {
      field += char;
    }
  }

  if (quoted) {
    throw new Error('unterminated quoted field');
  }
  fields.push(field);
  return fields;
}

/**
 * Read a CSV file whose first line is a header naming every schema column
 * (in any order). Empty fields are null.
 *
 * @throws EvaluationError (MALFORMED_RECORD) naming the 1-based line number
 */
export async function* readCsvRecords(
  path: string,
  schema: Schema,
  options: CsvSourceOptions = {}
): AsyncGenerator<Row> {
  const delimiter = options.delimiter ?? ',';
  let positions: number[] | undefined;

  for await (const { line, lineNumber } of readLines(path)) {
    if (line.trim() === '') continue;

    let fields: string[];
    try {
      fields = parseCsvLine(line, delimiter);
    } catch (error) {
      rethrowAtLine(error, lineNumber);
    }

    if (positions === undefined) {
      positions = resolveHeader(fields, schema, lineNumber);
      continue;
    }

    if (fields.length !== positions.length) {
      throw malformed(`expected ${positions.length} fields, got ${fields.length}`, lineNumber);
    }

    const row: Record<string, Scalar> = {};
    for (let c = 0; c < schema.columns.length; c++) {
      const column = schema.columns[c];
      let value: Scalar;
      try {
        value = parseScalar(fields[positions[c]], column);
      } catch (error) {
        rethrowAtLine(error, lineNumber);
      }
      if (value === null && !column.nullable) {
        throw malformed(`column "${column.name}" is not nullable`, lineNumber);
      }
      row[column.name] = value;
    }
    yield row;
  }
}

/**
 * Map schema column order to header field positions.
 */
function resolveHeader(header: string[], schema: Schema, lineNumber: number): number[] {
  const names = header.map(name => name.trim());
  const expected = columnNames(schema);
  const extra = names.filter(name => !expected.includes(name));
  const missing = expected.filter(name => !names.includes(name));

  if (extra.length > 0 || missing.length > 0 || names.length !== expected.length) {
    throw malformed(
      `header does not match schema (missing: ${missing.join(', ') || 'none'}; unexpected: ${extra.join(', ') || 'none'})`,
      lineNumber
    );
  }
  return expected.map(name => names.indexOf(name));
}
