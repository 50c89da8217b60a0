/**
 * Typed exception classes for shardflow
 *
 * Error hierarchy:
 * - ShardflowError: Base error class for all shardflow errors
 *   - InvalidConfigurationError: bad partition size, concurrency or config value
 *   - SchemaError: unknown column or type mismatch detected while building a graph
 *   - EvaluationError: a predicate or projection failed on a specific record
 *   - PartitionFailure: one or more partition tasks failed during a run
 *   - MergeError: partial results could not be combined (internal invariant)
 *   - ExecutionCancelledError: a run was aborted through its signal
 *
 * @example
 * ```typescript
 * import { PartitionFailure, SchemaError } from '@shardflow/core';
 *
 * try {
 *   const { result } = await run(graph, partitions, { concurrency: 4 });
 * } catch (error) {
 *   if (error instanceof PartitionFailure) {
 *     for (const failure of error.failures) {
 *       logger.warn('partition failed', { partitionIndex: failure.partitionIndex });
 *     }
 *   }
 * }
 * ```
 */

import type { Row } from './types.js';
import { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard error codes for programmatic error handling.
 */
export enum ErrorCode {
  UNKNOWN = 'UNKNOWN',
  INTERNAL_ERROR = 'INTERNAL_ERROR',

  // Configuration
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',

  // Graph construction
  SCHEMA_ERROR = 'SCHEMA_ERROR',
  UNKNOWN_COLUMN = 'UNKNOWN_COLUMN',
  TYPE_MISMATCH = 'TYPE_MISMATCH',

  // Evaluation
  EVALUATION_ERROR = 'EVALUATION_ERROR',
  MALFORMED_RECORD = 'MALFORMED_RECORD',

  // Scheduling and merging
  PARTITION_FAILURE = 'PARTITION_FAILURE',
  MERGE_ERROR = 'MERGE_ERROR',
  EXECUTION_CANCELLED = 'EXECUTION_CANCELLED',
}

/**
 * Type guard to check if a string is a valid ErrorCode.
 */
export function isErrorCode(code: string): code is ErrorCode {
  return Object.values<string>(ErrorCode).includes(code);
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Options shared by every shardflow error
 */
export interface ShardflowErrorOptions {
  /** Structured details for debugging */
  details?: Record<string, unknown>;
  /** Hint for resolving the error */
  suggestion?: string;
  /** Underlying error */
  cause?: unknown;
}

/**
 * Base error class for all shardflow errors
 *
 * Carries a `code` for programmatic identification, optional structured
 * `details` and a `suggestion`, and the creation `timestamp`.
 */
export class ShardflowError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;
  public readonly suggestion?: string;
  /** Milliseconds since epoch */
  public readonly timestamp: number;

  constructor(message: string, code: string = ErrorCode.UNKNOWN, options: ShardflowErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ShardflowError';
    this.code = code;
    this.details = options.details;
    this.suggestion = options.suggestion;
    this.timestamp = Date.now();

    captureStackTrace(this, new.target);
  }

  /**
   * Structured object suitable for JSON logging.
   */
  toLogContext(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
      ...(this.suggestion && { suggestion: this.suggestion }),
      timestamp: this.timestamp,
    };
  }

  /**
   * Multi-line rendering with details and suggestion.
   */
  toDetailedString(): string {
    const parts = [`[${this.code}] ${this.message}`];
    if (this.details) {
      const ctx = Object.entries(this.details)
        .map(([k, v]) => `${k}=${safeStringify(v)}`)
        .join(', ');
      parts.push(`Details: ${ctx}`);
    }
    if (this.suggestion) {
      parts.push(`Suggestion: ${this.suggestion}`);
    }
    return parts.join('\n');
  }
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

// =============================================================================
// Specific Errors
// =============================================================================

/**
 * Raised at call time for invalid sizes, concurrency levels or config values.
 * Nothing has executed when this is thrown.
 */
export class InvalidConfigurationError extends ShardflowError {
  /** Dotted path of the offending option, when known */
  public readonly option?: string;

  constructor(message: string, option?: string, options: ShardflowErrorOptions = {}) {
    super(message, ErrorCode.INVALID_CONFIGURATION, {
      ...options,
      details: { ...(option !== undefined && { option }), ...options.details },
    });
    this.name = 'InvalidConfigurationError';
    this.option = option;
  }
}

/**
 * Raised while building a graph when a column reference or a value type can
 * be checked against the schema and does not fit.
 */
export class SchemaError extends ShardflowError {
  public readonly column?: string;

  constructor(
    message: string,
    code: ErrorCode.SCHEMA_ERROR | ErrorCode.UNKNOWN_COLUMN | ErrorCode.TYPE_MISMATCH = ErrorCode.SCHEMA_ERROR,
    column?: string,
    options: ShardflowErrorOptions = {}
  ) {
    super(message, code, {
      ...options,
      details: { ...(column !== undefined && { column }), ...options.details },
    });
    this.name = 'SchemaError';
    this.column = column;
  }
}

/**
 * Where an evaluation failure happened
 */
export interface EvaluationErrorContext {
  partitionIndex?: number;
  /** Position of the record inside its partition (or source line number) */
  recordIndex?: number;
  /** Offending record */
  record?: Row;
  /** Stage that failed, as rendered by the graph plan */
  stage?: string;
  cause?: unknown;
}

/**
 * Raised when a predicate or projection throws, returns a value of the wrong
 * type or reads an undeclared column for a specific record.
 */
export class EvaluationError extends ShardflowError {
  public readonly partitionIndex?: number;
  public readonly recordIndex?: number;
  public readonly record?: Row;
  public readonly stage?: string;

  constructor(
    message: string,
    context: EvaluationErrorContext = {},
    code: ErrorCode.EVALUATION_ERROR | ErrorCode.MALFORMED_RECORD = ErrorCode.EVALUATION_ERROR
  ) {
    super(message, code, {
      cause: context.cause,
      details: {
        ...(context.partitionIndex !== undefined && { partitionIndex: context.partitionIndex }),
        ...(context.recordIndex !== undefined && { recordIndex: context.recordIndex }),
        ...(context.stage !== undefined && { stage: context.stage }),
        ...(context.record !== undefined && { record: context.record }),
      },
    });
    this.name = 'EvaluationError';
    this.partitionIndex = context.partitionIndex;
    this.recordIndex = context.recordIndex;
    this.record = context.record;
    this.stage = context.stage;
  }
}

/**
 * One failed partition task
 */
export interface PartitionTaskFailure {
  readonly partitionIndex: number;
  readonly error: Error;
}

/**
 * Raised by a run after every partition task has settled and at least one
 * failed. Lists every failure; no partial result accompanies it.
 */
export class PartitionFailure extends ShardflowError {
  /** Failures ordered by partition index */
  public readonly failures: readonly PartitionTaskFailure[];
  /** Number of partition tasks that completed successfully */
  public readonly succeeded: number;

  constructor(failures: readonly PartitionTaskFailure[], succeeded: number) {
    const ordered = [...failures].sort((a, b) => a.partitionIndex - b.partitionIndex);
    const indices = ordered.map(f => f.partitionIndex);
    super(
      `${ordered.length} of ${ordered.length + succeeded} partition task(s) failed (partitions ${indices.join(', ')})`,
      ErrorCode.PARTITION_FAILURE,
      {
        details: {
          failedPartitions: indices,
          succeeded,
          errors: ordered.map(f => ({ partitionIndex: f.partitionIndex, message: f.error.message })),
        },
      }
    );
    this.name = 'PartitionFailure';
    this.failures = Object.freeze(ordered);
    this.succeeded = succeeded;
  }

  /** Indices of the failed partitions, ascending */
  get failedPartitions(): number[] {
    return this.failures.map(f => f.partitionIndex);
  }
}

/**
 * Raised when partial results cannot be combined. Reaching it means two
 * partials disagree about the graph they came from.
 */
export class MergeError extends ShardflowError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.MERGE_ERROR, { details });
    this.name = 'MergeError';
  }
}

/**
 * Raised by a run whose abort signal fired. Tasks already running finished;
 * no further partition was started.
 */
export class ExecutionCancelledError extends ShardflowError {
  constructor(message = 'Execution cancelled', options: ShardflowErrorOptions = {}) {
    super(message, ErrorCode.EXECUTION_CANCELLED, options);
    this.name = 'ExecutionCancelledError';
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Normalise anything thrown into an Error.
 */
export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) {
    return thrown;
  }
  return new ShardflowError(String(thrown), ErrorCode.UNKNOWN, { cause: thrown });
}
