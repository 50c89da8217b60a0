/**
 * Tests for the shardflow error hierarchy
 */

import { describe, it, expect } from 'vitest';
import {
  ErrorCode,
  isErrorCode,
  ShardflowError,
  InvalidConfigurationError,
  SchemaError,
  EvaluationError,
  PartitionFailure,
  MergeError,
  ExecutionCancelledError,
  toError,
} from '../errors.js';

describe('ShardflowError base class', () => {
  it('should carry name, code and message', () => {
    const error = new ShardflowError('Something broke', 'MY_CODE');
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ShardflowError');
    expect(error.code).toBe('MY_CODE');
    expect(error.message).toBe('Something broke');
  });

  it('should default to UNKNOWN', () => {
    expect(new ShardflowError('x').code).toBe(ErrorCode.UNKNOWN);
  });

  it('should capture a stack trace', () => {
    const error = new ShardflowError('Test error');
    expect(error.stack).toContain('Test error');
  });

  it('should keep the cause', () => {
    const cause = new Error('root');
    const error = new ShardflowError('wrapped', ErrorCode.INTERNAL_ERROR, { cause });
    expect(error.cause).toBe(cause);
  });

  it('should render details and suggestion', () => {
    const error = new ShardflowError('Bad input', 'BAD', {
      details: { column: 'amount', index: 3 },
      suggestion: 'Check the column',
    });
    expect(error.toDetailedString()).toBe(
      '[BAD] Bad input\nDetails: column="amount", index=3\nSuggestion: Check the column'
    );
  });

  it('should build a log context', () => {
    const error = new ShardflowError('Bad input', 'BAD', { details: { a: 1 } });
    expect(error.toLogContext()).toEqual({
      name: 'ShardflowError',
      message: 'Bad input',
      code: 'BAD',
      details: { a: 1 },
      timestamp: error.timestamp,
    });
  });
});

describe('isErrorCode', () => {
  it('recognises enum values only', () => {
    expect(isErrorCode('PARTITION_FAILURE')).toBe(true);
    expect(isErrorCode('NOT_A_CODE')).toBe(false);
  });
});

describe('InvalidConfigurationError', () => {
  it('should record the option', () => {
    const error = new InvalidConfigurationError('concurrency must be positive', 'scheduler.concurrency');
    expect(error).toBeInstanceOf(ShardflowError);
    expect(error.code).toBe(ErrorCode.INVALID_CONFIGURATION);
    expect(error.option).toBe('scheduler.concurrency');
    expect(error.details).toEqual({ option: 'scheduler.concurrency' });
  });
});

describe('SchemaError', () => {
  it('should default to SCHEMA_ERROR and record the column', () => {
    const error = new SchemaError('bad column', undefined, 'amount');
    expect(error.code).toBe(ErrorCode.SCHEMA_ERROR);
    expect(error.column).toBe('amount');
  });
});

describe('EvaluationError', () => {
  it('should carry the record and its position', () => {
    const record = { amount: -1 };
    const error = new EvaluationError('predicate failed', { recordIndex: 4, record, stage: 'filter' });
    expect(error.code).toBe(ErrorCode.EVALUATION_ERROR);
    expect(error.recordIndex).toBe(4);
    expect(error.record).toBe(record);
    expect(error.partitionIndex).toBeUndefined();
  });

  it('should keep the malformed-record code and the cause', () => {
    const cause = new Error('boom');
    const error = new EvaluationError('bad row', { partitionIndex: 7, recordIndex: 2, cause }, ErrorCode.MALFORMED_RECORD);

    expect(error.code).toBe(ErrorCode.MALFORMED_RECORD);
    expect(error.partitionIndex).toBe(7);
    expect(error.recordIndex).toBe(2);
    expect(error.cause).toBe(cause);
  });
});

describe('PartitionFailure', () => {
  it('should order failures and summarise them', () => {
    const failure = new PartitionFailure(
      [
        { partitionIndex: 5, error: new Error('five') },
        { partitionIndex: 2, error: new Error('two') },
      ],
      8
    );

    expect(failure.code).toBe(ErrorCode.PARTITION_FAILURE);
    expect(failure.message).toBe('2 of 10 partition task(s) failed (partitions 2, 5)');
    expect(failure.failedPartitions).toEqual([2, 5]);
    expect(failure.succeeded).toBe(8);
    expect(failure.failures[0].error.message).toBe('two');
    expect(Object.isFrozen(failure.failures)).toBe(true);
  });
});

describe('MergeError and ExecutionCancelledError', () => {
  it('should use their codes', () => {
    expect(new MergeError('kinds differ').code).toBe(ErrorCode.MERGE_ERROR);
    const cancelled = new ExecutionCancelledError();
    expect(cancelled.code).toBe(ErrorCode.EXECUTION_CANCELLED);
    expect(cancelled.message).toBe('Execution cancelled');
  });
});

describe('toError', () => {
  it('should pass errors through and wrap other values', () => {
    const error = new Error('x');
    expect(toError(error)).toBe(error);

    const wrapped = toError('plain string');
    expect(wrapped).toBeInstanceOf(ShardflowError);
    expect(wrapped.message).toBe('plain string');
  });
});
