/**
 * @shardflow/config - Configuration Validation
 *
 * Validates configuration values and reports every problem at once.
 *
 * @packageDocumentation
 */

import { InvalidConfigurationError, LogLevels } from '@shardflow/core';
import type {
  ShardflowConfig,
  ValidationResult,
  ValidationError,
  ValidationWarning,
} from './types.js';

/**
 * Validate a complete ShardflowConfig.
 *
 * @example
 * ```typescript
 * const result = validateConfig(myConfig);
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 * ```
 */
export function validateConfig(config: ShardflowConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  validatePartitionConfig(config.partition, errors, warnings);
  validateSchedulerConfig(config.scheduler, errors, warnings);
  validateObservabilityConfig(config.observability, errors);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Validate and throw on the first invalid config, listing every error.
 *
 * @throws InvalidConfigurationError naming the first offending path
 */
export function assertValidConfig(config: ShardflowConfig): void {
  const { errors } = validateConfig(config);
  if (errors.length > 0) {
    throw new InvalidConfigurationError(
      `Invalid configuration: ${errors.map(e => `${e.path}: ${e.message}`).join('; ')}`,
      errors[0].path,
      { details: { errors } }
    );
  }
}

function isPositiveInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}

function validatePartitionConfig(
  partition: ShardflowConfig['partition'],
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  if (!isPositiveInteger(partition.targetPartitionSize)) {
    errors.push({
      path: 'partition.targetPartitionSize',
      message: 'Target partition size must be a positive integer',
      value: partition.targetPartitionSize,
    });
  } else if (partition.targetPartitionSize < 100) {
    warnings.push({
      path: 'partition.targetPartitionSize',
      message: 'Very small partitions spend more time scheduling than computing',
      value: partition.targetPartitionSize,
      recommendation: 'Use at least a few thousand records per partition',
    });
  }
}

function validateSchedulerConfig(
  scheduler: ShardflowConfig['scheduler'],
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  if (!isPositiveInteger(scheduler.concurrency)) {
    errors.push({
      path: 'scheduler.concurrency',
      message: 'Concurrency must be a positive integer',
      value: scheduler.concurrency,
      suggestion: 'Use 1 for a sequential baseline run',
    });
  } else if (scheduler.concurrency > 256) {
    warnings.push({
      path: 'scheduler.concurrency',
      message: 'High concurrency keeps many partitions in memory at once',
      value: scheduler.concurrency,
      recommendation: 'Consider values between 2 and 64 for most workloads',
    });
  }

  if (!isPositiveInteger(scheduler.yieldEveryRecords)) {
    errors.push({
      path: 'scheduler.yieldEveryRecords',
      message: 'Yield interval must be a positive integer',
      value: scheduler.yieldEveryRecords,
    });
  }
}

function validateObservabilityConfig(
  observability: ShardflowConfig['observability'],
  errors: ValidationError[]
): void {
  if (!LogLevels.isLogLevel(observability.logLevel)) {
    errors.push({
      path: 'observability.logLevel',
      message: 'Log level must be one of debug, info, warn, error',
      value: observability.logLevel,
    });
  }

  if (observability.logFormat !== 'json' && observability.logFormat !== 'pretty') {
    errors.push({
      path: 'observability.logFormat',
      message: 'Log format must be "json" or "pretty"',
      value: observability.logFormat,
    });
  }
}
