/**
 * @shardflow/config - Configuration Factory Functions
 *
 * Create, merge and load configurations. Every config handed out is frozen.
 *
 * @packageDocumentation
 */

import { InvalidConfigurationError, LogLevels, type LogLevel } from '@shardflow/core';
import type { ConfigOverrides, EnvConfigOptions, LogFormat, ShardflowConfig } from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';

/**
 * Copy the defined fields of a section override.
 * Undefined values never override.
 */
function definedOnly<T extends object>(source: Partial<T> | undefined): Partial<T> {
  const result: Partial<T> = {};
  if (!source) {
    return result;
  }
  for (const key in source) {
    if (source[key] !== undefined) {
      result[key] = source[key];
    }
  }
  return result;
}

function freezeConfig(config: ShardflowConfig): ShardflowConfig {
  Object.freeze(config.partition);
  Object.freeze(config.scheduler);
  Object.freeze(config.observability);
  return Object.freeze(config);
}

/**
 * Create a complete ShardflowConfig with optional overrides.
 *
 * @param overrides - Partial configuration to merge with defaults
 * @param base - Optional base configuration (defaults to DEFAULT_CONFIG)
 * @returns Frozen ShardflowConfig with all values filled in
 *
 * @example
 * ```typescript
 * // Use all defaults
 * const config1 = createConfig();
 *
 * // Override specific values
 * const config2 = createConfig({
 *   scheduler: { concurrency: 8 },
 *   partition: { targetPartitionSize: 25_000 },
 * });
 *
 * // Build on another config
 * const config3 = createConfig({ observability: { logLevel: 'debug' } }, config2);
 * ```
 */
export function createConfig(overrides?: ConfigOverrides, base: ShardflowConfig = DEFAULT_CONFIG): ShardflowConfig {
  return freezeConfig({
    partition: { ...base.partition, ...definedOnly(overrides?.partition) },
    scheduler: { ...base.scheduler, ...definedOnly(overrides?.scheduler) },
    observability: { ...base.observability, ...definedOnly(overrides?.observability) },
  });
}

/**
 * Merge multiple partial configurations.
 *
 * Later configurations take precedence over earlier ones.
 *
 * @example
 * ```typescript
 * const merged = mergeConfigs(
 *   { scheduler: { concurrency: 2 } },
 *   { scheduler: { concurrency: 8, yieldEveryRecords: 500 } }
 * );
 * // merged.scheduler.concurrency === 8
 * ```
 */
export function mergeConfigs(...configs: Array<ConfigOverrides | null | undefined>): ConfigOverrides {
  let result: ConfigOverrides = {};

  for (const config of configs) {
    if (config) {
      result = {
        ...result,
        ...(config.partition && { partition: { ...result.partition, ...definedOnly(config.partition) } }),
        ...(config.scheduler && { scheduler: { ...result.scheduler, ...definedOnly(config.scheduler) } }),
        ...(config.observability && {
          observability: { ...result.observability, ...definedOnly(config.observability) },
        }),
      };
    }
  }

  return result;
}

// =============================================================================
// Environment
// =============================================================================

/**
 * Get environment variable with prefix.
 */
function envKey(prefix: string, ...parts: string[]): string {
  return [prefix, ...parts].join('_').toUpperCase();
}

function readNumber(
  env: Record<string, string | undefined>,
  key: string,
  option: string
): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new InvalidConfigurationError(`${key} must be a number, got "${raw}"`, option);
  }
  return value;
}

function readBoolean(env: Record<string, string | undefined>, key: string): boolean | undefined {
  const raw = env[key];
  if (raw === undefined) {
    return undefined;
  }
  const value = raw.toLowerCase();
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  throw new InvalidConfigurationError(
    `${key} must be one of true, false, 1, 0; got "${raw}"`,
    'observability.metricsEnabled'
  );
}

function readLogLevel(env: Record<string, string | undefined>, key: string): LogLevel | undefined {
  const raw = env[key];
  if (raw === undefined) {
    return undefined;
  }
  const level = raw.toLowerCase();
  if (!LogLevels.isLogLevel(level)) {
    throw new InvalidConfigurationError(
      `${key} must be one of debug, info, warn, error; got "${raw}"`,
      'observability.logLevel'
    );
  }
  return level;
}

function readLogFormat(env: Record<string, string | undefined>, key: string): LogFormat | undefined {
  const raw = env[key];
  if (raw === undefined) {
    return undefined;
  }
  if (raw !== 'json' && raw !== 'pretty') {
    throw new InvalidConfigurationError(`${key} must be "json" or "pretty", got "${raw}"`, 'observability.logFormat');
  }
  return raw;
}

/**
 * Create configuration from environment variables.
 *
 * Environment variables follow the pattern: SHARDFLOW_<SECTION>_<FIELD>
 * - SHARDFLOW_PARTITION_TARGET_SIZE=50000
 * - SHARDFLOW_SCHEDULER_CONCURRENCY=8
 * - SHARDFLOW_SCHEDULER_YIELD_EVERY_RECORDS=500
 * - SHARDFLOW_OBSERVABILITY_LOG_LEVEL=debug
 * - SHARDFLOW_OBSERVABILITY_LOG_FORMAT=pretty
 * - SHARDFLOW_OBSERVABILITY_METRICS_ENABLED=true
 *
 * @throws InvalidConfigurationError when a variable is set but cannot be parsed
 *
 * @example
 * ```typescript
 * const config = getConfigFromEnv();
 * const custom = getConfigFromEnv({ prefix: 'ETL', env: { ETL_SCHEDULER_CONCURRENCY: '2' } });
 * ```
 */
export function getConfigFromEnv(options: EnvConfigOptions = {}): ShardflowConfig {
  const prefix = options.prefix ?? 'SHARDFLOW';
  const env = options.env ?? process.env;

  return createConfig({
    partition: {
      targetPartitionSize: readNumber(env, envKey(prefix, 'PARTITION', 'TARGET', 'SIZE'), 'partition.targetPartitionSize'),
    },
    scheduler: {
      concurrency: readNumber(env, envKey(prefix, 'SCHEDULER', 'CONCURRENCY'), 'scheduler.concurrency'),
      yieldEveryRecords: readNumber(
        env,
        envKey(prefix, 'SCHEDULER', 'YIELD', 'EVERY', 'RECORDS'),
        'scheduler.yieldEveryRecords'
      ),
    },
    observability: {
      logLevel: readLogLevel(env, envKey(prefix, 'OBSERVABILITY', 'LOG', 'LEVEL')),
      logFormat: readLogFormat(env, envKey(prefix, 'OBSERVABILITY', 'LOG', 'FORMAT')),
      metricsEnabled: readBoolean(env, envKey(prefix, 'OBSERVABILITY', 'METRICS', 'ENABLED')),
    },
  });
}
