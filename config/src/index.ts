/**
 * @shardflow/config - Configuration for shardflow
 *
 * One configuration object passed explicitly to the engine; there is no
 * process-wide mutable configuration.
 *
 * - Partial overrides with createConfig()
 * - Environment variable support with getConfigFromEnv()
 * - Validation with validateConfig() / assertValidConfig()
 *
 * @example
 * ```typescript
 * import { createConfig, getConfigFromEnv, validateConfig } from '@shardflow/config';
 *
 * const config = createConfig({ scheduler: { concurrency: 8 } });
 * const envConfig = getConfigFromEnv();
 *
 * const result = validateConfig(envConfig);
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 * ```
 *
 * @packageDocumentation
 * @module @shardflow/config
 */

export type {
  PartitionConfig,
  SchedulerConfig,
  LogFormat,
  ObservabilityConfig,
  ShardflowConfig,
  ConfigOverrides,
  ValidationError,
  ValidationWarning,
  ValidationResult,
  EnvConfigOptions,
} from './types.js';

export { DEFAULT_CONFIG } from './defaults.js';

export { createConfig, mergeConfigs, getConfigFromEnv } from './config.js';

export { validateConfig, assertValidConfig } from './validation.js';
