// @shardflow/core
// Data model, schema checks, errors, logging and partitioning for shardflow

// =============================================================================
// Data Model
// =============================================================================

export {
  COLUMN_TYPES,
  type Scalar,
  type ColumnType,
  type ColumnDefinition,
  type ColumnInput,
  type Schema,
  type Row,
  type Partition,
  type PartitionTaskStatus,
  type PartitionTiming,
  type ExecutionReport,
  type RecordSource,
} from './types.js';

// =============================================================================
// Schema
// =============================================================================

export {
  defineSchema,
  columnNames,
  findColumn,
  requireColumn,
  isNumericType,
  isOrderableType,
  scalarMatchesType,
  isScalar,
  describeValue,
  valueFitsColumn,
  findRowProblem,
  compareScalars,
  compareScalarTuples,
  parseScalar,
  coerceJsonValue,
} from './schema.js';

// =============================================================================
// Errors
// =============================================================================

export {
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
  type ShardflowErrorOptions,
  type EvaluationErrorContext,
  type PartitionTaskFailure,
} from './errors.js';

export { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Logging
// =============================================================================

export {
  LogLevels,
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  withContext,
  type LogLevel,
  type LogContextValue,
  type LogContext,
  type LogEntry,
  type Logger,
  type LoggerConfig,
  type ConsoleLoggerConfig,
  type TestLogger,
} from './logging.js';

// =============================================================================
// Metrics and Observer Types
// =============================================================================

export type {
  MetricLabels,
  MetricType,
  MetricSample,
  Metric,
  Counter,
  LabeledCounter,
  Gauge,
  LabeledGauge,
  HistogramData,
  TimerEnd,
  Histogram,
  LabeledHistogram,
  CounterConfig,
  GaugeConfig,
  HistogramConfig,
  MetricsRegistry,
  SchedulerMetricsCollection,
} from './metrics-types.js';

export type {
  ExecutionObserver,
  RunStartEvent,
  TaskStartEvent,
  TaskEndEvent,
  RunEndEvent,
} from './observer.js';

// =============================================================================
// Partitioning and Sources
// =============================================================================

export {
  partition,
  partitionAsync,
  assertPartitionSize,
  collectPartitions,
  partitionCount,
} from './partition.js';

export {
  fromArray,
  readNdjsonRecords,
  readCsvRecords,
  parseCsvLine,
  type SourceOptions,
  type CsvSourceOptions,
} from './sources.js';
