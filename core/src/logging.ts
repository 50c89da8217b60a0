/**
 * Structured logging for shardflow
 *
 * A small logger interface that the scheduler, engine and benchmark accept by
 * injection. Entries carry a level, a message and JSON-compatible context.
 *
 * @example
 * ```typescript
 * import { createConsoleLogger, withContext } from '@shardflow/core';
 *
 * const logger = createConsoleLogger({ format: 'pretty', minLevel: 'info' });
 * const runLogger = withContext(logger, { runId: 'nightly-load' });
 * runLogger.info('run finished', { partitionCount: 10, durationMs: 42 });
 * ```
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * JSON-compatible value allowed in log context
 */
export type LogContextValue =
  | string
  | number
  | boolean
  | null
  | LogContextValue[]
  | { [key: string]: LogContextValue };

/**
 * Structured context attached to a log entry
 */
export interface LogContext {
  /** Component emitting the entry */
  service?: string;
  /** Operation being performed */
  operation?: string;
  partitionIndex?: number;
  workerId?: number;
  partitionCount?: number;
  concurrency?: number;
  durationMs?: number;
  recordsIn?: number;
  recordsOut?: number;
  errorCode?: string;
  [key: string]: LogContextValue | undefined;
}

/**
 * A single log entry
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Unix timestamp in milliseconds */
  timestamp: number;
  context?: LogContext;
  error?: Error;
}

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

export interface LoggerConfig {
  /** Minimum level to emit (default: 'debug') */
  minLevel?: LogLevel;
  /** Sink for emitted entries (default: discard) */
  output?: (entry: LogEntry) => void;
}

export interface ConsoleLoggerConfig extends LoggerConfig {
  /** 'json' for one JSON object per line, 'pretty' for humans (default: 'json') */
  format?: 'json' | 'pretty';
}

/**
 * Logger that keeps its entries for assertions
 */
export interface TestLogger extends Logger {
  getLogs(): LogEntry[];
  getLogsByLevel(level: LogLevel): LogEntry[];
  clear(): void;
}

// =============================================================================
// Levels
// =============================================================================

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const LogLevels = {
  order(level: LogLevel): number {
    return LOG_LEVEL_ORDER[level];
  },

  isAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
  },

  isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LOG_LEVEL_ORDER, value);
  },
};

// =============================================================================
// Factories
// =============================================================================

/**
 * Create a logger that hands every entry at or above `minLevel` to `output`.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const minLevel = config.minLevel ?? 'debug';
  const output = config.output ?? ((): void => {});

  const emit = (level: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (!LogLevels.isAtLeast(level, minLevel)) return;

    const entry: LogEntry = { level, message, timestamp: Date.now() };
    if (context !== undefined) entry.context = context;
    if (error !== undefined) entry.error = error;
    output(entry);
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, error, context) => emit('error', message, context, error),
  };
}

/**
 * Render an entry the way the console logger prints it.
 */
export function formatLogEntry(entry: LogEntry, format: 'json' | 'pretty'): string {
  if (format === 'json') {
    return JSON.stringify({
      level: entry.level,
      message: entry.message,
      timestamp: entry.timestamp,
      ...(entry.context && { context: entry.context }),
      ...(entry.error && {
        error: { name: entry.error.name, message: entry.error.message, stack: entry.error.stack },
      }),
    });
  }

  const time = new Date(entry.timestamp).toISOString();
  let line = `[${time}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
  if (entry.context) {
    line += ` ${JSON.stringify(entry.context)}`;
  }
  if (entry.error) {
    line += `\n  Error: ${entry.error.message}`;
  }
  return line;
}

/**
 * Create a logger writing to the console; warnings and errors go to stderr.
 */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? 'json';

  return createLogger({
    ...config,
    output: entry => {
      const line = formatLogEntry(entry, format);
      if (entry.level === 'warn' || entry.level === 'error') {
        console.error(line);
      } else {
        console.log(line);
      }
    },
  });
}

/**
 * Logger that discards everything. Default for library entry points.
 */
export function createNoopLogger(): Logger {
  return createLogger({ minLevel: 'error', output: () => {} });
}

/**
 * Create a logger that captures entries in memory.
 */
export function createTestLogger(config: LoggerConfig = {}): TestLogger {
  const logs: LogEntry[] = [];
  const logger = createLogger({
    minLevel: config.minLevel,
    output: entry => {
      logs.push(entry);
      config.output?.(entry);
    },
  });

  return {
    ...logger,
    getLogs: () => [...logs],
    getLogsByLevel: level => logs.filter(entry => entry.level === level),
    clear: () => {
      logs.length = 0;
    },
  };
}

/**
 * Child logger that merges `context` into every entry. Context given at the
 * call site wins over the bound context.
 */
export function withContext(logger: Logger, context: LogContext): Logger {
  const merge = (local?: LogContext): LogContext =>
    local === undefined ? context : { ...context, ...local };

  return {
    debug: (message, local) => logger.debug(message, merge(local)),
    info: (message, local) => logger.info(message, merge(local)),
    warn: (message, local) => logger.warn(message, merge(local)),
    error: (message, error, local) => logger.error(message, error, merge(local)),
  };
}
