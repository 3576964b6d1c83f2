/** Structured event logger writing JSON lines, with optional batching to a sink */

import { ulid } from 'ulid';
import type {
  Environment,
  EnvironmentDefaults,
  LogContext,
  LogEntry,
  Logger,
  LoggerOptions,
  LogLevel,
  LogSink,
} from './types.js';

const ENVIRONMENT_DEFAULTS: Record<Environment, EnvironmentDefaults> = {
  test: { level: 'debug', includeStackTraces: true, batchSize: 1000 },
  development: { level: 'info', includeStackTraces: true, batchSize: 50 },
  production: { level: 'warn', includeStackTraces: false, batchSize: 50 },
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

/**
 * Map a NODE_ENV value onto a logger environment.
 * Anything other than `test` or `production` is treated as development.
 */
export function environmentFromNodeEnv(nodeEnv: string | undefined): Environment {
  if (nodeEnv === 'test' || nodeEnv === 'production') {
    return nodeEnv;
  }
  return 'development';
}

function writeToStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

/** Entries waiting for the sink; one per root logger, shared by its children */
class EntryBatch {
  private pending: LogEntry[] = [];

  constructor(
    private readonly sink: LogSink,
    private readonly size: number,
  ) {}

  add(entry: LogEntry): void {
    this.pending.push(entry);
    if (this.pending.length >= this.size) {
      this.flush().catch((err: unknown) => {
        writeToStderr(`Failed to flush log batch: ${String(err)}`);
      });
    }
  }

  async flush(): Promise<void> {
    if (this.pending.length === 0) {
      return;
    }

    const entries = this.pending;
    this.pending = [];

    try {
      await this.sink.write(entries);
    } catch (err) {
      // Requeue ahead of anything logged meanwhile
      this.pending = [...entries, ...this.pending];
      throw err;
    }
  }
}

interface LoggerState {
  level: LogLevel;
  includeStackTraces: boolean;
  output: (line: string) => void;
  batch: EntryBatch | null;
}

class EventLogger implements Logger {
  constructor(
    private readonly state: LoggerState,
    private readonly context: LogContext,
  ) {}

  child(context: LogContext): Logger {
    return new EventLogger(this.state, { ...this.context, ...context });
  }

  debug(event: string, context?: LogContext): void {
    this.log('debug', event, context);
  }

  info(event: string, context?: LogContext): void {
    this.log('info', event, context);
  }

  warn(event: string, context?: LogContext): void {
    this.log('warn', event, context);
  }

  error(event: string, context?: LogContext): void {
    this.log('error', event, context);
  }

  fatal(event: string, context?: LogContext): void {
    this.log('fatal', event, context);
    this.flush().catch((err: unknown) => {
      writeToStderr(`Failed to flush fatal log: ${String(err)}`);
    });
  }

  flush(): Promise<void> {
    return this.state.batch ? this.state.batch.flush() : Promise.resolve();
  }

  private log(level: LogLevel, event: string, context?: LogContext): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.state.level]) {
      return;
    }

    const entry: LogEntry = {
      id: ulid(),
      level,
      event,
      context: this.serializeContext({ ...this.context, ...context }),
      time: Date.now(),
    };

    this.state.output(
      JSON.stringify({
        ...entry.context,
        time: new Date(entry.time).toISOString(),
        level: entry.level,
        event: entry.event,
      }),
    );

    if (this.state.batch && level !== 'debug') {
      this.state.batch.add(entry);
    }
  }

  private serializeContext(context: LogContext): LogContext {
    const result: LogContext = {};
    for (const [key, value] of Object.entries(context)) {
      result[key] = value instanceof Error ? this.serializeError(value) : value;
    }
    return result;
  }

  /** Errors stringify to `{}`, so keep their name, message and cause chain */
  private serializeError(error: Error): LogContext {
    return {
      name: error.name,
      message: error.message,
      ...(this.state.includeStackTraces && error.stack ? { stack: error.stack } : {}),
      ...(error.cause instanceof Error ? { cause: this.serializeError(error.cause) } : {}),
    };
  }
}

/**
 * Create a root logger.
 *
 * @throws {Error} If `batchSize` is not a positive integer or `level` is unknown
 *
 * @example
 * ```ts
 * const logger = createLogger({ environment: 'production', sink });
 * logger.child({ json: 'Signup' }).warn('translations_missing', { locales: ['xx'] });
 * await logger.flush();
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const defaults = ENVIRONMENT_DEFAULTS[options.environment ?? 'development'];
  const level = options.level ?? defaults.level;
  const batchSize = options.batchSize ?? defaults.batchSize;

  if (!isLogLevel(level)) {
    throw new Error(`Unknown log level '${String(level)}'`);
  }
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new Error('LoggerOptions.batchSize must be a positive integer');
  }

  return new EventLogger(
    {
      level,
      includeStackTraces: defaults.includeStackTraces,
      output: options.output ?? writeToStderr,
      batch: options.sink ? new EntryBatch(options.sink, batchSize) : null,
    },
    {},
  );
}
