export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type Environment = 'test' | 'development' | 'production';

export interface EnvironmentDefaults {
  level: LogLevel;
  includeStackTraces: boolean;
  batchSize: number;
}

/** Values attached to an entry; merged from parent loggers down */
export type LogContext = Record<string, unknown>;

export interface LogEntry {
  id: string;
  level: LogLevel;
  event: string;
  context: LogContext;
  /** Milliseconds since the epoch */
  time: number;
}

/** Receives batches of entries at info level and above */
export interface LogSink {
  write(entries: readonly LogEntry[]): Promise<void>;
}

export interface Logger {
  /**
   * Create a logger that adds `context` to every entry.
   * Children share their parent's batch and sink.
   */
  child(context: LogContext): Logger;

  /** Output only; never batched for the sink */
  debug(event: string, context?: LogContext): void;

  info(event: string, context?: LogContext): void;

  warn(event: string, context?: LogContext): void;

  error(event: string, context?: LogContext): void;

  /** Flushes the batch right away */
  fatal(event: string, context?: LogContext): void;

  /** Hand batched entries to the sink */
  flush(): Promise<void>;
}

export interface LoggerOptions {
  /** Defaults to development */
  environment?: Environment;
  /** Overrides the environment's minimum level */
  level?: LogLevel;
  /** Without a sink, entries only go to the output */
  sink?: LogSink;
  /** Entries batched before an automatic flush; defaults per environment */
  batchSize?: number;
  /** Receives one JSON line per entry; defaults to stderr */
  output?: (line: string) => void;
}
