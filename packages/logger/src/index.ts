export { createLogger, environmentFromNodeEnv } from './logger.js';
export type {
  Environment,
  EnvironmentDefaults,
  LogContext,
  LogEntry,
  Logger,
  LoggerOptions,
  LogLevel,
  LogSink,
} from './types.js';
