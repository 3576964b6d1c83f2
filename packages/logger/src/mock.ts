/** Spy logger for tests */

import { type Mock, vi } from 'vitest';
import type { LogContext, Logger } from './types.js';

type LogMethod = (event: string, context?: LogContext) => void;

export interface MockLogger extends Logger {
  child: Mock<(context: LogContext) => Logger>;
  debug: Mock<LogMethod>;
  info: Mock<LogMethod>;
  warn: Mock<LogMethod>;
  error: Mock<LogMethod>;
  fatal: Mock<LogMethod>;
  flush: Mock<() => Promise<void>>;
}

/**
 * Creates a logger whose methods are Vitest spies.
 * `child()` returns the same mock, so entries logged through children are
 * asserted on the logger handed out.
 *
 * @example
 * ```typescript
 * import { createMockLogger } from '@jsonfields/logger/mock';
 *
 * const logger = createMockLogger();
 * class Signup extends Json {
 *   static Meta = class extends DefaultMeta {
 *     override logger = logger;
 *   };
 * }
 *
 * new Signup({ email: 'a@b.io' }).validate();
 *
 * expect(logger.debug).toHaveBeenCalledWith('json_validated', expect.anything());
 * ```
 */
export function createMockLogger(): MockLogger {
  const logger: MockLogger = {
    child: vi.fn((_context: LogContext): Logger => logger),
    debug: vi.fn<LogMethod>(),
    info: vi.fn<LogMethod>(),
    warn: vi.fn<LogMethod>(),
    error: vi.fn<LogMethod>(),
    fatal: vi.fn<LogMethod>(),
    flush: vi.fn(async () => {}),
  };
  return logger;
}
