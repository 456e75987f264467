/**
 * Structured logging for NETCONF exchanges
 * @module netconf-xml/observability/logging
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const WRITERS: Record<LogLevel, (line: string) => void> = {
  error: (line) => console.error(line),
  warn: (line) => console.warn(line),
  info: (line) => console.log(line),
  debug: (line) => console.debug(line),
};

/**
 * Writes `[timestamp] [LEVEL] [component] message {context}` lines to the
 * console, dropping anything below `minLevel`.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly minLevel: LogLevel = 'info',
    private readonly component = 'netconf'
  ) {}

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }
    const suffix = context ? ` ${JSON.stringify(context)}` : '';
    WRITERS[level](
      `[${new Date().toISOString()}] [${level.toUpperCase()}] [${this.component}] ${message}${suffix}`
    );
  }
}

/**
 * Logger that discards everything
 */
export class NoopLogger implements Logger {
  error(_message: string, _context?: LogContext): void {}
  warn(_message: string, _context?: LogContext): void {}
  info(_message: string, _context?: LogContext): void {}
  debug(_message: string, _context?: LogContext): void {}
}

/**
 * Logs the outcome of one RPC exchange. `errorCount` is left out when the
 * reply was not parsed.
 */
export function logExchange(
  logger: Logger,
  operation: string,
  messageId: string,
  durationMs: number,
  errorCount?: number
): void {
  const context = { operation, messageId, durationMs, errorCount };
  if (errorCount !== undefined && errorCount > 0) {
    logger.warn('NETCONF reply carried rpc-error elements', context);
  } else {
    logger.debug('NETCONF exchange completed', context);
  }
}

/**
 * Logs an exchange that ended without a usable reply
 */
export function logFailure(
  logger: Logger,
  operation: string,
  messageId: string,
  error: unknown
): void {
  logger.error('NETCONF rpc failed', {
    operation,
    messageId,
    error: error instanceof Error ? error.message : String(error),
  });
}
