/**
 * Observability for the NETCONF XML layer
 * @module netconf-xml/observability
 */

export {
  ConsoleLogger,
  NoopLogger,
  LOG_LEVELS,
  logExchange,
  logFailure,
  type Logger,
  type LogLevel,
  type LogContext,
} from './logging.js';
