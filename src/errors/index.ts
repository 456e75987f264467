/**
 * Error system for the NETCONF XML layer
 * @module netconf-xml/errors
 */

// Base error class
export { NetconfError, type NetconfErrorParams } from './error.js';

// Error categories
export {
  ConfigError,
  MissingCapabilityError,
  OperationError,
  RpcOperationError,
  TimeoutError,
  XmlError,
} from './categories.js';

/**
 * Type guard for errors raised by this package
 */
export { isNetconfError } from './guards.js';
