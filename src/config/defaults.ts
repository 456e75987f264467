/**
 * Default configuration values for the NETCONF XML layer
 * @module netconf-xml/config/defaults
 */

import type { LogLevel } from '../observability/index.js';
import type { RaiseMode } from '../types/index.js';

/**
 * Default encoding named in XML declarations.
 */
export const DEFAULT_ENCODING = 'UTF-8';

/**
 * Default reply timeout in milliseconds (30 seconds).
 */
export const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Default raise mode.
 */
export const DEFAULT_RAISE_MODE: RaiseMode = 'all';

/**
 * Default log level.
 */
export const DEFAULT_LOG_LEVEL: LogLevel = 'info';
