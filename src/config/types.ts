/**
 * Configuration type definitions for the NETCONF XML layer
 * @module netconf-xml/config/types
 */

import type { LogLevel } from '../observability/index.js';
import type { RaiseMode } from '../types/index.js';

/**
 * Client configuration parameters.
 */
export interface NetconfConfig {
  /**
   * Character encoding named in the XML declaration of outgoing documents.
   * @default 'UTF-8'
   */
  encoding?: string;

  /**
   * Time to wait for a reply, in milliseconds.
   * @default 30000
   */
  timeoutMs?: number;

  /**
   * Which replies carrying rpc-error elements are thrown.
   * @default 'all'
   */
  raiseMode?: RaiseMode;

  /**
   * Minimum level written by the default console logger.
   * @default 'info'
   */
  logLevel?: LogLevel;
}

/**
 * Configuration with all defaults applied.
 */
export type NormalizedNetconfConfig = Required<NetconfConfig>;
