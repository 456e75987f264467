/**
 * Configuration validation and normalization for the NETCONF XML layer
 * @module netconf-xml/config/validation
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import type { NetconfConfig, NormalizedNetconfConfig } from './types.js';
import {
  DEFAULT_ENCODING,
  DEFAULT_LOG_LEVEL,
  DEFAULT_RAISE_MODE,
  DEFAULT_TIMEOUT_MS,
} from './defaults.js';

const configSchema = z.object({
  encoding: z.string().min(1),
  timeoutMs: z.number().int().positive(),
  raiseMode: z.enum(['none', 'errors', 'all']),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']),
});

/**
 * Validates a configuration.
 *
 * @throws {ConfigError} Listing every invalid field
 */
export function validateConfig(config: NormalizedNetconfConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError({
      message: `Invalid configuration: ${issues.join(', ')}`,
      code: 'INVALID_CONFIG',
      details: { issues },
    });
  }
}

/**
 * Applies defaults to a partial configuration and validates the result.
 */
export function normalizeConfig(config: NetconfConfig = {}): NormalizedNetconfConfig {
  const normalized: NormalizedNetconfConfig = {
    encoding: config.encoding ?? DEFAULT_ENCODING,
    timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    raiseMode: config.raiseMode ?? DEFAULT_RAISE_MODE,
    logLevel: config.logLevel ?? DEFAULT_LOG_LEVEL,
  };

  validateConfig(normalized);
  return normalized;
}
