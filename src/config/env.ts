/**
 * Environment variable configuration loading for the NETCONF XML layer
 * @module netconf-xml/config/env
 */

import { ConfigError } from '../errors/index.js';
import { LOG_LEVELS, type LogLevel } from '../observability/index.js';
import type { RaiseMode } from '../types/index.js';
import type { NetconfConfig, NormalizedNetconfConfig } from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * Environment variable names.
 */
export const ENV_VARS = {
  ENCODING: 'NETCONF_ENCODING',
  TIMEOUT_MS: 'NETCONF_TIMEOUT_MS',
  RAISE_MODE: 'NETCONF_RAISE_MODE',
  LOG_LEVEL: 'NETCONF_LOG_LEVEL',
} as const;

const RAISE_MODES: readonly RaiseMode[] = ['none', 'errors', 'all'];

function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value.trim();
}

/**
 * Parses an integer from an environment variable.
 *
 * @throws {ConfigError} If value is not a valid integer
 */
function parseIntEnv(value: string | undefined, name: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError({
      message: `${name} must be a valid integer, got: ${value}`,
      code: 'INVALID_INTEGER',
    });
  }

  return parsed;
}

function parseChoiceEnv<T extends string>(
  value: string | undefined,
  name: string,
  choices: readonly T[]
): T | undefined {
  if (value === undefined) {
    return undefined;
  }

  const match = choices.find((choice) => choice === value.toLowerCase());
  if (match === undefined) {
    throw new ConfigError({
      message: `${name} must be one of ${choices.join(', ')}, got: ${value}`,
      code: 'INVALID_CHOICE',
    });
  }

  return match;
}

/**
 * Creates configuration from environment variables.
 *
 * Environment variables (all optional):
 * - NETCONF_ENCODING: encoding named in XML declarations
 * - NETCONF_TIMEOUT_MS: reply timeout in milliseconds
 * - NETCONF_RAISE_MODE: none | errors | all
 * - NETCONF_LOG_LEVEL: error | warn | info | debug
 *
 * @throws {ConfigError} If a variable is set to an invalid value
 */
export function createConfigFromEnv(env: NodeJS.ProcessEnv = process.env): NormalizedNetconfConfig {
  const config: NetconfConfig = {
    encoding: readEnv(env, ENV_VARS.ENCODING),
    timeoutMs: parseIntEnv(readEnv(env, ENV_VARS.TIMEOUT_MS), ENV_VARS.TIMEOUT_MS),
    raiseMode: parseChoiceEnv(readEnv(env, ENV_VARS.RAISE_MODE), ENV_VARS.RAISE_MODE, RAISE_MODES),
    logLevel: parseChoiceEnv<LogLevel>(readEnv(env, ENV_VARS.LOG_LEVEL), ENV_VARS.LOG_LEVEL, LOG_LEVELS),
  };

  return normalizeConfig(config);
}
