/**
 * Configuration for the NETCONF XML layer
 * @module netconf-xml/config
 */

export type { NetconfConfig, NormalizedNetconfConfig } from './types.js';

export {
  DEFAULT_ENCODING,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_RAISE_MODE,
  DEFAULT_LOG_LEVEL,
} from './defaults.js';

export { validateConfig, normalizeConfig } from './validation.js';

export { createConfigFromEnv, ENV_VARS } from './env.js';
