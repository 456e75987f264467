/**
 * NETCONF XML layer
 *
 * Builds namespace-qualified request trees for NETCONF operations, serializes
 * them, and parses and validates the replies:
 * - Namespace registry and `{namespace}local` qualified names
 * - Serialization with a guaranteed XML declaration
 * - Root-only streaming parse for reply dispatch
 * - Structural validation of root tags and attributes
 * - `<get>` / `<get-config>` with lazily parsed replies
 *
 * @module netconf-xml
 * @example
 * ```typescript
 * import { GetConfig } from 'netconf-xml';
 *
 * const reply = await new GetConfig(session).request('running', {
 *   type: 'subtree',
 *   criteria: '<interfaces xmlns="urn:ietf:params:xml:ns:yang:ietf-interfaces"/>',
 * });
 * console.log(reply.dataXml);
 * ```
 */

// ============================================================================
// XML utilities
// ============================================================================

export {
  BASE_NS_1_0,
  TAILF_AAA_1_1,
  TAILF_EXECD_1_1,
  CISCO_CPI_1_0,
  FLOWMON_1_0,
  WELL_KNOWN_PREFIXES,
  XML_NS,
  NamespaceRegistry,
  createDefaultRegistry,
  defaultRegistry,
  qualify,
  parseQualifiedName,
  localName,
  newElement,
  subElement,
  findChild,
  findChildren,
  iterElements,
  childText,
  toXml,
  renderElement,
  createXmlBuilder,
  parseElement,
  toElement,
  parseRoot,
  validatedElement,
} from './xml/index.js';

// ============================================================================
// Operations
// ============================================================================

export {
  Rpc,
  RpcReply,
  Get,
  GetConfig,
  GetReply,
  buildFilter,
  datastoreOrUrl,
  parseRpcError,
  type ReplyClass,
  type ReplyOptions,
  type RpcOptions,
} from './operations/index.js';

// ============================================================================
// Capabilities and session
// ============================================================================

export { Capabilities, abbreviate, CAPABILITY_URN_PREFIX } from './capabilities/index.js';
export type { NetconfSession } from './session/index.js';

// ============================================================================
// Configuration
// ============================================================================

export {
  normalizeConfig,
  validateConfig,
  createConfigFromEnv,
  ENV_VARS,
  DEFAULT_ENCODING,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_RAISE_MODE,
  DEFAULT_LOG_LEVEL,
  type NetconfConfig,
  type NormalizedNetconfConfig,
} from './config/index.js';

// ============================================================================
// Errors
// ============================================================================

export {
  NetconfError,
  XmlError,
  OperationError,
  MissingCapabilityError,
  RpcOperationError,
  TimeoutError,
  ConfigError,
  isNetconfError,
  type NetconfErrorParams,
} from './errors/index.js';

// ============================================================================
// Observability
// ============================================================================

export {
  ConsoleLogger,
  NoopLogger,
  type Logger,
  type LogLevel,
  type LogContext,
} from './observability/index.js';

// ============================================================================
// Types
// ============================================================================

export type {
  XmlElement,
  XmlInput,
  RootDescriptor,
  QualifiedName,
  TagRequirement,
  AttributeRequirements,
  FilterSpec,
  CapabilityAssertion,
  RpcError,
  RpcErrorSeverity,
  RaiseMode,
} from './types/index.js';
