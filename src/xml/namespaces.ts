/**
 * Namespace constants and the prefix registry used by the serializer
 * @module netconf-xml/xml/namespaces
 */

import { NoopLogger, type Logger } from '../observability/index.js';

/** Base NETCONF namespace */
export const BASE_NS_1_0 = 'urn:ietf:params:xml:ns:netconf:base:1.0';
/** Tail-f AAA data model */
export const TAILF_AAA_1_1 = 'http://tail-f.com/ns/aaa/1.1';
/** Tail-f execd data model */
export const TAILF_EXECD_1_1 = 'http://tail-f.com/ns/execd/1.1';
/** Cisco CPI data model */
export const CISCO_CPI_1_0 = 'http://www.cisco.com/cpi_10/schema';
/** Flowmon data model */
export const FLOWMON_1_0 = 'http://www.liberouter.org/ns/netopeer/flowmon/1.0';

/**
 * Prefixes registered on every default registry, keyed by prefix
 */
export const WELL_KNOWN_PREFIXES: Readonly<Record<string, string>> = {
  nc: BASE_NS_1_0,
  aaa: TAILF_AAA_1_1,
  execd: TAILF_EXECD_1_1,
  cpi: CISCO_CPI_1_0,
  fm: FLOWMON_1_0,
};

/**
 * Preferred prefix for each namespace URI.
 *
 * Only affects how serialized documents look; parsing and element equality
 * work on namespace URIs.
 */
export class NamespaceRegistry {
  private readonly prefixes = new Map<string, string>();

  constructor(private readonly logger: Logger = new NoopLogger()) {}

  /**
   * Associates `prefix` with `uri`. The last registration for a URI wins,
   * and a prefix belongs to one URI at a time.
   */
  register(prefix: string, uri: string): this {
    const previous = this.prefixes.get(uri);
    if (previous !== undefined && previous !== prefix) {
      this.logger.debug('Replacing namespace prefix', { uri, previous, prefix });
    }
    for (const [registered, registeredPrefix] of this.prefixes) {
      if (registered !== uri && registeredPrefix === prefix) {
        this.prefixes.delete(registered);
      }
    }
    this.prefixes.set(uri, prefix);
    return this;
  }

  prefixFor(uri: string): string | undefined {
    return this.prefixes.get(uri);
  }

  /**
   * Registered `[uri, prefix]` pairs in registration order
   */
  entries(): Array<[string, string]> {
    return [...this.prefixes.entries()];
  }
}

/**
 * Creates a registry preloaded with the well-known NETCONF and vendor prefixes
 */
export function createDefaultRegistry(logger?: Logger): NamespaceRegistry {
  const registry = new NamespaceRegistry(logger);
  for (const [prefix, uri] of Object.entries(WELL_KNOWN_PREFIXES)) {
    registry.register(prefix, uri);
  }
  return registry;
}

/**
 * Registry used when a caller does not pass one
 */
export const defaultRegistry = createDefaultRegistry();
