/**
 * Server capability set
 * @module netconf-xml/capabilities/capabilities
 */

/**
 * Prefix of the standard NETCONF capability URIs that have `:name`
 * abbreviations
 */
export const CAPABILITY_URN_PREFIX = 'urn:ietf:params:netconf:capability:';

/**
 * Short forms of a capability URI.
 *
 * @example
 * ```typescript
 * abbreviate('urn:ietf:params:netconf:capability:url:1.0?scheme=http');
 * // [':url', ':url:1.0']
 * ```
 */
export function abbreviate(uri: string): string[] {
  const base = stripQuery(uri);
  if (!base.startsWith(CAPABILITY_URN_PREFIX)) {
    return [];
  }
  const parts = base.slice(CAPABILITY_URN_PREFIX.length).split(':');
  const name = parts[0];
  if (!name) {
    return [];
  }
  const version = parts[1];
  return version ? [`:${name}`, `:${name}:${version}`] : [`:${name}`];
}

function stripQuery(uri: string): string {
  const query = uri.indexOf('?');
  return query === -1 ? uri : uri.slice(0, query);
}

/**
 * Set of capability URIs advertised by a server, queryable by full URI or
 * by abbreviation
 */
export class Capabilities {
  private readonly uris: string[] = [];
  private readonly keys = new Set<string>();

  constructor(uris: Iterable<string> = []) {
    for (const uri of uris) {
      this.add(uri);
    }
  }

  add(uri: string): this {
    const trimmed = uri.trim();
    if (trimmed === '' || this.uris.includes(trimmed)) {
      return this;
    }
    this.uris.push(trimmed);
    this.keys.add(trimmed);
    this.keys.add(stripQuery(trimmed));
    for (const abbreviation of abbreviate(trimmed)) {
      this.keys.add(abbreviation);
    }
    return this;
  }

  has(key: string): boolean {
    return this.keys.has(key) || this.keys.has(stripQuery(key));
  }

  list(): string[] {
    return [...this.uris];
  }

  get size(): number {
    return this.uris.length;
  }
}
