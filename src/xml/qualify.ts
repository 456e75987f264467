/**
 * Qualified tag names in `{namespace}local` form
 * @module netconf-xml/xml/qualify
 */

import type { QualifiedName } from '../types/index.js';
import { BASE_NS_1_0 } from './namespaces.js';

/**
 * Qualifies a tag name with a namespace.
 *
 * Passing `null` as the namespace leaves the name unqualified.
 *
 * @example
 * ```typescript
 * qualify('get'); // '{urn:ietf:params:xml:ns:netconf:base:1.0}get'
 * qualify('name', 'urn:example'); // '{urn:example}name'
 * qualify('name', null); // 'name'
 * ```
 */
export function qualify(tag: string, namespace: string | null = BASE_NS_1_0): string {
  return namespace === null ? tag : `{${namespace}}${tag}`;
}

/**
 * Splits a qualified name into namespace and local part
 */
export function parseQualifiedName(name: string): QualifiedName {
  if (name.startsWith('{')) {
    const end = name.indexOf('}');
    if (end > 0) {
      return { namespace: name.slice(1, end), local: name.slice(end + 1) };
    }
  }
  return { local: name };
}

/**
 * Local part of a possibly qualified name
 */
export function localName(name: string): string {
  return parseQualifiedName(name).local;
}
