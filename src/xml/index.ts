/**
 * XML utilities for the NETCONF XML layer
 *
 * Building, serializing, parsing and structurally validating the element
 * trees exchanged with a NETCONF server.
 *
 * @module netconf-xml/xml
 *
 * @example
 * ```typescript
 * import { newElement, qualify, toXml, parseRoot } from 'netconf-xml';
 *
 * const xml = toXml(newElement(qualify('get')));
 * const { tag, attributes } = parseRoot(reply);
 * ```
 */

// Namespaces
export {
  BASE_NS_1_0,
  TAILF_AAA_1_1,
  TAILF_EXECD_1_1,
  CISCO_CPI_1_0,
  FLOWMON_1_0,
  WELL_KNOWN_PREFIXES,
  NamespaceRegistry,
  createDefaultRegistry,
  defaultRegistry,
} from './namespaces.js';

// Qualified names
export { qualify, parseQualifiedName, localName } from './qualify.js';

// Element construction and lookup
export {
  newElement,
  subElement,
  findChild,
  findChildren,
  iterElements,
  childText,
} from './element.js';

// Serialization
export { toXml, renderElement, createXmlBuilder, XML_NS } from './serialize.js';

// Parsing
export { parseElement, toElement, parseRoot } from './parse.js';

// Validation
export { validatedElement } from './validate.js';
