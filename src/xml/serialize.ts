/**
 * Element-to-text serialization
 * @module netconf-xml/xml/serialize
 */

import { XMLBuilder } from 'fast-xml-parser';
import type { XmlElement, XmlInput } from '../types/index.js';
import { DEFAULT_ENCODING } from '../config/defaults.js';
import { defaultRegistry, type NamespaceRegistry } from './namespaces.js';
import { parseQualifiedName } from './qualify.js';

/** Namespace bound to the reserved `xml` prefix; never declared */
export const XML_NS = 'http://www.w3.org/XML/1998/namespace';

const ATTRIBUTE_PREFIX = '@_';
const TEXT_NODE = '#text';

const TEXT_ESCAPES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  "'": '&apos;',
  '"': '&quot;',
};

// Parsers normalize raw line breaks and tabs in attribute values to spaces
const ATTRIBUTE_ESCAPES: Readonly<Record<string, string>> = {
  ...TEXT_ESCAPES,
  '\n': '&#10;',
  '\r': '&#13;',
  '\t': '&#9;',
};

function escaper(
  table: Readonly<Record<string, string>>,
  pattern: RegExp
): (name: string, value: unknown) => string {
  return (_name, value) => String(value).replace(pattern, (char) => table[char] ?? char);
}

/**
 * Builder options for ordered element trees. Escaping is done by the value
 * processors, so the builder's own entity pass is off.
 */
const BUILDER_OPTIONS = {
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_NODE,
  format: false,
  suppressEmptyNode: true,
  suppressBooleanAttributes: false,
  processEntities: false,
  tagValueProcessor: escaper(TEXT_ESCAPES, /[&<>'"]/g),
  attributeValueProcessor: escaper(ATTRIBUTE_ESCAPES, /[&<>'"\n\r\t]/g),
};

/**
 * Node shape the builder consumes in `preserveOrder` mode: one key naming
 * the element, holding its ordered content, plus `:@` for attributes.
 */
type OrderedNode = { [name: string]: OrderedContent[] | Record<string, string> };
type OrderedContent = OrderedNode | { [TEXT_NODE]: string };

/**
 * Creates a configured XML builder instance for ordered element trees
 */
export function createXmlBuilder(): XMLBuilder {
  return new XMLBuilder(BUILDER_OPTIONS);
}

/**
 * Prefix assignment for every namespace a tree uses, in order of first use
 */
function assignPrefixes(root: XmlElement, registry: NamespaceRegistry): Map<string, string> {
  const assigned = new Map<string, string>();
  const taken = new Set<string>(['xml', 'xmlns']);
  let generated = 0;

  const bind = (name: string): void => {
    const { namespace } = parseQualifiedName(name);
    if (namespace === undefined || namespace === XML_NS || assigned.has(namespace)) {
      return;
    }
    let prefix = registry.prefixFor(namespace);
    if (prefix === undefined || prefix === '' || taken.has(prefix)) {
      do {
        prefix = `ns${generated++}`;
      } while (taken.has(prefix));
    }
    taken.add(prefix);
    assigned.set(namespace, prefix);
  };

  const visit = (element: XmlElement): void => {
    bind(element.tag);
    for (const name of Object.keys(element.attributes)) {
      bind(name);
    }
    element.children.forEach(visit);
  };

  visit(root);
  return assigned;
}

function prefixedName(name: string, prefixes: Map<string, string>): string {
  const { namespace, local } = parseQualifiedName(name);
  if (namespace === undefined) {
    return local;
  }
  if (namespace === XML_NS) {
    return `xml:${local}`;
  }
  return `${prefixes.get(namespace)}:${local}`;
}

function toOrderedNode(
  element: XmlElement,
  prefixes: Map<string, string>,
  declareNamespaces = false
): OrderedNode {
  const attributes: Record<string, string> = {};
  if (declareNamespaces) {
    for (const [uri, prefix] of prefixes) {
      attributes[`${ATTRIBUTE_PREFIX}xmlns:${prefix}`] = uri;
    }
  }
  for (const [name, value] of Object.entries(element.attributes)) {
    attributes[`${ATTRIBUTE_PREFIX}${prefixedName(name, prefixes)}`] = value;
  }

  const content: OrderedContent[] = [];
  if (element.text !== undefined && element.text !== '') {
    content.push({ [TEXT_NODE]: element.text });
  }
  for (const child of element.children) {
    content.push(toOrderedNode(child, prefixes));
  }

  const node: OrderedNode = { [prefixedName(element.tag, prefixes)]: content };
  if (Object.keys(attributes).length > 0) {
    node[':@'] = attributes;
  }
  return node;
}

/**
 * Renders an element tree without an XML declaration.
 *
 * Every namespace the tree uses is declared on the root element, with the
 * registry's preferred prefix where one is registered and free.
 */
export function renderElement(
  element: XmlElement,
  registry: NamespaceRegistry = defaultRegistry
): string {
  const prefixes = assignPrefixes(element, registry);
  const root = toOrderedNode(element, prefixes, true);
  return createXmlBuilder().build([root]);
}

/**
 * Converts an element to an XML document.
 *
 * Output that already starts with an XML declaration is returned untouched;
 * anything else gets `<?xml version="1.0" encoding="..."?>` prepended with
 * nothing in between.
 *
 * @example
 * ```typescript
 * toXml(newElement(qualify('get')));
 * // '<?xml version="1.0" encoding="UTF-8"?><nc:get xmlns:nc="urn:ietf:params:xml:ns:netconf:base:1.0"/>'
 * ```
 */
export function toXml(
  x: XmlInput,
  encoding: string = DEFAULT_ENCODING,
  registry: NamespaceRegistry = defaultRegistry
): string {
  const xml = typeof x === 'string' ? x : renderElement(x, registry);
  return xml.startsWith('<?xml') ? xml : `<?xml version="1.0" encoding="${encoding}"?>${xml}`;
}
