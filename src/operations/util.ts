/**
 * Encoders for filter and datastore parameters of operations
 * @module netconf-xml/operations/util
 */

import type { CapabilityAssertion, FilterSpec, XmlElement } from '../types/index.js';
import { OperationError } from '../errors/index.js';
import { newElement, subElement } from '../xml/element.js';
import { toElement } from '../xml/parse.js';
import { qualify } from '../xml/qualify.js';
import { validatedElement } from '../xml/validate.js';

/**
 * Builds the `<filter>` element of a retrieval operation.
 *
 * Accepts `{ type: 'subtree', criteria }`, `{ type: 'xpath', select }`, or a
 * ready-made `<filter>` element (as element or text) carrying a `type`
 * attribute. XPath filters require the `:xpath` capability.
 *
 * @example
 * ```typescript
 * buildFilter({ type: 'xpath', select: '/interfaces/interface' });
 * buildFilter({ type: 'subtree', criteria: '<interfaces xmlns="urn:example"/>' });
 * ```
 *
 * @throws {OperationError} For an unknown filter type
 * @throws {XmlError} If a ready-made filter is not a `<filter type="...">`
 */
export function buildFilter(spec: FilterSpec, assertCapability?: CapabilityAssertion): XmlElement {
  if (typeof spec === 'string' || 'tag' in spec) {
    const filter = validatedElement(spec, ['filter', qualify('filter')], ['type']);
    if (filter.attributes['type'] === 'xpath') {
      assertCapability?.(':xpath');
    }
    return filter;
  }

  const filterType: string = spec.type;
  if (spec.type === 'xpath') {
    assertCapability?.(':xpath');
    return newElement(qualify('filter'), { type: 'xpath', select: spec.select });
  }
  if (spec.type === 'subtree') {
    const filter = newElement(qualify('filter'), { type: 'subtree' });
    filter.children.push(toElement(spec.criteria));
    return filter;
  }
  throw OperationError.invalidFilterType(filterType);
}

/**
 * Builds a datastore parameter such as `<source>` or `<target>`.
 *
 * A location containing `://` is a URL and needs the `:url` capability;
 * anything else names a datastore (`running`, `candidate`, `startup`).
 *
 * @example
 * ```typescript
 * datastoreOrUrl('source', 'running');
 * // <source><running/></source>
 * datastoreOrUrl('source', 'file:///backup.xml', assert);
 * // <source><url>file:///backup.xml</url></source>
 * ```
 *
 * @throws {OperationError} If the location is empty
 * @throws {MissingCapabilityError} From the assertion, for a URL the server
 * cannot take
 */
export function datastoreOrUrl(
  name: string,
  location: string,
  assertCapability?: CapabilityAssertion
): XmlElement {
  if (location.trim() === '') {
    throw new OperationError({
      message: `Missing datastore or URL for <${name}>`,
      code: 'MISSING_DATASTORE',
      details: { parameter: name },
    });
  }

  const node = newElement(qualify(name));
  if (location.includes('://')) {
    assertCapability?.(':url');
    subElement(node, qualify('url'), {}, location);
  } else {
    subElement(node, qualify(location));
  }
  return node;
}
