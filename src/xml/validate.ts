/**
 * Structural checks on a document's root element
 * @module netconf-xml/xml/validate
 */

import type {
  AttributeRequirements,
  TagRequirement,
  XmlElement,
  XmlInput,
} from '../types/index.js';
import { XmlError } from '../errors/index.js';
import { toElement } from './parse.js';

function alternatives(requirement: string | readonly string[]): readonly string[] {
  return typeof requirement === 'string' ? [requirement] : requirement;
}

/**
 * Checks that the root element of a document or element meets the given
 * criteria, and returns it.
 *
 * - `tags`: the root tag must equal the tag, or one of the alternatives
 * - `attrs`: every entry must be present on the root; an entry that is a
 *   list is satisfied by any one of its names
 *
 * Only the root's tag and attribute names are looked at.
 *
 * @example
 * ```typescript
 * const reply = validatedElement(raw, qualify('rpc-reply'), [['message-id', 'id']]);
 * ```
 *
 * @throws {XmlError} If the input does not parse or a check fails
 */
export function validatedElement(
  x: XmlInput,
  tags?: TagRequirement,
  attrs?: AttributeRequirements
): XmlElement {
  const element = toElement(x);

  if (tags !== undefined && tags.length > 0) {
    if (!alternatives(tags).includes(element.tag)) {
      throw XmlError.unexpectedTag(element.tag);
    }
  }

  if (attrs !== undefined) {
    for (const requirement of attrs) {
      const names = alternatives(requirement);
      if (!names.some((name) => Object.prototype.hasOwnProperty.call(element.attributes, name))) {
        throw XmlError.missingAttributes(element.tag, names);
      }
    }
  }

  return element;
}
