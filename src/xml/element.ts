/**
 * Construction and lookup helpers for in-memory elements
 * @module netconf-xml/xml/element
 */

import type { XmlElement } from '../types/index.js';

/**
 * Creates a detached element
 *
 * @example
 * ```typescript
 * const filter = newElement(qualify('filter'), { type: 'xpath', select: '/interfaces' });
 * ```
 */
export function newElement(
  tag: string,
  attributes: Record<string, string> = {},
  text?: string
): XmlElement {
  const element: XmlElement = { tag, attributes: { ...attributes }, children: [] };
  if (text !== undefined) {
    element.text = text;
  }
  return element;
}

/**
 * Creates an element and appends it to `parent`
 *
 * @returns The new child
 */
export function subElement(
  parent: XmlElement,
  tag: string,
  attributes: Record<string, string> = {},
  text?: string
): XmlElement {
  const child = newElement(tag, attributes, text);
  parent.children.push(child);
  return child;
}

/**
 * First direct child with the given qualified tag
 */
export function findChild(element: XmlElement, tag: string): XmlElement | undefined {
  return element.children.find((child) => child.tag === tag);
}

/**
 * All direct children with the given qualified tag, in document order
 */
export function findChildren(element: XmlElement, tag: string): XmlElement[] {
  return element.children.filter((child) => child.tag === tag);
}

/**
 * Depth-first walk over `element` and its descendants, optionally limited to
 * one tag
 */
export function* iterElements(element: XmlElement, tag?: string): Generator<XmlElement> {
  if (tag === undefined || element.tag === tag) {
    yield element;
  }
  for (const child of element.children) {
    yield* iterElements(child, tag);
  }
}

/**
 * Text of the first direct child with the given tag, trimmed
 */
export function childText(element: XmlElement, tag: string): string | undefined {
  return findChild(element, tag)?.text?.trim();
}
