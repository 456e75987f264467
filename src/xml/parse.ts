/**
 * Namespace-aware XML parsing
 * @module netconf-xml/xml/parse
 */

import sax from 'sax';
import type { QualifiedTag, SAXParser, Tag } from 'sax';
import type { RootDescriptor, XmlElement, XmlInput } from '../types/index.js';
import { XmlError } from '../errors/index.js';
import { qualify } from './qualify.js';

/**
 * Characters handed to the parser at a time while looking for the root
 */
const ROOT_CHUNK_SIZE = 512;

interface OpenElement {
  readonly element: XmlElement;
  readonly text: string[];
}

function createParser(): SAXParser {
  return sax.parser(true, { xmlns: true, position: true });
}

function isQualified(node: Tag | QualifiedTag): node is QualifiedTag {
  return 'uri' in node;
}

/**
 * First line of a parser error message, without the position trailer
 */
function reasonOf(error: Error): string {
  return error.message.split('\n')[0] ?? error.message;
}

function tagOf(node: Tag | QualifiedTag): string {
  if (!isQualified(node)) {
    return node.name;
  }
  return node.uri ? qualify(node.local, node.uri) : node.local;
}

/**
 * Attributes of an open tag in `{namespace}local` form, namespace
 * declarations left out
 */
function attributesOf(node: Tag | QualifiedTag): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isQualified(node)) {
    return { ...node.attributes };
  }
  for (const attribute of Object.values(node.attributes)) {
    if (attribute.name === 'xmlns' || attribute.prefix === 'xmlns') {
      continue;
    }
    const name = attribute.uri ? qualify(attribute.local, attribute.uri) : attribute.local || attribute.name;
    attributes[name] = attribute.value;
  }
  return attributes;
}

function stripByteOrderMark(xml: string): string {
  return xml.charCodeAt(0) === 0xfeff ? xml.slice(1) : xml;
}

/**
 * Parses an XML document into an element tree.
 *
 * Text directly inside an element is joined into its `text`. Whitespace-only
 * text is kept on leaf elements and dropped where the element has children.
 *
 * @throws {XmlError} If the document is not well-formed
 */
export function parseElement(xml: string): XmlElement {
  const parser = createParser();
  const stack: OpenElement[] = [];
  const parsed: { root?: XmlElement } = {};

  const current = (): OpenElement | undefined => stack[stack.length - 1];
  const appendText = (text: string): void => {
    current()?.text.push(text);
  };

  parser.onerror = (error: Error): void => {
    throw XmlError.malformed(reasonOf(error), current()?.element.tag ?? parsed.root?.tag, error);
  };

  parser.onopentag = (node: Tag | QualifiedTag): void => {
    const element: XmlElement = {
      tag: tagOf(node),
      attributes: attributesOf(node),
      children: [],
    };
    const parent = current();
    if (parent) {
      parent.element.children.push(element);
    } else if (parsed.root !== undefined) {
      throw XmlError.malformed('more than one root element', element.tag);
    } else {
      parsed.root = element;
    }
    stack.push({ element, text: [] });
  };

  parser.ontext = appendText;
  parser.oncdata = appendText;

  parser.onclosetag = (): void => {
    const open = stack.pop();
    if (!open) {
      return;
    }
    const text = open.text.join('');
    // Whitespace between child elements is layout, not content
    if (text.trim() !== '' || (text !== '' && open.element.children.length === 0)) {
      open.element.text = text;
    }
  };

  parser.write(stripByteOrderMark(xml)).close();

  if (parsed.root === undefined) {
    throw XmlError.malformed('document has no root element');
  }
  return parsed.root;
}

/**
 * Converts XML to an element. An element is returned as is.
 *
 * @throws {XmlError} If text input is not well-formed
 */
export function toElement(x: XmlInput): XmlElement {
  return typeof x === 'string' ? parseElement(x) : x;
}

/**
 * Reads the tag and attributes of a document's root element.
 *
 * Input is fed to the parser in small chunks and parsing stops at the first
 * element-open event, so nothing after the root open tag is materialized or
 * needs to be well-formed.
 *
 * @throws {XmlError} If the document is malformed before the root open tag
 * completes, or has no root element
 */
export function parseRoot(raw: string): RootDescriptor {
  const parser = createParser();
  const found: { root?: RootDescriptor } = {};

  parser.onopentag = (node: Tag | QualifiedTag): void => {
    if (found.root === undefined) {
      found.root = { tag: tagOf(node), attributes: attributesOf(node) };
    }
  };

  // Errors after the root open tag belong to whoever parses the body
  parser.onerror = (error: Error): void => {
    if (found.root === undefined) {
      throw XmlError.malformed(reasonOf(error), undefined, error);
    }
  };

  const xml = stripByteOrderMark(raw);
  for (let offset = 0; found.root === undefined && offset < xml.length; offset += ROOT_CHUNK_SIZE) {
    parser.write(xml.slice(offset, offset + ROOT_CHUNK_SIZE));
  }

  if (found.root === undefined) {
    throw XmlError.malformed('document has no root element');
  }
  return found.root;
}
