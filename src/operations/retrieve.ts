/**
 * Retrieval operations: `<get>` and `<get-config>`
 * @module netconf-xml/operations/retrieve
 */

import type { FilterSpec, RpcError, XmlElement } from '../types/index.js';
import { findChild, newElement } from '../xml/element.js';
import { qualify } from '../xml/qualify.js';
import { toXml } from '../xml/serialize.js';
import { Rpc, RpcReply } from './rpc.js';
import { buildFilter, datastoreOrUrl } from './util.js';

/**
 * Reply to `<get>` and `<get-config>`, exposing the `<data>` element
 */
export class GetReply extends RpcReply {
  private dataValue: XmlElement | undefined;

  protected parsingHook(root: XmlElement, errors: readonly RpcError[]): void {
    this.dataValue = errors.length === 0 ? findChild(root, qualify('data')) : undefined;
  }

  /**
   * `<data>` element, or undefined when the reply carried errors or no data
   */
  get dataElement(): XmlElement | undefined {
    this.parse();
    return this.dataValue;
  }

  /**
   * `<data>` element as an XML document
   */
  get dataXml(): string | undefined {
    const data = this.dataElement;
    return data === undefined ? undefined : toXml(data, this.options.encoding, this.options.registry);
  }

  /**
   * Same as {@link GetReply.dataElement}
   */
  get data(): XmlElement | undefined {
    return this.dataElement;
  }
}

/**
 * The `<get>` operation: running configuration and state data
 *
 * @example
 * ```typescript
 * const reply = await new Get(session).request({ type: 'xpath', select: '/interfaces' });
 * console.log(reply.dataXml);
 * ```
 */
export class Get extends Rpc<GetReply> {
  protected readonly replyClass = GetReply;

  /**
   * Builds the `<get>` element without sending it
   */
  buildRequest(filter?: FilterSpec): XmlElement {
    const node = newElement(qualify('get'));
    if (filter !== undefined) {
      node.children.push(buildFilter(filter, this.assertCapability));
    }
    return node;
  }

  request(filter?: FilterSpec): Promise<GetReply> {
    return this.submit(this.buildRequest(filter));
  }
}

/**
 * The `<get-config>` operation: configuration data of one datastore
 *
 * @example
 * ```typescript
 * const reply = await new GetConfig(session).request('running');
 * ```
 */
export class GetConfig extends Rpc<GetReply> {
  protected readonly replyClass = GetReply;

  /**
   * Builds the `<get-config>` element without sending it
   */
  buildRequest(source: string, filter?: FilterSpec): XmlElement {
    const node = newElement(qualify('get-config'));
    node.children.push(datastoreOrUrl('source', source, this.assertCapability));
    if (filter !== undefined) {
      node.children.push(buildFilter(filter, this.assertCapability));
    }
    return node;
  }

  request(source: string, filter?: FilterSpec): Promise<GetReply> {
    return this.submit(this.buildRequest(source, filter));
  }
}
