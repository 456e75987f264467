/**
 * In-process session for tests
 * @module netconf-xml/testing/mock-session
 */

import type { XmlElement } from '../types/index.js';
import type { NetconfSession } from '../session/index.js';
import { Capabilities } from '../capabilities/index.js';
import { BASE_NS_1_0 } from '../xml/namespaces.js';
import { parseElement } from '../xml/parse.js';

/**
 * Produces the raw reply for a request. `request` is the parsed `<rpc>`.
 */
export type Responder = (request: XmlElement, raw: string) => string | Promise<string>;

/**
 * Capabilities a MockSession advertises unless told otherwise
 */
export const DEFAULT_MOCK_CAPABILITIES: readonly string[] = [
  'urn:ietf:params:netconf:base:1.0',
  'urn:ietf:params:netconf:base:1.1',
];

/**
 * Builds an `<rpc-reply>` answering `request`, echoing its message-id.
 * `body` is placed inside the reply in the base namespace.
 *
 * @example
 * ```typescript
 * const session = new MockSession((request) => rpcReplyFor(request, '<data><x/></data>'));
 * ```
 */
export function rpcReplyFor(request: XmlElement, body: string = '<ok/>'): string {
  const messageId = request.attributes['message-id'] ?? '';
  return `<rpc-reply xmlns="${BASE_NS_1_0}" message-id="${messageId}">${body}</rpc-reply>`;
}

/**
 * NetconfSession answering from a responder function and keeping every sent
 * message
 */
export class MockSession implements NetconfSession {
  readonly serverCapabilities: Capabilities;
  readonly sent: string[] = [];

  constructor(
    private readonly responder: Responder = (request) => rpcReplyFor(request),
    capabilities: Iterable<string> = DEFAULT_MOCK_CAPABILITIES
  ) {
    this.serverCapabilities = new Capabilities(capabilities);
  }

  async send(message: string): Promise<string> {
    this.sent.push(message);
    return this.responder(parseElement(message), message);
  }

  /**
   * Last sent message, parsed
   */
  lastRequest(): XmlElement | undefined {
    const last = this.sent[this.sent.length - 1];
    return last === undefined ? undefined : parseElement(last);
  }
}
