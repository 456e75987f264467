/**
 * Session seam between the XML layer and a transport
 * @module netconf-xml/session/types
 */

import type { Capabilities } from '../capabilities/index.js';

/**
 * One established NETCONF session.
 *
 * Implementations own framing, message-id correlation and the connection;
 * the XML layer only hands over complete documents.
 */
export interface NetconfSession {
  /**
   * Capabilities the server advertised in its hello
   */
  readonly serverCapabilities: Capabilities;

  /**
   * Sends one `<rpc>` document and resolves with the raw reply document
   */
  send(message: string): Promise<string>;
}
