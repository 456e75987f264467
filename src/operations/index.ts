/**
 * NETCONF operations
 * @module netconf-xml/operations
 */

export {
  Rpc,
  RpcReply,
  parseRpcError,
  type ReplyClass,
  type ReplyOptions,
  type RpcOptions,
} from './rpc.js';

export { Get, GetConfig, GetReply } from './retrieve.js';

export { buildFilter, datastoreOrUrl } from './util.js';
