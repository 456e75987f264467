/**
 * NETCONF capabilities
 * @module netconf-xml/capabilities
 */

export { Capabilities, abbreviate, CAPABILITY_URN_PREFIX } from './capabilities.js';
