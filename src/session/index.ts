/**
 * Session seam
 * @module netconf-xml/session
 */

export type { NetconfSession } from './types.js';
