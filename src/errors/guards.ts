/**
 * Type guards for errors raised by this package
 * @module netconf-xml/errors/guards
 */

import { NetconfError } from './error.js';

export function isNetconfError(error: unknown): error is NetconfError {
  return error instanceof NetconfError;
}
