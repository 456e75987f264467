/**
 * Specific error categories for the NETCONF XML layer
 * @module netconf-xml/errors/categories
 */

import type { RpcError } from '../types/index.js';
import { NetconfError, type NetconfErrorParams } from './error.js';

/**
 * Structural XML errors: a document that does not parse, or a root element
 * that lacks a required tag or attribute.
 */
export class XmlError extends NetconfError {
  constructor(params: Omit<NetconfErrorParams, 'type'>) {
    super({ ...params, type: 'xml_error' });
    this.name = 'XmlError';
    Object.setPrototypeOf(this, XmlError.prototype);
  }

  /**
   * Tag of the element the error refers to, when known
   */
  get tag(): string | undefined {
    const tag = this.details?.['tag'];
    return typeof tag === 'string' ? tag : undefined;
  }

  /**
   * Document could not be parsed
   */
  static malformed(reason: string, tag?: string, cause?: unknown): XmlError {
    return new XmlError({
      message: `Malformed XML: ${reason}`,
      code: 'MALFORMED_XML',
      details: { tag },
      cause,
    });
  }

  /**
   * Root element tag is not one of the acceptable tags
   */
  static unexpectedTag(tag: string): XmlError {
    return new XmlError({
      message: `Element [${tag}] does not meet requirement`,
      code: 'UNEXPECTED_TAG',
      details: { tag },
    });
  }

  /**
   * Root element lacks a required attribute
   */
  static missingAttributes(tag: string, alternatives: readonly string[]): XmlError {
    return new XmlError({
      message: `Element [${tag}] does not have required attributes`,
      code: 'MISSING_ATTRIBUTES',
      details: { tag, alternatives: [...alternatives] },
    });
  }
}

/**
 * Invalid operation arguments, or a reply envelope that does not belong to
 * the request it answers.
 */
export class OperationError extends NetconfError {
  constructor(params: Omit<NetconfErrorParams, 'type'>) {
    super({ ...params, type: 'operation_error' });
    this.name = 'OperationError';
    Object.setPrototypeOf(this, OperationError.prototype);
  }

  static invalidFilterType(filterType: string): OperationError {
    return new OperationError({
      message: `Invalid filter type: ${filterType}`,
      code: 'INVALID_FILTER_TYPE',
      details: { filterType },
    });
  }

  static unexpectedReply(reason: string, details?: Record<string, unknown>): OperationError {
    return new OperationError({
      message: `Unexpected reply: ${reason}`,
      code: 'UNEXPECTED_REPLY',
      details,
    });
  }
}

/**
 * Operation needs a capability the server did not advertise
 */
export class MissingCapabilityError extends NetconfError {
  constructor(capability: string) {
    super({
      type: 'capability_error',
      message: `Server does not support [${capability}]`,
      code: 'MISSING_CAPABILITY',
      details: { capability },
    });
    this.name = 'MissingCapabilityError';
    Object.setPrototypeOf(this, MissingCapabilityError.prototype);
  }

  get capability(): string {
    return String(this.details?.['capability']);
  }
}

/**
 * Reply carried one or more rpc-error elements and the raise mode asked for
 * them to be thrown.
 */
export class RpcOperationError extends NetconfError {
  readonly errors: readonly RpcError[];

  constructor(errors: readonly RpcError[]) {
    const first = errors[0];
    const summary = first
      ? first.message ?? first.tag ?? 'unknown error'
      : 'unknown error';
    super({
      type: 'rpc_error',
      message:
        errors.length > 1
          ? `${summary} (and ${errors.length - 1} more)`
          : summary,
      code: first?.tag,
      details: { count: errors.length },
    });
    this.name = 'RpcOperationError';
    this.errors = errors;
    Object.setPrototypeOf(this, RpcOperationError.prototype);
  }
}

/**
 * Session did not answer within the configured timeout
 */
export class TimeoutError extends NetconfError {
  constructor(timeoutMs: number, messageId?: string) {
    super({
      type: 'timeout_error',
      message: `No reply received within ${timeoutMs}ms`,
      code: 'REPLY_TIMEOUT',
      details: { timeoutMs, messageId },
    });
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends NetconfError {
  constructor(params: Omit<NetconfErrorParams, 'type'>) {
    super({ ...params, type: 'config_error' });
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
