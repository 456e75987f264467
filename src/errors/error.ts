/**
 * Base error class for the NETCONF XML layer
 * @module netconf-xml/errors/error
 */

/**
 * Parameters for creating a NetconfError
 */
export interface NetconfErrorParams {
  /**
   * Error type/category
   */
  readonly type: string;

  /**
   * Human-readable error message
   */
  readonly message: string;

  /**
   * Machine-readable error code
   */
  readonly code?: string;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  /**
   * Underlying cause, if any
   */
  readonly cause?: unknown;
}

/**
 * Base error class for all NETCONF client errors
 *
 * Provides structured error information including:
 * - Error type/category for programmatic handling
 * - An error code
 * - Structured details for additional context
 */
export class NetconfError extends Error {
  /**
   * Error type/category
   */
  readonly type: string;

  /**
   * Machine-readable error code
   */
  readonly code?: string;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  /**
   * Creates a new NetconfError
   * @param params - Error parameters
   */
  constructor(params: NetconfErrorParams) {
    super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);

    // Set the prototype explicitly to maintain instanceof checks
    Object.setPrototypeOf(this, NetconfError.prototype);

    this.name = 'NetconfError';
    this.type = params.type;
    this.code = params.code;
    this.details = params.details;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, NetconfError);
    }
  }

  /**
   * Converts the error to a JSON representation
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      code: this.code,
      details: this.details,
      stack: this.stack,
    };
  }

  /**
   * Returns a string representation of the error
   */
  toString(): string {
    const parts = [this.name, this.type];

    if (this.code) {
      parts.push(`[${this.code}]`);
    }

    parts.push(`- ${this.message}`);

    return parts.join(' ');
  }
}
