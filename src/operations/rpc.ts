/**
 * Base classes for NETCONF operations and their replies
 * @module netconf-xml/operations/rpc
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  CapabilityAssertion,
  RaiseMode,
  RpcError,
  XmlElement,
} from '../types/index.js';
import type { NetconfSession } from '../session/index.js';
import { normalizeConfig, type NetconfConfig, type NormalizedNetconfConfig } from '../config/index.js';
import {
  MissingCapabilityError,
  OperationError,
  RpcOperationError,
  TimeoutError,
} from '../errors/index.js';
import { ConsoleLogger, logExchange, logFailure, type Logger } from '../observability/index.js';
import { defaultRegistry, type NamespaceRegistry } from '../xml/namespaces.js';
import { childText, findChild, findChildren, newElement } from '../xml/element.js';
import { parseRoot } from '../xml/parse.js';
import { localName, qualify } from '../xml/qualify.js';
import { toXml } from '../xml/serialize.js';
import { validatedElement } from '../xml/validate.js';

/**
 * Serialization settings a reply uses for its XML views
 */
export interface ReplyOptions {
  readonly encoding?: string;
  readonly registry?: NamespaceRegistry;
}

type ReplyState =
  | { readonly kind: 'unparsed' }
  | {
      readonly kind: 'parsed';
      readonly root: XmlElement;
      readonly ok: boolean;
      readonly errors: readonly RpcError[];
    };

type ParsedReplyState = Extract<ReplyState, { kind: 'parsed' }>;

function parseSeverity(value: string | undefined): RpcError['severity'] {
  return value === 'error' || value === 'warning' ? value : undefined;
}

/**
 * Reads the fields of one `<rpc-error>` element
 */
export function parseRpcError(element: XmlElement): RpcError {
  return {
    type: childText(element, qualify('error-type')),
    tag: childText(element, qualify('error-tag')),
    severity: parseSeverity(childText(element, qualify('error-severity'))),
    appTag: childText(element, qualify('error-app-tag')),
    path: childText(element, qualify('error-path')),
    message: childText(element, qualify('error-message')),
    info: findChild(element, qualify('error-info')),
  };
}

/**
 * Reply to an `<rpc>`, parsed on first access.
 *
 * Subclasses add operation-specific fields by overriding
 * {@link RpcReply.parsingHook}, which runs once when parsing succeeds.
 */
export class RpcReply {
  private state: ReplyState = { kind: 'unparsed' };

  constructor(
    readonly raw: string,
    protected readonly options: ReplyOptions = {}
  ) {}

  get isParsed(): boolean {
    return this.state.kind === 'parsed';
  }

  /**
   * Parses the reply. Calling it again once parsed does nothing.
   *
   * @throws {XmlError} If the reply is not a well-formed `<rpc-reply>`
   */
  parse(): this {
    this.parsed();
    return this;
  }

  /**
   * `<rpc-reply>` element
   */
  get root(): XmlElement {
    return this.parsed().root;
  }

  /**
   * Whether the reply was a plain `<ok/>`
   */
  get ok(): boolean {
    return this.parsed().ok;
  }

  get errors(): readonly RpcError[] {
    return this.parsed().errors;
  }

  /**
   * First recorded error, if any
   */
  get error(): RpcError | undefined {
    return this.parsed().errors[0];
  }

  /**
   * Hook for operation-specific parsing; `errors` are the rpc-errors found
   * in `root`.
   */
  protected parsingHook(_root: XmlElement, _errors: readonly RpcError[]): void {
    // Nothing beyond the base fields
  }

  private parsed(): ParsedReplyState {
    if (this.state.kind === 'parsed') {
      return this.state;
    }

    const root = validatedElement(this.raw, qualify('rpc-reply'), [['message-id']]);
    const ok = findChild(root, qualify('ok')) !== undefined;
    const errors = ok ? [] : findChildren(root, qualify('rpc-error')).map(parseRpcError);

    this.parsingHook(root, errors);
    const parsed: ParsedReplyState = { kind: 'parsed', root, ok, errors };
    this.state = parsed;
    return parsed;
  }
}

/**
 * Constructor of the reply class an operation produces
 */
export type ReplyClass<R extends RpcReply> = new (raw: string, options?: ReplyOptions) => R;

/**
 * Options accepted by every operation
 */
export interface RpcOptions extends NetconfConfig {
  readonly logger?: Logger;
  readonly registry?: NamespaceRegistry;
}

/**
 * Base class for NETCONF operations.
 *
 * Subclasses build the operation element and pass it to
 * {@link Rpc.submit}, which wraps it in `<rpc message-id="...">`, sends it
 * through the session and checks the reply envelope.
 */
export abstract class Rpc<R extends RpcReply = RpcReply> {
  protected abstract readonly replyClass: ReplyClass<R>;

  protected readonly config: NormalizedNetconfConfig;
  protected readonly logger: Logger;
  protected readonly registry: NamespaceRegistry;

  constructor(
    protected readonly session: NetconfSession,
    options: RpcOptions = {}
  ) {
    this.config = normalizeConfig(options);
    this.logger = options.logger ?? new ConsoleLogger(this.config.logLevel);
    this.registry = options.registry ?? defaultRegistry;
  }

  get raiseMode(): RaiseMode {
    return this.config.raiseMode;
  }

  /**
   * Throws unless the server advertised `capability` (full URI or
   * `:abbreviation`)
   *
   * @throws {MissingCapabilityError}
   */
  readonly assertCapability: CapabilityAssertion = (capability: string): void => {
    if (!this.session.serverCapabilities.has(capability)) {
      throw new MissingCapabilityError(capability);
    }
  };

  /**
   * Sends an operation element and returns its reply.
   *
   * @throws {TimeoutError} If the session does not answer in time
   * @throws {XmlError} If the reply has no well-formed root open tag
   * @throws {OperationError} If the reply is not the `<rpc-reply>` to this
   * request
   * @throws {RpcOperationError} If the raise mode turns recorded rpc-errors
   * into an exception
   */
  protected async submit(operation: XmlElement): Promise<R> {
    const messageId = uuidv4();
    const name = localName(operation.tag);
    const envelope = newElement(qualify('rpc'), { 'message-id': messageId });
    envelope.children.push(operation);

    this.logger.debug('Sending NETCONF rpc', { operation: name, messageId });
    const started = Date.now();
    let raw: string;
    try {
      raw = await this.sendWithTimeout(toXml(envelope, this.config.encoding, this.registry), messageId);
    } catch (error) {
      logFailure(this.logger, name, messageId, error);
      throw error;
    }

    const root = parseRoot(raw);
    if (root.tag !== qualify('rpc-reply')) {
      throw OperationError.unexpectedReply(`expected rpc-reply, got [${root.tag}]`, {
        messageId,
        tag: root.tag,
      });
    }
    if (root.attributes['message-id'] !== messageId) {
      throw OperationError.unexpectedReply('message-id does not match the request', {
        messageId,
        replyMessageId: root.attributes['message-id'],
      });
    }

    const reply = new this.replyClass(raw, {
      encoding: this.config.encoding,
      registry: this.registry,
    });

    if (this.config.raiseMode === 'none') {
      logExchange(this.logger, name, messageId, Date.now() - started);
      return reply;
    }

    reply.parse();
    logExchange(this.logger, name, messageId, Date.now() - started, reply.errors.length);
    const raised =
      this.config.raiseMode === 'all'
        ? reply.errors
        : reply.errors.filter((error) => error.severity !== 'warning');
    if (raised.length > 0) {
      throw new RpcOperationError(raised);
    }
    return reply;
  }

  private async sendWithTimeout(message: string, messageId: string): Promise<string> {
    const timeoutMs = this.config.timeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new TimeoutError(timeoutMs, messageId)), timeoutMs);
    });

    try {
      return await Promise.race([this.session.send(message), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
