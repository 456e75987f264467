/**
 * Tests for the Rpc envelope and RpcReply parsing
 */

import { describe, it, expect, vi } from 'vitest';
import { Rpc, RpcReply, parseRpcError } from '../rpc.js';
import { Get } from '../retrieve.js';
import { MockSession, rpcReplyFor } from '../../testing/index.js';
import { NoopLogger } from '../../observability/index.js';
import { qualify } from '../../xml/qualify.js';
import { newElement } from '../../xml/element.js';
import { parseElement } from '../../xml/parse.js';
import {
  OperationError,
  RpcOperationError,
  TimeoutError,
  XmlError,
} from '../../errors/index.js';
import type { XmlElement } from '../../types/index.js';

const BASE = 'urn:ietf:params:xml:ns:netconf:base:1.0';
const logger = new NoopLogger();

const ERROR_BODY =
  '<rpc-error>' +
  '<error-type>protocol</error-type>' +
  '<error-tag>operation-failed</error-tag>' +
  '<error-severity>error</error-severity>' +
  '<error-message xml:lang="en"> lock held by another session </error-message>' +
  '</rpc-error>';

const WARNING_BODY =
  '<rpc-error>' +
  '<error-type>application</error-type>' +
  '<error-tag>partial-operation</error-tag>' +
  '<error-severity>warning</error-severity>' +
  '</rpc-error><data/>';

class Ping extends Rpc {
  protected readonly replyClass = RpcReply;

  request(): Promise<RpcReply> {
    return this.submit(newElement('{urn:example:ping}ping'));
  }
}

async function catchAsync(fn: () => Promise<unknown>): Promise<unknown> {
  try {
    await fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('Rpc', () => {
  it('should wrap the operation in an rpc envelope with a message-id', async () => {
    const session = new MockSession();
    await new Ping(session, { logger }).request();

    const sent = session.sent[0] ?? '';
    expect(sent.startsWith('<?xml version="1.0" encoding="UTF-8"?><nc:rpc ')).toBe(true);

    const envelope = parseElement(sent);
    expect(envelope.tag).toBe(qualify('rpc'));
    expect(envelope.attributes['message-id']).toMatch(/^[0-9a-f-]{36}$/);
    expect(envelope.children).toEqual([
      { tag: '{urn:example:ping}ping', attributes: {}, children: [] },
    ]);
  });

  it('should use a new message-id per request', async () => {
    const session = new MockSession();
    const ping = new Ping(session, { logger });
    await ping.request();
    await ping.request();

    const ids = session.sent.map((message) => parseElement(message).attributes['message-id']);
    expect(new Set(ids).size).toBe(2);
  });

  it('should name the configured encoding in the declaration', async () => {
    const session = new MockSession();
    await new Ping(session, { logger, encoding: 'US-ASCII' }).request();

    expect(session.sent[0]?.startsWith('<?xml version="1.0" encoding="US-ASCII"?>')).toBe(true);
  });

  it('should return an ok reply', async () => {
    const reply = await new Ping(new MockSession(), { logger }).request();

    expect(reply.ok).toBe(true);
    expect(reply.errors).toEqual([]);
    expect(reply.error).toBeUndefined();
  });

  it('should reject a reply whose root is not rpc-reply', async () => {
    const session = new MockSession(() => `<hello xmlns="${BASE}"/>`);
    const error = await catchAsync(() => new Ping(session, { logger }).request());

    expect(error).toBeInstanceOf(OperationError);
    expect(error instanceof OperationError && error.code).toBe('UNEXPECTED_REPLY');
  });

  it('should reject a reply to another request', async () => {
    const session = new MockSession(
      () => `<rpc-reply xmlns="${BASE}" message-id="someone-else"><ok/></rpc-reply>`
    );

    await expect(new Ping(session, { logger }).request()).rejects.toThrow(
      'message-id does not match the request'
    );
  });

  it('should reject a reply without a well-formed root', async () => {
    const session = new MockSession(() => 'not xml');

    await expect(new Ping(session, { logger }).request()).rejects.toBeInstanceOf(XmlError);
  });

  it('should time out when the session does not answer', async () => {
    const session = new MockSession(() => new Promise<string>(() => undefined));
    const error = await catchAsync(() => new Ping(session, { logger, timeoutMs: 20 }).request());

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error instanceof TimeoutError && error.message).toBe('No reply received within 20ms');
  });

  it('should propagate session failures', async () => {
    const session = new MockSession(() => Promise.reject(new Error('connection closed')));

    await expect(new Ping(session, { logger }).request()).rejects.toThrow('connection closed');
  });

  it('should log session failures at error level', async () => {
    const recording = new NoopLogger();
    const error = vi.spyOn(recording, 'error');
    const session = new MockSession(() => Promise.reject(new Error('connection closed')));

    await catchAsync(() => new Ping(session, { logger: recording }).request());

    expect(error).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith(
      'NETCONF rpc failed',
      expect.objectContaining({ operation: 'ping', error: 'connection closed' })
    );
  });

  describe('raise modes', () => {
    const errorSession = (body: string): MockSession =>
      new MockSession((request) => rpcReplyFor(request, body));

    it('should throw every error in all mode', async () => {
      const error = await catchAsync(() =>
        new Ping(errorSession(ERROR_BODY), { logger, raiseMode: 'all' }).request()
      );

      expect(error).toBeInstanceOf(RpcOperationError);
      if (!(error instanceof RpcOperationError)) {
        return;
      }
      expect(error.message).toBe('lock held by another session');
      expect(error.code).toBe('operation-failed');
      expect(error.errors).toHaveLength(1);
    });

    it('should throw warnings in all mode', async () => {
      await expect(
        new Ping(errorSession(WARNING_BODY), { logger, raiseMode: 'all' }).request()
      ).rejects.toBeInstanceOf(RpcOperationError);
    });

    it('should let warnings through in errors mode', async () => {
      const reply = await new Ping(errorSession(WARNING_BODY), {
        logger,
        raiseMode: 'errors',
      }).request();

      expect(reply.isParsed).toBe(true);
      expect(reply.error?.severity).toBe('warning');
    });

    it('should throw errors in errors mode', async () => {
      await expect(
        new Ping(errorSession(ERROR_BODY), { logger, raiseMode: 'errors' }).request()
      ).rejects.toBeInstanceOf(RpcOperationError);
    });

    it('should return the reply unparsed in none mode', async () => {
      const reply = await new Get(errorSession(ERROR_BODY), { logger, raiseMode: 'none' }).request();

      expect(reply.isParsed).toBe(false);
      expect(reply.errors[0]?.tag).toBe('operation-failed');
      expect(reply.data).toBeUndefined();
    });
  });

  it('should log reply errors at warn level', async () => {
    const warnings: string[] = [];
    const recording = new NoopLogger();
    vi.spyOn(recording, 'warn').mockImplementation((message: string) => {
      warnings.push(message);
    });
    const session = new MockSession((request) => rpcReplyFor(request, WARNING_BODY));

    await new Ping(session, { logger: recording, raiseMode: 'errors' }).request();

    expect(warnings).toEqual(['NETCONF reply carried rpc-error elements']);
  });
});

describe('RpcReply', () => {
  it('should record every rpc-error', () => {
    const reply = new RpcReply(
      `<rpc-reply xmlns="${BASE}" message-id="1">${ERROR_BODY}${WARNING_BODY}</rpc-reply>`
    );

    expect(reply.errors.map((error) => error.tag)).toEqual([
      'operation-failed',
      'partial-operation',
    ]);
    expect(reply.ok).toBe(false);
  });

  it('should ignore rpc-error elements next to ok', () => {
    const reply = new RpcReply(
      `<rpc-reply xmlns="${BASE}" message-id="1"><ok/>${ERROR_BODY}</rpc-reply>`
    );

    expect(reply.ok).toBe(true);
    expect(reply.errors).toEqual([]);
  });

  it('should require a message-id on the reply root', () => {
    const reply = new RpcReply(`<rpc-reply xmlns="${BASE}"><ok/></rpc-reply>`);

    expect(() => reply.parse()).toThrow(XmlError);
    expect(reply.isParsed).toBe(false);
  });

  it('should reject a root other than rpc-reply', () => {
    expect(() => new RpcReply('<rpc-reply message-id="1"/>').parse()).toThrow(
      'does not meet requirement'
    );
  });

  it('should expose the reply root', () => {
    const reply = new RpcReply(`<rpc-reply xmlns="${BASE}" message-id="9"><ok/></rpc-reply>`);

    expect(reply.root.attributes).toEqual({ 'message-id': '9' });
  });
});

describe('parseRpcError', () => {
  it('should read every rpc-error field', () => {
    const info: XmlElement = {
      tag: qualify('error-info'),
      attributes: {},
      children: [{ tag: qualify('bad-element'), attributes: {}, children: [], text: 'mtu' }],
    };
    const element = parseElement(
      `<rpc-error xmlns="${BASE}">` +
        '<error-type>application</error-type>' +
        '<error-tag>invalid-value</error-tag>' +
        '<error-severity>error</error-severity>' +
        '<error-app-tag>too-big</error-app-tag>' +
        '<error-path>/interfaces/interface[name="eth0"]/mtu</error-path>' +
        '<error-message>MTU out of range</error-message>' +
        '<error-info><bad-element>mtu</bad-element></error-info>' +
        '</rpc-error>'
    );

    expect(parseRpcError(element)).toEqual({
      type: 'application',
      tag: 'invalid-value',
      severity: 'error',
      appTag: 'too-big',
      path: '/interfaces/interface[name="eth0"]/mtu',
      message: 'MTU out of range',
      info,
    });
  });

  it('should leave unknown severities out', () => {
    const element = parseElement(
      `<rpc-error xmlns="${BASE}"><error-severity>fatal</error-severity></rpc-error>`
    );

    expect(parseRpcError(element).severity).toBeUndefined();
  });
});
