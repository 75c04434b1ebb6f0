import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ObjectHost } from '../../src/runtime/object-host.js';
import { Serializer, generateConnectionId, generateRequestId } from '../../src/codec/serialization.js';
import {
  BRIDGE_DEFAULTS,
  MessageSerializationError,
  type ConnectionId,
  type EncodedReference,
  type InvocationResult,
} from '../../src/types.js';
import { Session, createTestClasses } from '../fixtures/runtime.js';

function referenceOf(result: InvocationResult): EncodedReference {
  if (result.kind !== 'reference') {
    throw new Error(`expected a reference, got ${result.kind}`);
  }
  return result.reference;
}

describe('ObjectHost', () => {
  let host: ObjectHost;
  let connectionId: ConnectionId;

  beforeEach(() => {
    host = new ObjectHost(createTestClasses(), { entryPoint: () => new Session() });
    connectionId = generateConnectionId();
  });

  describe('hello', () => {
    it('announces the entry point as an execution context', async () => {
      const opened = vi.fn();
      host.on('connectionOpened', opened);

      const result = await host.dispatch({ kind: 'hello', connectionId });

      expect(result).toEqual({
        kind: 'reference',
        reference: { t: 'ref', handle: 'h1', className: 'runtime.Session', classification: 'execution-context' },
      });
      expect(opened).toHaveBeenCalledWith(connectionId);
      expect(host.objectCount(connectionId)).toBe(1);
    });

    it('announces nothing without an entry point factory', async () => {
      const bare = new ObjectHost(createTestClasses());

      expect(await bare.dispatch({ kind: 'hello', connectionId })).toEqual({ kind: 'void' });
      expect(bare.hasConnection(connectionId)).toBe(true);
    });
  });

  describe('invoke', () => {
    beforeEach(async () => {
      await host.dispatch({ kind: 'hello', connectionId });
    });

    it('refuses a connection that never said hello', async () => {
      const result = await host.dispatch({
        kind: 'invoke',
        connectionId: generateConnectionId(),
        className: 'java.lang.Math',
        methodName: 'max',
        args: [],
      });

      expect(result).toMatchObject({ kind: 'error', error: { className: 'UnknownConnectionError' } });
    });

    it('constructs objects and calls their methods', async () => {
      const big = referenceOf(
        await host.dispatch({
          kind: 'invoke',
          connectionId,
          className: 'java.math.BigInteger',
          methodName: '<init>',
          args: [{ t: 'string', v: '12' }],
        }),
      );

      const result = await host.dispatch({
        kind: 'invoke',
        connectionId,
        targetHandle: big.handle,
        methodName: 'longValue',
        args: [],
      });

      expect(big.className).toBe('java.math.BigInteger');
      expect(result).toEqual({ kind: 'primitive', value: { t: 'long', v: '12' } });
    });

    it('reports a class that cannot be constructed', async () => {
      const bare = new ObjectHost(createTestClasses());
      await bare.dispatch({ kind: 'hello', connectionId });

      const result = await bare.dispatch({
        kind: 'invoke',
        connectionId,
        className: 'missing.Type',
        methodName: '<init>',
        args: [],
      });

      expect(result).toEqual({
        kind: 'error',
        error: expect.objectContaining({
          className: 'ClassNotFoundError',
          message: "Class 'missing.Type' is not registered",
        }),
      });
    });

    it('keeps handles private to their connection', async () => {
      const other = generateConnectionId();
      await host.dispatch({ kind: 'hello', connectionId: other });
      const list = referenceOf(
        await host.dispatch({
          kind: 'invoke',
          connectionId,
          className: 'java.util.ArrayList',
          methodName: '<init>',
          args: [],
        }),
      );

      const result = await host.dispatch({
        kind: 'invoke',
        connectionId: other,
        targetHandle: list.handle,
        methodName: 'size',
        args: [],
      });

      expect(result).toMatchObject({
        kind: 'error',
        error: { className: 'InvalidHandleError', message: `Handle '${list.handle}' names no live object` },
      });
    });

    it('counts calls and errors', async () => {
      await host.dispatch({ kind: 'invoke', connectionId, className: 'java.lang.Math', methodName: 'max', args: [] });
      await host.dispatch({
        kind: 'invoke',
        connectionId,
        className: 'java.lang.Integer',
        methodName: 'parseInt',
        args: [{ t: 'string', v: 'nope' }],
      });

      expect(host.getStats()).toEqual({ connections: 1, objects: 1, totalCalls: 2, totalErrors: 1 });
    });
  });

  describe('release and goodbye', () => {
    it('drops released objects', async () => {
      const released = vi.fn();
      host.on('released', released);
      const session = referenceOf(await host.dispatch({ kind: 'hello', connectionId }));

      await host.dispatch({ kind: 'release', connectionId, handles: [session.handle, session.handle] });

      expect(host.objectCount(connectionId)).toBe(0);
      expect(released).toHaveBeenCalledTimes(1);
      expect(released).toHaveBeenCalledWith(connectionId, 1);
    });

    it('drops the whole table on goodbye', async () => {
      const closed = vi.fn();
      host.on('connectionClosed', closed);
      await host.dispatch({ kind: 'hello', connectionId });

      expect(await host.dispatch({ kind: 'goodbye', connectionId })).toEqual({ kind: 'void' });
      expect(host.hasConnection(connectionId)).toBe(false);
      expect(closed).toHaveBeenCalledWith(connectionId);
    });
  });

  describe('handle', () => {
    it('answers a serialized request', async () => {
      const requestId = generateRequestId();
      const payload = Serializer.serialize({
        version: BRIDGE_DEFAULTS.PROTOCOL_VERSION,
        requestId,
        request: { kind: 'hello', connectionId },
      });

      const response = Serializer.deserializeResponse(await host.handle(payload));

      expect(response.requestId).toBe(requestId);
      expect(response.result.kind).toBe('reference');
    });

    it('answers a malformed request that carries an id with an error result', async () => {
      const payload = Buffer.from(JSON.stringify({ version: 1, requestId: 'r-1', request: { kind: 'dance' } }));

      const response = Serializer.deserializeResponse(await host.handle(payload));

      expect(response.requestId).toBe('r-1');
      expect(response.result).toMatchObject({ kind: 'error', error: { className: 'MessageSerializationError' } });
    });

    it('throws for a payload with no request id', async () => {
      await expect(host.handle(Buffer.from('{}'))).rejects.toBeInstanceOf(MessageSerializationError);
    });
  });
});
