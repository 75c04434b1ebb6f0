import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Bridge } from '../../src/connection/bridge.js';
import type { Connection } from '../../src/connection/connection.js';
import { invoke, invokeNew, invokeStatic } from '../../src/invocation/invoke.js';
import { Typed, type Value } from '../../src/codec/codec.js';
import { RemoteReference } from '../../src/reference/remote-reference.js';
import {
  CodecError,
  InvalidReferenceError,
  RemoteInvocationError,
  TypeMismatchError,
} from '../../src/types.js';
import { createTestRuntime, type TestRuntime } from '../fixtures/runtime.js';
import { ScriptedTransport, referenceResult } from '../fixtures/scripted-transport.js';

describe('invocation', () => {
  let runtime: TestRuntime;
  let connection: Connection;

  beforeEach(async () => {
    runtime = createTestRuntime();
    connection = await Bridge.open(runtime.transport());
  });

  afterEach(async () => {
    await connection.close();
  });

  describe('invokeNew', () => {
    it('constructs a remote object and returns a reference to it', async () => {
      const big = await invokeNew(connection, 'java.math.BigInteger', '1000000000');

      expect(big).toBeInstanceOf(RemoteReference);
      expect(big.className).toBe('java.math.BigInteger');
      expect(big.classification).toBe('object');
      expect(big.owningConnection()).toBe(connection);
      expect(big.isValid()).toBe(true);
    });

    it('surfaces a constructor that raised', async () => {
      const failure = invokeNew(connection, 'java.math.BigInteger', 'ten');

      await expect(failure).rejects.toBeInstanceOf(RemoteInvocationError);
      await expect(failure).rejects.toThrow(
        'Remote call java.math.BigInteger.new(1 args) raised java.lang.NumberFormatException: For input string: "ten"',
      );
    });

    it('reports an unknown class as a remote error', async () => {
      await expect(invokeNew(connection, 'no.such.Class')).rejects.toMatchObject({
        remoteClassName: 'ClassNotFoundError',
        remoteMessage: "Class 'no.such.Class' is not registered",
      });
    });

    it('fails with TypeMismatchError when the runtime answers with a value', async () => {
      const scripted = new ScriptedTransport((request) =>
        request.kind === 'invoke' ? { kind: 'primitive', value: { t: 'int', v: 1 } } : { kind: 'void' },
      );
      const odd = await Bridge.open(scripted);

      const failure = invokeNew(odd, 'x.Widget');

      await expect(failure).rejects.toBeInstanceOf(TypeMismatchError);
      await expect(failure).rejects.toThrow("x.Widget.new(0 args): expected 'reference' but got 'primitive'");
      await odd.close();
    });

    it('sends the constructor marker as the method name', async () => {
      const scripted = new ScriptedTransport((request) =>
        request.kind === 'invoke' ? referenceResult('h1', 'x.Widget') : { kind: 'void' },
      );
      const odd = await Bridge.open(scripted);

      await invokeNew(odd, 'x.Widget', 3);

      expect(scripted.received[1]).toEqual({
        kind: 'invoke',
        connectionId: odd.id,
        className: 'x.Widget',
        methodName: '<init>',
        args: [{ t: 'int', v: 3 }],
      });
      await odd.close();
    });
  });

  describe('invoke', () => {
    it('decodes a long result to bigint', async () => {
      const big = await invokeNew(connection, 'java.math.BigInteger', '1000000000');

      expect(await invoke(big, 'longValue')).toBe(1000000000n);
    });

    it('passes references as arguments and returns new references', async () => {
      const two = await invokeNew(connection, 'java.math.BigInteger', '2');
      const three = await invokeNew(connection, 'java.math.BigInteger', '3');

      const sum = await invoke(two, 'add', three);

      expect(sum).toBeInstanceOf(RemoteReference);
      if (!(sum instanceof RemoteReference)) return;
      expect(sum.equals(two)).toBe(false);
      expect(await invoke(sum, 'longValue')).toBe(5n);
    });

    it('returns the same reference for the same remote object', async () => {
      const list = await invokeNew(connection, 'java.util.ArrayList');
      const big = await invokeNew(connection, 'java.math.BigInteger', '7');

      await invoke(list, 'add', big);
      const again = await invoke(list, 'get', 0);

      expect(again).toBe(big);
    });

    it('decodes sequences, with objects inside as references', async () => {
      const list = await invokeNew(connection, 'java.util.ArrayList');
      const big = await invokeNew(connection, 'java.math.BigInteger', '7');
      await invoke(list, 'add', 'x');
      await invoke(list, 'add', 2);
      await invoke(list, 'add', big);

      expect(await invoke(list, 'toArray')).toEqual(['x', 2, big]);
    });

    it('keeps the sign of negative zero through the runtime', async () => {
      const list = await invokeNew(connection, 'java.util.ArrayList');

      await invoke(list, 'add', -0);

      expect(await invoke(list, 'get', 0)).toBe(-0);
    });

    it('returns null for void methods', async () => {
      const list = await invokeNew(connection, 'java.util.ArrayList');
      await invoke(list, 'add', 1);

      expect(await invoke(list, 'clear')).toBeNull();
      expect(await invoke(list, 'size')).toBe(0);
    });

    it('keeps calls in issue order', async () => {
      const list = await invokeNew(connection, 'java.util.ArrayList');

      await Promise.all([invoke(list, 'add', 1), invoke(list, 'add', 2), invoke(list, 'add', 3)]);

      expect(await invoke(list, 'toArray')).toEqual([1, 2, 3]);
    });

    it('reports a missing method as a remote error', async () => {
      const big = await invokeNew(connection, 'java.math.BigInteger', '1');

      await expect(invoke(big, 'frobnicate')).rejects.toThrow(
        `Remote call ${big.toString()}.frobnicate(0 args) raised NoSuchMethodError: java.math.BigInteger has no method 'frobnicate'`,
      );
    });

    it('refuses a reference issued by another connection', async () => {
      const other = await Bridge.open(runtime.transport());
      const list = await invokeNew(connection, 'java.util.ArrayList');
      const foreign = await invokeNew(other, 'java.math.BigInteger', '1');

      const failure = invoke(list, 'add', foreign);

      await expect(failure).rejects.toBeInstanceOf(InvalidReferenceError);
      await expect(failure).rejects.toThrow(
        `Invalid reference ${foreign.toString()}: belongs to connection '${other.id}', not '${connection.id}'`,
      );
      expect(await invoke(list, 'size')).toBe(0);
      await other.close();
    });

    it('rejects arguments with no wire encoding before sending', async () => {
      const list = await invokeNew(connection, 'java.util.ArrayList');
      const plain: Value = JSON.parse('{"a":1}');

      await expect(invoke(list, 'add', plain)).rejects.toBeInstanceOf(CodecError);
      expect(await invoke(list, 'size')).toBe(0);
    });
  });

  describe('invokeStatic', () => {
    it('calls a static method', async () => {
      const hypot = await invokeStatic(connection, 'java.lang.Math', 'hypot', 10, 20);

      expect(hypot).toBeCloseTo(22.360679, 5);
    });

    it('sends typed numbers', async () => {
      expect(await invokeStatic(connection, 'java.lang.Math', 'max', Typed.double(1.5), Typed.double(2))).toBe(2);
    });

    it('decodes a sequence of longs', async () => {
      expect(await invokeStatic(connection, 'java.lang.Integer', 'bounds')).toEqual([-2147483648n, 2147483647n]);
    });

    it('carries the remote exception unchanged', async () => {
      const failure = invokeStatic(connection, 'java.lang.Integer', 'parseInt', 'abc');

      await expect(failure).rejects.toMatchObject({
        name: 'RemoteInvocationError',
        remoteClassName: 'java.lang.NumberFormatException',
        remoteMessage: 'For input string: "abc"',
        call: { kind: 'static', target: 'java.lang.Integer', method: 'parseInt', argCount: 1 },
      });
    });

    it('reports a missing static method', async () => {
      await expect(invokeStatic(connection, 'java.lang.Math', 'cbrt', 8)).rejects.toThrow(
        "raised NoSuchMethodError: Class 'java.lang.Math' has no static method 'cbrt'",
      );
    });
  });
});
