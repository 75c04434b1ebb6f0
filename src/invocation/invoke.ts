/**
 * Invocation engine: constructor, instance and static calls.
 *
 * The three entry points build the same wire request and differ only in
 * which of `targetHandle` and `className` they set. Overload resolution is
 * left to the runtime; arguments are encoded as given.
 *
 * @module invocation/invoke
 */

import {
  CONSTRUCTOR_METHOD,
  RemoteInvocationError,
  TypeMismatchError,
  describeCall,
  type CallDescription,
  type InvocationResult,
} from '../types.js';
import { Codec, type Value } from '../codec/codec.js';
import type { Connection } from '../connection/connection.js';
import { RemoteReference } from '../reference/remote-reference.js';
import { SpecializedView } from '../reference/views.js';

/**
 * Anything a method can be invoked on.
 */
export type InvocationTarget = RemoteReference | SpecializedView;

function decodeResult(result: InvocationResult, call: CallDescription, connection: Connection): Value {
  switch (result.kind) {
    case 'primitive':
      return Codec.decode(result.value, connection);
    case 'reference':
      return connection.bind(result.reference);
    case 'void':
      return null;
    case 'error':
      throw new RemoteInvocationError(
        call,
        result.error.className,
        result.error.message,
        result.error.stack,
      );
  }
}

/**
 * Calls a method on a remote object.
 *
 * Resolves with the decoded result: a primitive, a nested sequence, a new
 * reference bound to the same connection, or null for void methods.
 *
 * @throws {ConnectionClosedError} If the owning connection is closed
 * @throws {InvalidReferenceError} If the target or an argument reference is not live
 * @throws {RemoteInvocationError} If the remote method raised
 * @throws {ConnectionError} If the channel failed during the call
 *
 * @example
 * ```typescript
 * const big = await invokeNew(connection, 'java.math.BigInteger', '1000000000');
 * const value = await invoke(big, 'longValue'); // 1000000000n
 * ```
 */
export async function invoke(target: InvocationTarget, method: string, ...args: Value[]): Promise<Value> {
  const reference = target instanceof SpecializedView ? target.reference : target;
  const connection = reference.owningConnection();
  const call: CallDescription = {
    kind: 'method',
    target: reference.toString(),
    method,
    argCount: args.length,
  };

  const result = await connection._invoke(call, () => ({
    kind: 'invoke',
    connectionId: connection.id,
    targetHandle: connection.tokenOf(reference),
    methodName: method,
    args: Codec.encodeArgs(args, connection),
  }));

  return decodeResult(result, call, connection);
}

/**
 * Constructs a remote object.
 *
 * @throws {TypeMismatchError} If the runtime answered with something other than a reference
 * @throws {RemoteInvocationError} If the constructor raised
 *
 * @example
 * ```typescript
 * const list = await invokeNew(connection, 'java.util.ArrayList');
 * ```
 */
export async function invokeNew(connection: Connection, className: string, ...args: Value[]): Promise<RemoteReference> {
  const call: CallDescription = {
    kind: 'constructor',
    target: className,
    method: CONSTRUCTOR_METHOD,
    argCount: args.length,
  };

  const result = await connection._invoke(call, () => ({
    kind: 'invoke',
    connectionId: connection.id,
    className,
    methodName: CONSTRUCTOR_METHOD,
    args: Codec.encodeArgs(args, connection),
  }));

  const value = decodeResult(result, call, connection);
  if (!(value instanceof RemoteReference)) {
    throw new TypeMismatchError(describeCall(call), 'reference', result.kind);
  }
  return value;
}

/**
 * Calls a static method of a remote class.
 *
 * @example
 * ```typescript
 * const hypot = await invokeStatic(connection, 'java.lang.Math', 'hypot', 10, 20);
 * ```
 */
export async function invokeStatic(
  connection: Connection,
  className: string,
  method: string,
  ...args: Value[]
): Promise<Value> {
  const call: CallDescription = {
    kind: 'static',
    target: className,
    method,
    argCount: args.length,
  };

  const result = await connection._invoke(call, () => ({
    kind: 'invoke',
    connectionId: connection.id,
    className,
    methodName: method,
    args: Codec.encodeArgs(args, connection),
  }));

  return decodeResult(result, call, connection);
}

/**
 * Releases a reference before its connection closes.
 */
export function release(reference: RemoteReference): Promise<void> {
  return reference.owningConnection().release(reference);
}
