/**
 * Argument/result codec.
 *
 * Maps host values onto the self-describing wire encoding and back. Plain
 * numbers travel as `int` when they are 32-bit integers and as `double`
 * otherwise; bigints travel as `long`. Remote references travel by handle
 * token and are bound back to the issuing connection when decoded.
 *
 * @module codec/codec
 */

import type { ConnectionId, EncodedReference, EncodedValue, HandleToken, SpecialDouble } from '../types.js';
import { CodecError } from '../types.js';
import { RemoteReference } from '../reference/remote-reference.js';
import { SpecializedView } from '../reference/views.js';

// =============================================================================
// Constants
// =============================================================================

const INT_MIN = -(2 ** 31);
const INT_MAX = 2 ** 31 - 1;
const LONG_MIN = -(2n ** 63n);
const LONG_MAX = 2n ** 63n - 1n;

const LONG_PATTERN = /^-?\d+$/;

// =============================================================================
// Host Values
// =============================================================================

/**
 * Wire width requested explicitly for a number.
 */
export type NumericType = 'int' | 'long' | 'double';

/**
 * A number paired with the wire width it must be sent as.
 *
 * Lets callers pick an overload on the remote side, e.g. send `10` as a
 * double rather than an int.
 */
export class TypedNumber {
  constructor(
    readonly type: NumericType,
    readonly value: number | bigint,
  ) {}
}

/**
 * Factories for explicitly typed numbers.
 *
 * @example
 * ```typescript
 * await invokeStatic(connection, 'java.lang.Math', 'max', Typed.double(1), Typed.double(2));
 * await invoke(list, 'get', Typed.int(0));
 * ```
 */
export const Typed = {
  int(value: number): TypedNumber {
    return new TypedNumber('int', value);
  },

  long(value: number | bigint): TypedNumber {
    return new TypedNumber('long', value);
  },

  double(value: number): TypedNumber {
    return new TypedNumber('double', value);
  },
} as const;

/**
 * A value that can be passed to or returned from a remote call.
 */
export type Value =
  | null
  | boolean
  | number
  | bigint
  | string
  | TypedNumber
  | RemoteReference
  | SpecializedView
  | readonly Value[];

/**
 * Shape of a decoded value, where `R` is what a wire reference becomes.
 */
export type DecodedValue<R> = null | boolean | number | bigint | string | R | readonly DecodedValue<R>[];

/**
 * Connection-side hooks the codec needs to handle references.
 */
export interface ReferenceScope {
  /** Connection the call is issued on */
  readonly id: ConnectionId;

  /** Returns the handle of a reference owned by this scope, or throws */
  tokenOf(reference: RemoteReference): HandleToken;

  /** Registers (or finds) the reference named by an encoded handle */
  bind(encoded: EncodedReference): RemoteReference;
}

// =============================================================================
// Scalars
// =============================================================================

function encodeInt(value: number, path: string): EncodedValue {
  if (!Number.isInteger(value) || value < INT_MIN || value > INT_MAX) {
    throw new CodecError(path, `${value} is not a 32-bit integer`);
  }
  return { t: 'int', v: value };
}

function encodeLong(value: number | bigint, path: string): EncodedValue {
  if (typeof value === 'number' && !Number.isInteger(value)) {
    throw new CodecError(path, `${value} is not an integer`);
  }
  const big = BigInt(value);
  if (big < LONG_MIN || big > LONG_MAX) {
    throw new CodecError(path, `${big} is outside the 64-bit integer range`);
  }
  return { t: 'long', v: big.toString() };
}

function encodeDouble(value: number): EncodedValue {
  if (Number.isNaN(value)) {
    return { t: 'double', v: 'NaN' };
  }
  if (value === Infinity) {
    return { t: 'double', v: 'Infinity' };
  }
  if (value === -Infinity) {
    return { t: 'double', v: '-Infinity' };
  }
  if (Object.is(value, -0)) {
    return { t: 'double', v: '-0' };
  }
  return { t: 'double', v: value };
}

/**
 * Encodes a plain number, choosing `int` for 32-bit integers and `double`
 * for everything else, negative zero included.
 *
 * Integers outside the 32-bit range go out as `double`; pass a `bigint` or
 * `Typed.long(...)` to reach a method that takes a long.
 */
export function encodeNumber(value: number): EncodedValue {
  if (Number.isInteger(value) && !Object.is(value, -0) && value >= INT_MIN && value <= INT_MAX) {
    return { t: 'int', v: value };
  }
  return encodeDouble(value);
}

function encodeTyped(value: TypedNumber, path: string): EncodedValue {
  switch (value.type) {
    case 'int':
      if (typeof value.value === 'bigint') {
        return encodeInt(Number(value.value), path);
      }
      return encodeInt(value.value, path);
    case 'long':
      return encodeLong(value.value, path);
    case 'double':
      return encodeDouble(Number(value.value));
  }
}

function decodeDouble(value: number | SpecialDouble): number {
  return typeof value === 'number' ? value : Number(value);
}

function decodeLong(value: string, path: string): bigint {
  if (!LONG_PATTERN.test(value)) {
    throw new CodecError(path, `'${value}' is not a decimal integer`);
  }
  const big = BigInt(value);
  if (big < LONG_MIN || big > LONG_MAX) {
    throw new CodecError(path, `${big} is outside the 64-bit integer range`);
  }
  return big;
}

// =============================================================================
// Generic Walkers
// =============================================================================

/**
 * Encodes a value, delegating anything that is not a scalar, typed number or
 * array to `onOther`.
 *
 * Shared by the host codec and the runtime object host; they differ only in
 * how they treat objects.
 */
export function encodeWith(
  value: unknown,
  path: string,
  onOther: (value: unknown, path: string) => EncodedValue,
): EncodedValue {
  if (value === null) {
    return { t: 'null' };
  }

  switch (typeof value) {
    case 'boolean':
      return { t: 'bool', v: value };
    case 'number':
      return encodeNumber(value);
    case 'bigint':
      return encodeLong(value, path);
    case 'string':
      return { t: 'string', v: value };
    default:
      break;
  }

  if (value instanceof TypedNumber) {
    return encodeTyped(value, path);
  }

  if (Array.isArray(value)) {
    const items: unknown[] = value;
    return { t: 'seq', v: items.map((item, i) => encodeWith(item, `${path}[${i}]`, onOther)) };
  }

  return onOther(value, path);
}

/**
 * Decodes a wire value, turning references into whatever `onRef` returns.
 */
export function decodeWith<R>(
  encoded: EncodedValue,
  path: string,
  onRef: (reference: EncodedReference, path: string) => R,
): DecodedValue<R> {
  switch (encoded.t) {
    case 'null':
      return null;
    case 'bool':
      return encoded.v;
    case 'int':
      if (!Number.isInteger(encoded.v) || encoded.v < INT_MIN || encoded.v > INT_MAX) {
        throw new CodecError(path, `${encoded.v} is not a 32-bit integer`);
      }
      return encoded.v;
    case 'long':
      return decodeLong(encoded.v, path);
    case 'double':
      return decodeDouble(encoded.v);
    case 'string':
      return encoded.v;
    case 'seq':
      return encoded.v.map((item, i) => decodeWith(item, `${path}[${i}]`, onRef));
    case 'ref':
      return onRef(encoded, path);
  }
}

// =============================================================================
// Host Codec
// =============================================================================

/**
 * Host-side codec bound to the connection a call is issued on.
 */
export const Codec = {
  /**
   * Encodes one host value.
   *
   * @throws {CodecError} If the value has no wire encoding
   * @throws {InvalidReferenceError} If a reference is not live on `scope`
   */
  encode(value: Value, scope: ReferenceScope, path = 'value'): EncodedValue {
    return encodeWith(value, path, (other, at) => {
      const reference = other instanceof SpecializedView ? other.reference : other;
      if (reference instanceof RemoteReference) {
        return {
          t: 'ref',
          handle: scope.tokenOf(reference),
          className: reference.className,
          classification: reference.classification,
        };
      }
      return fail(at, other);
    });
  },

  /**
   * Encodes a call's argument list.
   */
  encodeArgs(args: readonly Value[], scope: ReferenceScope): EncodedValue[] {
    return args.map((arg, i) => Codec.encode(arg, scope, `args[${i}]`));
  },

  /**
   * Decodes one wire value, registering references on `scope` before they are
   * returned.
   */
  decode(encoded: EncodedValue, scope: ReferenceScope, path = 'result'): Value {
    return decodeWith(encoded, path, (reference) => scope.bind(reference));
  },
} as const;

function fail(path: string, value: unknown): never {
  const kind = value === undefined ? 'undefined' : typeof value === 'object' ? 'a plain object' : typeof value;
  throw new CodecError(path, `${kind} has no wire encoding`);
}
