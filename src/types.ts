/**
 * Type definitions for crossbridge remote invocation.
 *
 * Holds the identifiers, wire shapes, defaults and error taxonomy shared by
 * the host side (connections, references, invocation) and the runtime side
 * (object host, runtime server).
 *
 * @module types
 */

// =============================================================================
// Identifiers
// =============================================================================

declare const ConnectionIdBrand: unique symbol;
declare const HandleTokenBrand: unique symbol;
declare const RequestIdBrand: unique symbol;

/**
 * Identity of one live channel to a remote runtime.
 */
export type ConnectionId = string & { readonly [ConnectionIdBrand]: 'ConnectionId' };

/**
 * Opaque token naming one object inside the remote runtime.
 *
 * Tokens are issued by the runtime and never interpreted by the host.
 */
export type HandleToken = string & { readonly [HandleTokenBrand]: 'HandleToken' };

/**
 * Correlates a response envelope with the request that produced it.
 */
export type RequestId = string & { readonly [RequestIdBrand]: 'RequestId' };

// =============================================================================
// Configuration
// =============================================================================

/**
 * Default values for bridge configuration.
 */
export const BRIDGE_DEFAULTS = {
  /** Default runtime host */
  HOST: '127.0.0.1',

  /** Default runtime port */
  PORT: 8880,

  /** Default TCP connect timeout in milliseconds */
  CONNECT_TIMEOUT_MS: 10000,

  /** Default request timeout in milliseconds (0 = wait until the channel fails) */
  REQUEST_TIMEOUT_MS: 0,

  /** Grace period for a graceful socket close before it is destroyed */
  CLOSE_TIMEOUT_MS: 1000,

  /** Maximum framed message size (16 MB) */
  MAX_MESSAGE_SIZE: 16 * 1024 * 1024,

  /** Protocol version */
  PROTOCOL_VERSION: 1 as const,
} as const;

/**
 * Classification tags reported by the runtime for each object.
 *
 * Anything other than these is allowed; the bridge only compares tags.
 */
export const Classification = {
  OBJECT: 'object',
  EXECUTION_CONTEXT: 'execution-context',
  TABULAR_DATA: 'tabular-data',
} as const;

/**
 * Method name used on the wire for constructor dispatch.
 */
export const CONSTRUCTOR_METHOD = '<init>';

// =============================================================================
// Wire Values
// =============================================================================

/**
 * Reference to a remote object as it travels on the wire.
 */
export interface EncodedReference {
  readonly t: 'ref';
  readonly handle: HandleToken;
  readonly className: string;
  readonly classification: string;
}

/**
 * Doubles JSON cannot carry (non-finite values and negative zero) travel as text.
 */
export type SpecialDouble = 'NaN' | 'Infinity' | '-Infinity' | '-0';

/**
 * Self-describing wire encoding of a single value.
 */
export type EncodedValue =
  | { readonly t: 'null' }
  | { readonly t: 'bool'; readonly v: boolean }
  | { readonly t: 'int'; readonly v: number }
  | { readonly t: 'long'; readonly v: string }
  | { readonly t: 'double'; readonly v: number | SpecialDouble }
  | { readonly t: 'string'; readonly v: string }
  | { readonly t: 'seq'; readonly v: readonly EncodedValue[] }
  | EncodedReference;

// =============================================================================
// Requests
// =============================================================================

/**
 * Handshake sent once when a connection opens.
 */
export interface HelloRequest {
  readonly kind: 'hello';
  readonly connectionId: ConnectionId;
}

/**
 * A constructor, instance or static call.
 *
 * `targetHandle` present selects instance dispatch; `className` with the
 * constructor method name selects construction; `className` with any other
 * method selects static dispatch.
 */
export interface InvokeRequest {
  readonly kind: 'invoke';
  readonly connectionId: ConnectionId;
  readonly targetHandle?: HandleToken | undefined;
  readonly className?: string | undefined;
  readonly methodName: string;
  readonly args: readonly EncodedValue[];
}

/**
 * Asks the runtime to drop objects the host no longer references.
 */
export interface ReleaseRequest {
  readonly kind: 'release';
  readonly connectionId: ConnectionId;
  readonly handles: readonly HandleToken[];
}

/**
 * Tells the runtime the connection is going away.
 */
export interface GoodbyeRequest {
  readonly kind: 'goodbye';
  readonly connectionId: ConnectionId;
}

/**
 * Union of all request types.
 */
export type BridgeRequest = HelloRequest | InvokeRequest | ReleaseRequest | GoodbyeRequest;

// =============================================================================
// Results
// =============================================================================

/**
 * Exception captured by the remote runtime.
 */
export interface RemoteErrorPayload {
  readonly className: string;
  readonly message: string;
  readonly stack?: string | undefined;
}

/**
 * Tagged outcome of a request.
 */
export type InvocationResult =
  | { readonly kind: 'primitive'; readonly value: EncodedValue }
  | { readonly kind: 'reference'; readonly reference: EncodedReference }
  | { readonly kind: 'void' }
  | { readonly kind: 'error'; readonly error: RemoteErrorPayload };

// =============================================================================
// Envelopes
// =============================================================================

/**
 * Request as written to the transport.
 */
export interface RequestEnvelope {
  readonly version: typeof BRIDGE_DEFAULTS.PROTOCOL_VERSION;
  readonly requestId: RequestId;
  readonly request: BridgeRequest;
}

/**
 * Response as read from the transport.
 */
export interface ResponseEnvelope {
  readonly version: typeof BRIDGE_DEFAULTS.PROTOCOL_VERSION;
  readonly requestId: RequestId;
  readonly result: InvocationResult;
}

// =============================================================================
// Call Descriptions
// =============================================================================

/**
 * Which of the three call shapes produced a request.
 */
export type CallKind = 'method' | 'constructor' | 'static';

/**
 * Human-readable description of a call, attached to errors and call events.
 */
export interface CallDescription {
  readonly kind: CallKind;

  /** Class name for constructor/static calls, reference description otherwise */
  readonly target: string;

  readonly method: string;
  readonly argCount: number;
}

/**
 * Formats a call description as `target.method(n args)`.
 */
export function describeCall(call: CallDescription): string {
  const method = call.kind === 'constructor' ? 'new' : call.method;
  return `${call.target}.${method}(${call.argCount} args)`;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Error thrown when the channel to the remote runtime is unreachable or broke.
 *
 * A call that fails with this error has indeterminate effect on the remote
 * side: the runtime may have partially or fully executed it.
 */
export class ConnectionError extends Error {
  override readonly name = 'ConnectionError' as const;
  override readonly cause: Error | undefined;

  constructor(
    readonly channel: string,
    readonly reason: string,
    cause?: Error,
  ) {
    super(`Connection '${channel}' failed: ${reason}`);
    this.cause = cause;
  }
}

/**
 * Error thrown when a connection is used after it was closed.
 */
export class ConnectionClosedError extends Error {
  override readonly name = 'ConnectionClosedError' as const;

  constructor(readonly connectionId: ConnectionId) {
    super(`Connection '${connectionId}' is closed`);
  }
}

/**
 * Error thrown when a reference is not owned by an open connection.
 */
export class InvalidReferenceError extends Error {
  override readonly name = 'InvalidReferenceError' as const;

  constructor(
    readonly reference: string,
    readonly reason: string,
  ) {
    super(`Invalid reference ${reference}: ${reason}`);
  }
}

/**
 * Error thrown when the remote runtime raised during a call.
 *
 * The remote diagnostic is carried as-is and never turned into a host value.
 */
export class RemoteInvocationError extends Error {
  override readonly name = 'RemoteInvocationError' as const;

  constructor(
    readonly call: CallDescription,
    readonly remoteClassName: string,
    readonly remoteMessage: string,
    readonly remoteStack: string | undefined,
  ) {
    super(`Remote call ${describeCall(call)} raised ${remoteClassName}: ${remoteMessage}`);
  }
}

/**
 * Error thrown when a value does not have the remote classification asked for.
 */
export class TypeMismatchError extends Error {
  override readonly name = 'TypeMismatchError' as const;

  constructor(
    readonly subject: string,
    readonly expected: string,
    readonly actual: string,
  ) {
    super(`${subject}: expected '${expected}' but got '${actual}'`);
  }
}

/**
 * Error thrown when an extension module cannot be resolved at all.
 */
export class ModuleLookupError extends Error {
  override readonly name = 'ModuleLookupError' as const;
  override readonly cause: Error | undefined;

  constructor(
    readonly moduleName: string,
    cause?: Error,
  ) {
    super(
      cause
        ? `Extension module '${moduleName}' could not be resolved: ${cause.message}`
        : `Extension module '${moduleName}' could not be resolved`,
    );
    this.cause = cause;
  }
}

/**
 * Error thrown when a dependency declaration is malformed.
 */
export class InvalidDeclarationError extends Error {
  override readonly name = 'InvalidDeclarationError' as const;

  constructor(
    readonly source: string,
    readonly reason: string,
  ) {
    super(`Invalid dependency declaration from '${source}': ${reason}`);
  }
}

/**
 * Error thrown when a value has no wire encoding or a wire value is out of range.
 */
export class CodecError extends Error {
  override readonly name = 'CodecError' as const;

  constructor(
    readonly path: string,
    readonly reason: string,
  ) {
    super(`Codec failure at ${path}: ${reason}`);
  }
}

/**
 * Error thrown when envelope serialization or framing fails.
 */
export class MessageSerializationError extends Error {
  override readonly name = 'MessageSerializationError' as const;
  override readonly cause: Error;

  constructor(
    readonly operation: 'serialize' | 'deserialize',
    cause: Error,
  ) {
    super(`Failed to ${operation} bridge message: ${cause.message}`);
    this.cause = cause;
  }
}

/**
 * Error thrown by a transport when a request got no response in time.
 */
export class RequestTimeoutError extends Error {
  override readonly name = 'RequestTimeoutError' as const;

  constructor(
    readonly requestId: RequestId,
    readonly timeoutMs: number,
  ) {
    super(`Request '${requestId}' got no response within ${timeoutMs}ms`);
  }
}
