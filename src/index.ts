/**
 * crossbridge - remote invocation against objects living in another runtime
 *
 * This module provides the public API for the crossbridge library.
 */

export const VERSION = '0.1.0' as const;

// Core types
export type {
  ConnectionId,
  HandleToken,
  RequestId,
  EncodedReference,
  EncodedValue,
  SpecialDouble,
  HelloRequest,
  InvokeRequest,
  ReleaseRequest,
  GoodbyeRequest,
  BridgeRequest,
  RemoteErrorPayload,
  InvocationResult,
  RequestEnvelope,
  ResponseEnvelope,
  CallKind,
  CallDescription,
} from './types.js';

export { BRIDGE_DEFAULTS, Classification, CONSTRUCTOR_METHOD, describeCall } from './types.js';

// Errors
export {
  ConnectionError,
  ConnectionClosedError,
  InvalidReferenceError,
  RemoteInvocationError,
  TypeMismatchError,
  ModuleLookupError,
  InvalidDeclarationError,
  CodecError,
  MessageSerializationError,
  RequestTimeoutError,
} from './types.js';

// Connection
export { Bridge } from './connection/bridge.js';
export {
  Connection,
  type ConnectionState,
  type ConnectionEvents,
  type ConnectionStats,
  type CallOutcome,
  type CallRecord,
} from './connection/connection.js';

// Remote references and views
export { RemoteReference, type HasOwningConnection } from './reference/remote-reference.js';
export {
  SpecializedView,
  ExecutionContextView,
  TabularDataView,
  asView,
  underlying,
  owningConnection,
  type ViewType,
} from './reference/views.js';

// Invocation
export { invoke, invokeNew, invokeStatic, release, type InvocationTarget } from './invocation/invoke.js';

// Codec
export {
  Codec,
  TypedNumber,
  Typed,
  type Value,
  type DecodedValue,
  type NumericType,
  type ReferenceScope,
} from './codec/codec.js';
export { Serializer } from './codec/serialization.js';

// Transports
export type { Transport } from './transport/transport.js';
export {
  TcpTransport,
  type TcpTransportConfig,
  type TcpTransportEvents,
  type TcpTransportState,
  type TcpTransportStats,
} from './transport/tcp-transport.js';
export { LoopbackTransport } from './transport/loopback-transport.js';

// Runtime side
export {
  ClassRegistry,
  defineClass,
  type RuntimeClassDefinition,
  type RuntimeConstructor,
  type ClassRegistryStats,
  type ObjectDescriptor,
} from './runtime/class-registry.js';
export {
  ObjectHost,
  type ObjectHostOptions,
  type ObjectHostEvents,
  type ObjectHostStats,
} from './runtime/object-host.js';
export {
  RuntimeServer,
  type RuntimeServerConfig,
  type RuntimeServerEvents,
  type RuntimeServerState,
  type RuntimeServerStats,
} from './runtime/runtime-server.js';

// Dependencies
export {
  declareDependencies,
  parseDeclaration,
  EMPTY_DECLARATION,
  type DependencyDeclaration,
  type DependencyDeclarationInput,
  type DependencyManifest,
} from './dependencies/declaration.js';
export {
  dependenciesFor,
  dependenciesForAll,
  isDependencyProvider,
  type DependencyProvider,
  type ModuleResolver,
} from './dependencies/aggregator.js';
export { ExtensionRegistry } from './dependencies/extension-registry.js';
export { NodeModuleResolver } from './dependencies/node-module-resolver.js';
