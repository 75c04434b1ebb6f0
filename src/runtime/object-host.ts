/**
 * Runtime side of the bridge protocol.
 *
 * Keeps one object table per connection, issues handle tokens for objects
 * handed to the host, dispatches constructor, instance and static calls, and
 * captures anything thrown as a remote error result.
 *
 * @module runtime/object-host
 */

import { EventEmitter } from 'node:events';

import {
  BRIDGE_DEFAULTS,
  Classification,
  CodecError,
  CONSTRUCTOR_METHOD,
  type BridgeRequest,
  type ConnectionId,
  type EncodedReference,
  type EncodedValue,
  type HandleToken,
  type InvocationResult,
  type InvokeRequest,
  type RequestEnvelope,
  type RequestId,
  type ResponseEnvelope,
} from '../types.js';
import { decodeWith, encodeWith, TypedNumber } from '../codec/codec.js';
import { Serializer } from '../codec/serialization.js';
import type { ClassRegistry, ObjectDescriptor } from './class-registry.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Options for an object host.
 */
export interface ObjectHostOptions {
  /**
   * Creates the entry-point object announced to each new connection.
   * Without it the handshake announces no entry point.
   */
  readonly entryPoint?: (connectionId: ConnectionId) => object;

  /** Classification reported for the entry point */
  readonly entryPointClassification?: string;
}

/**
 * Events emitted by ObjectHost.
 */
export interface ObjectHostEvents {
  connectionOpened: [connectionId: ConnectionId];
  connectionClosed: [connectionId: ConnectionId];
  released: [connectionId: ConnectionId, count: number];
}

/**
 * Statistics for an object host.
 */
export interface ObjectHostStats {
  readonly connections: number;
  readonly objects: number;
  readonly totalCalls: number;
  readonly totalErrors: number;
}

interface HostedObject extends ObjectDescriptor {
  readonly value: object;
}

/**
 * Objects one connection can reach, in both directions.
 */
class ObjectTable {
  readonly byHandle = new Map<HandleToken, HostedObject>();
  readonly byObject = new Map<object, HandleToken>();
}

/**
 * Raised inside the host for protocol-level faults; reported to the caller
 * like any remote exception.
 */
class HostError extends Error {
  constructor(
    override readonly name: string,
    message: string,
  ) {
    super(message);
  }
}

// =============================================================================
// ObjectHost Class
// =============================================================================

/**
 * Hosts objects for remote callers.
 *
 * @example
 * ```typescript
 * const classes = new ClassRegistry();
 * classes.register(defineClass('util.Counter', Counter));
 *
 * const host = new ObjectHost(classes);
 * const connection = await Bridge.open(new LoopbackTransport(host));
 * const counter = await invokeNew(connection, 'util.Counter');
 * ```
 */
export class ObjectHost extends EventEmitter<ObjectHostEvents> {
  private readonly tables = new Map<ConnectionId, ObjectTable>();
  private nextHandle = 0;
  private totalCalls = 0;
  private totalErrors = 0;

  constructor(
    private readonly classes: ClassRegistry,
    private readonly options: ObjectHostOptions = {},
  ) {
    super();
  }

  getStats(): ObjectHostStats {
    let objects = 0;
    for (const table of this.tables.values()) {
      objects += table.byHandle.size;
    }
    return {
      connections: this.tables.size,
      objects,
      totalCalls: this.totalCalls,
      totalErrors: this.totalErrors,
    };
  }

  /**
   * Number of objects held for a connection.
   */
  objectCount(connectionId: ConnectionId): number {
    return this.tables.get(connectionId)?.byHandle.size ?? 0;
  }

  hasConnection(connectionId: ConnectionId): boolean {
    return this.tables.has(connectionId);
  }

  /**
   * Drops every object held for a connection.
   */
  dropConnection(connectionId: ConnectionId): boolean {
    const dropped = this.tables.delete(connectionId);
    if (dropped) {
      this.emit('connectionClosed', connectionId);
    }
    return dropped;
  }

  /**
   * Handles one serialized request envelope and returns the serialized
   * response envelope.
   *
   * A malformed request that still carries a request id is answered with an
   * error result.
   *
   * @throws {MessageSerializationError} If the payload carries no request id at all
   */
  async handle(payload: Buffer): Promise<Buffer> {
    let envelope: RequestEnvelope;
    try {
      envelope = Serializer.deserializeRequest(payload);
    } catch (error) {
      const requestId = Serializer.peekRequestId(payload);
      if (!requestId) {
        throw error;
      }
      return Serializer.serialize(ObjectHost.errorResponse(requestId, error));
    }

    return Serializer.serialize(await this.handleEnvelope(envelope));
  }

  /**
   * Handles one parsed request envelope.
   */
  async handleEnvelope(envelope: RequestEnvelope): Promise<ResponseEnvelope> {
    return {
      version: BRIDGE_DEFAULTS.PROTOCOL_VERSION,
      requestId: envelope.requestId,
      result: await this.dispatch(envelope.request),
    };
  }

  /**
   * Executes one request.
   */
  async dispatch(request: BridgeRequest): Promise<InvocationResult> {
    switch (request.kind) {
      case 'hello':
        return this.hello(request.connectionId);

      case 'invoke':
        this.totalCalls++;
        try {
          return await this.invoke(request);
        } catch (error) {
          this.totalErrors++;
          return toErrorResult(error);
        }

      case 'release':
        this.release(request.connectionId, request.handles);
        return { kind: 'void' };

      case 'goodbye':
        this.dropConnection(request.connectionId);
        return { kind: 'void' };
    }
  }

  /**
   * Builds an error response for a request that could not be handled.
   */
  static errorResponse(requestId: RequestId, error: unknown): ResponseEnvelope {
    return {
      version: BRIDGE_DEFAULTS.PROTOCOL_VERSION,
      requestId,
      result: toErrorResult(error),
    };
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private hello(connectionId: ConnectionId): InvocationResult {
    let table = this.tables.get(connectionId);
    if (!table) {
      table = new ObjectTable();
      this.tables.set(connectionId, table);
      this.emit('connectionOpened', connectionId);
    }

    if (!this.options.entryPoint) {
      return { kind: 'void' };
    }

    const entryPoint = this.options.entryPoint(connectionId);
    const descriptor = this.classes.describe(entryPoint);
    return {
      kind: 'reference',
      reference: this.hold(table, entryPoint, {
        className: descriptor.className,
        classification: this.options.entryPointClassification ?? Classification.EXECUTION_CONTEXT,
      }),
    };
  }

  private async invoke(request: InvokeRequest): Promise<InvocationResult> {
    const table = this.tables.get(request.connectionId);
    if (!table) {
      throw new HostError('UnknownConnectionError', `Connection '${request.connectionId}' has not said hello`);
    }

    const args = request.args.map((arg, i) => this.decodeArg(table, arg, `args[${i}]`));

    if (request.targetHandle !== undefined) {
      const target = this.lookup(table, request.targetHandle);
      const member: unknown = Reflect.get(target.value, request.methodName);
      if (typeof member !== 'function') {
        throw new HostError(
          'NoSuchMethodError',
          `${target.className} has no method '${request.methodName}'`,
        );
      }
      return this.encodeResult(table, await Reflect.apply(member, target.value, args));
    }

    if (request.className === undefined) {
      throw new HostError('BadRequestError', 'Invoke request names neither a target nor a class');
    }

    const definition = this.classes.get(request.className);
    if (!definition) {
      throw new HostError('ClassNotFoundError', `Class '${request.className}' is not registered`);
    }

    if (request.methodName === CONSTRUCTOR_METHOD) {
      if (!definition.construct) {
        throw new HostError('InstantiationError', `Class '${definition.name}' cannot be constructed`);
      }
      const instance: unknown = await definition.construct(args);
      if (typeof instance !== 'object' || instance === null) {
        throw new HostError('InstantiationError', `Constructor of '${definition.name}' returned no object`);
      }
      return {
        kind: 'reference',
        reference: this.hold(table, instance, {
          className: definition.name,
          classification: definition.classification ?? Classification.OBJECT,
        }),
      };
    }

    const member: unknown = definition.statics ? Reflect.get(definition.statics, request.methodName) : undefined;
    if (typeof member !== 'function') {
      throw new HostError(
        'NoSuchMethodError',
        `Class '${definition.name}' has no static method '${request.methodName}'`,
      );
    }
    return this.encodeResult(table, await Reflect.apply(member, definition.statics, args));
  }

  private release(connectionId: ConnectionId, handles: readonly HandleToken[]): void {
    const table = this.tables.get(connectionId);
    if (!table) {
      return;
    }

    let count = 0;
    for (const handle of handles) {
      const hosted = table.byHandle.get(handle);
      if (hosted) {
        table.byHandle.delete(handle);
        table.byObject.delete(hosted.value);
        count++;
      }
    }

    if (count > 0) {
      this.emit('released', connectionId, count);
    }
  }

  private lookup(table: ObjectTable, handle: HandleToken): HostedObject {
    const hosted = table.byHandle.get(handle);
    if (!hosted) {
      throw new HostError('InvalidHandleError', `Handle '${handle}' names no live object`);
    }
    return hosted;
  }

  private hold(table: ObjectTable, value: object, descriptor: ObjectDescriptor): EncodedReference {
    let handle = table.byObject.get(value);
    let hosted = handle === undefined ? undefined : table.byHandle.get(handle);

    if (handle === undefined || hosted === undefined) {
      handle = `h${(++this.nextHandle).toString(36)}` as HandleToken;
      hosted = { value, ...descriptor };
      table.byHandle.set(handle, hosted);
      table.byObject.set(value, handle);
    }

    return {
      t: 'ref',
      handle,
      className: hosted.className,
      classification: hosted.classification,
    };
  }

  private decodeArg(table: ObjectTable, arg: EncodedValue, path: string): unknown {
    return decodeWith(arg, path, (reference) => this.lookup(table, reference.handle).value);
  }

  private encodeResult(table: ObjectTable, value: unknown): InvocationResult {
    if (value === undefined) {
      return { kind: 'void' };
    }

    if (isHostable(value)) {
      return { kind: 'reference', reference: this.hold(table, value, this.classes.describe(value)) };
    }

    return {
      kind: 'primitive',
      value: encodeWith(value, 'result', (other, at) => {
        if (other === undefined) {
          return { t: 'null' };
        }
        if (isHostable(other)) {
          return this.hold(table, other, this.classes.describe(other));
        }
        throw new CodecError(at, `${typeof other} has no wire encoding`);
      }),
    };
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Objects (and functions) that travel by reference rather than by value.
 */
function isHostable(value: unknown): value is object {
  if (typeof value === 'function') {
    return true;
  }
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof TypedNumber);
}

function toErrorResult(error: unknown): InvocationResult {
  if (error instanceof Error) {
    return {
      kind: 'error',
      error: { className: error.name, message: error.message, stack: error.stack },
    };
  }
  return { kind: 'error', error: { className: 'Error', message: String(error) } };
}
