/**
 * One live channel to a remote runtime.
 *
 * A connection owns the registry of references issued on it and a FIFO call
 * queue: calls run one at a time, in the order they were issued. Closing it,
 * or losing the channel, invalidates every reference at once.
 *
 * @module connection/connection
 */

import { EventEmitter } from 'node:events';

import {
  BRIDGE_DEFAULTS,
  ConnectionClosedError,
  ConnectionError,
  InvalidReferenceError,
  RemoteInvocationError,
  type BridgeRequest,
  type CallDescription,
  type ConnectionId,
  type EncodedReference,
  type HandleToken,
  type InvocationResult,
  type InvokeRequest,
  type RequestEnvelope,
  type ResponseEnvelope,
} from '../types.js';
import { generateConnectionId, generateRequestId, Serializer } from '../codec/serialization.js';
import type { ReferenceScope } from '../codec/codec.js';
import { RemoteReference, type HasOwningConnection } from '../reference/remote-reference.js';
import type { Transport } from '../transport/transport.js';
import { CallQueue } from './call-queue.js';
import { ReferenceRegistry } from './reference-registry.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Connection lifecycle state. A closed connection never reopens.
 */
export type ConnectionState = 'opening' | 'open' | 'closing' | 'closed';

/**
 * How a call ended.
 */
export type CallOutcome = 'ok' | 'remote-error' | 'channel-error' | 'closed' | 'rejected';

/**
 * One finished call, reported through the `call` event.
 */
export interface CallRecord {
  readonly call: CallDescription;
  readonly outcome: CallOutcome;
  readonly durationMs: number;
  readonly error?: Error | undefined;
}

/**
 * Events emitted by Connection.
 */
export interface ConnectionEvents {
  /** Handshake completed */
  open: [];

  /** Connection torn down; every reference is now invalid */
  closed: [reason: string];

  /** A call finished */
  call: [record: CallRecord];

  /** A reference was released explicitly */
  released: [reference: string];
}

/**
 * Statistics for a connection.
 */
export interface ConnectionStats {
  readonly id: ConnectionId;
  readonly state: ConnectionState;
  readonly endpoint: string;
  readonly liveReferences: number;
  readonly queuedCalls: number;
  readonly totalCalls: number;
  readonly totalSucceeded: number;
  readonly totalRemoteErrors: number;
  readonly totalChannelErrors: number;
  readonly openedAt: number | null;
}

// =============================================================================
// Helpers
// =============================================================================

function toConnectionError(endpoint: string, error: unknown): ConnectionError {
  if (error instanceof ConnectionError) {
    return error;
  }
  if (error instanceof Error) {
    return new ConnectionError(endpoint, error.message, error);
  }
  return new ConnectionError(endpoint, String(error));
}

function classify(error: unknown): CallOutcome {
  if (error instanceof RemoteInvocationError) {
    return 'remote-error';
  }
  if (error instanceof ConnectionClosedError) {
    return 'closed';
  }
  if (error instanceof ConnectionError) {
    return 'channel-error';
  }
  return 'rejected';
}

// =============================================================================
// Connection Class
// =============================================================================

/**
 * A live channel to a remote runtime. Obtain one with `Bridge.open`.
 *
 * @example
 * ```typescript
 * const connection = await Bridge.open(transport);
 * connection.on('call', (record) => metrics.observe(record.durationMs));
 * connection.on('closed', (reason) => report(reason));
 *
 * const session = connection.entryPoint;
 * await Bridge.close(connection);
 * ```
 */
export class Connection extends EventEmitter<ConnectionEvents> implements HasOwningConnection, ReferenceScope {
  readonly id: ConnectionId;

  private state: ConnectionState = 'opening';
  private entry: RemoteReference | null = null;
  private closing: Promise<void> | null = null;
  private readonly registry: ReferenceRegistry;
  private readonly queue = new CallQueue();

  // Statistics
  private totalCalls = 0;
  private totalSucceeded = 0;
  private totalRemoteErrors = 0;
  private totalChannelErrors = 0;
  private openedAt: number | null = null;

  /**
   * @internal Use `Bridge.open`.
   */
  constructor(
    private readonly transport: Transport,
    id: ConnectionId = generateConnectionId(),
  ) {
    super();
    this.id = id;
    this.registry = new ReferenceRegistry(this);
  }

  get endpoint(): string {
    return this.transport.endpoint;
  }

  /**
   * Entry-point object announced by the runtime during the handshake, or
   * null when it announced none.
   */
  get entryPoint(): RemoteReference | null {
    return this.entry;
  }

  getState(): ConnectionState {
    return this.state;
  }

  isOpen(): boolean {
    return this.state === 'open';
  }

  owningConnection(): Connection {
    return this;
  }

  getStats(): ConnectionStats {
    return {
      id: this.id,
      state: this.state,
      endpoint: this.transport.endpoint,
      liveReferences: this.registry.size,
      queuedCalls: this.queue.size,
      totalCalls: this.totalCalls,
      totalSucceeded: this.totalSucceeded,
      totalRemoteErrors: this.totalRemoteErrors,
      totalChannelErrors: this.totalChannelErrors,
      openedAt: this.openedAt,
    };
  }

  override toString(): string {
    return `<Connection ${this.id} ${this.transport.endpoint} ${this.state}>`;
  }

  // ===========================================================================
  // Reference Scope
  // ===========================================================================

  /**
   * Returns the handle of a reference this connection can use in a call.
   *
   * @throws {ConnectionClosedError} If this connection is not open
   * @throws {InvalidReferenceError} If the reference belongs elsewhere or was released
   */
  tokenOf(reference: RemoteReference): HandleToken {
    if (reference.owningConnection() !== this) {
      throw new InvalidReferenceError(
        reference.toString(),
        `belongs to connection '${reference.connectionId}', not '${this.id}'`,
      );
    }
    this.ensureOpen();
    if (!this.registry.holds(reference)) {
      throw new InvalidReferenceError(reference.toString(), 'it was released');
    }
    return RemoteReference._tokenOf(reference);
  }

  /**
   * Registers the reference named by an encoded handle.
   */
  bind(encoded: EncodedReference): RemoteReference {
    this.ensureOpen();
    return this.registry.register(encoded);
  }

  /**
   * @internal Whether the reference is live in this connection's registry.
   */
  _holds(reference: RemoteReference): boolean {
    return this.registry.holds(reference);
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * @internal Connects the transport and performs the handshake.
   *
   * @throws {ConnectionError} If the transport fails or the runtime rejects the handshake
   */
  async _open(): Promise<void> {
    if (this.state !== 'opening') {
      throw new ConnectionError(this.endpoint, `cannot open a connection that is ${this.state}`);
    }

    try {
      await this.transport.connect();
    } catch (error) {
      this.teardown('connect failed');
      throw toConnectionError(this.endpoint, error);
    }

    let result: InvocationResult;
    try {
      result = await this.exchange({ kind: 'hello', connectionId: this.id });
    } catch (error) {
      await this.abandon('handshake failed');
      throw error;
    }

    if (result.kind === 'error') {
      await this.abandon('handshake rejected');
      throw new ConnectionError(
        this.endpoint,
        `runtime rejected the handshake: ${result.error.className}: ${result.error.message}`,
      );
    }

    this.state = 'open';
    this.openedAt = Date.now();
    if (result.kind === 'reference') {
      this.entry = this.registry.register(result.reference);
    }
    this.emit('open');
  }

  /**
   * Closes the connection: says goodbye to the runtime, disconnects the
   * transport and invalidates every reference. Idempotent.
   */
  close(reason = 'closed by caller'): Promise<void> {
    if (this.closing) {
      return this.closing;
    }
    if (this.state === 'closed') {
      return Promise.resolve();
    }

    this.closing = this.doClose(reason);
    return this.closing;
  }

  /**
   * Releases one reference early. The runtime is asked to drop the object;
   * releasing a reference that is already invalid does nothing.
   *
   * @throws {InvalidReferenceError} If the reference belongs to another connection
   * @throws {ConnectionError} If the channel fails while sending the release
   */
  async release(reference: RemoteReference): Promise<void> {
    if (reference.owningConnection() !== this) {
      throw new InvalidReferenceError(
        reference.toString(),
        `belongs to connection '${reference.connectionId}', not '${this.id}'`,
      );
    }

    if (!this.isOpen()) {
      return;
    }

    if (!this.registry.holds(reference)) {
      return;
    }

    // Calls queued before this release still see the reference as live.
    await this.queue.run(async () => {
      if (!this.isOpen() || !this.registry.release(reference)) {
        return;
      }
      if (reference === this.entry) {
        this.entry = null;
      }
      this.emit('released', reference.toString());
      await this.exchange({
        kind: 'release',
        connectionId: this.id,
        handles: [RemoteReference._tokenOf(reference)],
      });
    });
  }

  // ===========================================================================
  // Calls
  // ===========================================================================

  /**
   * @internal Queues an invoke request and returns the raw result.
   *
   * `build` runs when the call reaches the head of the queue, so argument
   * encoding sees the registry as it is at send time.
   *
   * @throws {ConnectionClosedError} If the connection is closed before or during the call
   * @throws {ConnectionError} If the channel fails
   */
  _invoke(call: CallDescription, build: () => InvokeRequest): Promise<InvocationResult> {
    this.totalCalls++;

    return this.queue.run(async () => {
      const startedAt = Date.now();
      try {
        this.ensureOpen();
        const result = await this.exchange(build());
        if (result.kind === 'error') {
          this.totalRemoteErrors++;
          this.record(call, 'remote-error', startedAt);
        } else {
          this.totalSucceeded++;
          this.record(call, 'ok', startedAt);
        }
        return result;
      } catch (error) {
        const outcome = classify(error);
        if (outcome === 'channel-error') {
          this.totalChannelErrors++;
        }
        this.record(call, outcome, startedAt, error instanceof Error ? error : undefined);
        throw error;
      }
    });
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private ensureOpen(): void {
    if (this.state !== 'open') {
      throw new ConnectionClosedError(this.id);
    }
  }

  private record(call: CallDescription, outcome: CallOutcome, startedAt: number, error?: Error): void {
    this.emit('call', { call, outcome, durationMs: Date.now() - startedAt, error });
  }

  /**
   * Sends one request and returns its result.
   */
  private async exchange(request: BridgeRequest): Promise<InvocationResult> {
    const envelope: RequestEnvelope = {
      version: BRIDGE_DEFAULTS.PROTOCOL_VERSION,
      requestId: generateRequestId(),
      request,
    };
    const payload = Serializer.serialize(envelope);

    let raw: Buffer;
    try {
      raw = await this.transport.request(payload);
    } catch (error) {
      if (this.state === 'closing' || this.state === 'closed') {
        throw new ConnectionClosedError(this.id);
      }
      const failure = toConnectionError(this.endpoint, error);
      if (!this.transport.isConnected()) {
        this.teardown(`channel failed: ${failure.reason}`);
      }
      throw failure;
    }

    if (this.state === 'closing' || this.state === 'closed') {
      throw new ConnectionClosedError(this.id);
    }

    let response: ResponseEnvelope;
    try {
      response = Serializer.deserializeResponse(raw);
    } catch (error) {
      throw toConnectionError(this.endpoint, error);
    }

    if (response.requestId !== envelope.requestId) {
      throw new ConnectionError(
        this.endpoint,
        `response '${response.requestId}' does not answer request '${envelope.requestId}'`,
      );
    }

    return response.result;
  }

  private async doClose(reason: string): Promise<void> {
    const wasOpen = this.state === 'open';
    this.state = 'closing';

    try {
      if (wasOpen && this.transport.isConnected()) {
        // Best effort, like a cast: the runtime also drops state when the channel goes away
        await this.exchange({ kind: 'goodbye', connectionId: this.id }).catch(() => undefined);
      }
      await this.transport.disconnect();
    } finally {
      this.teardown(reason);
    }
  }

  /**
   * Gives up on a connection whose handshake failed.
   */
  private async abandon(reason: string): Promise<void> {
    try {
      await this.transport.disconnect();
    } finally {
      this.teardown(reason);
    }
  }

  private teardown(reason: string): void {
    if (this.state === 'closed') {
      return;
    }
    this.state = 'closed';
    this.registry.invalidateAll();
    this.emit('closed', reason);
  }
}
