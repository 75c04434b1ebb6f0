/**
 * TCP transport to a remote runtime.
 *
 * Provides a request/response channel over one socket with:
 * - Length-prefix framing for message boundaries
 * - Response correlation by request id
 * - Optional per-request timeout
 *
 * There is no automatic reconnection; a lost socket fails every pending
 * request and leaves the transport disconnected.
 *
 * @module transport/tcp-transport
 */

import * as net from 'node:net';
import { EventEmitter } from 'node:events';

import { BRIDGE_DEFAULTS, ConnectionError, MessageSerializationError } from '../types.js';
import { Serializer } from '../codec/serialization.js';
import { PendingRequests, type PendingRequestsStats } from './pending-requests.js';
import type { Transport } from './transport.js';

// =============================================================================
// Types
// =============================================================================

/**
 * TCP transport state.
 */
export type TcpTransportState = 'disconnected' | 'connecting' | 'connected' | 'closing';

/**
 * Configuration for a TCP transport.
 */
export interface TcpTransportConfig {
  /** @default BRIDGE_DEFAULTS.HOST */
  readonly host?: string;

  /** @default BRIDGE_DEFAULTS.PORT */
  readonly port?: number;

  /** Connection timeout in milliseconds */
  readonly connectTimeoutMs?: number;

  /** Request timeout in milliseconds (0 = wait until the socket fails) */
  readonly requestTimeoutMs?: number;

  /** Grace period for `disconnect()` before the socket is destroyed */
  readonly closeTimeoutMs?: number;
}

/**
 * Events emitted by TcpTransport.
 */
export interface TcpTransportEvents {
  connected: [];

  disconnected: [reason: string];

  /** A frame arrived that could not be matched to a request */
  protocolError: [error: Error];
}

/**
 * Statistics for a TCP transport.
 */
export interface TcpTransportStats {
  readonly state: TcpTransportState;
  readonly endpoint: string;
  readonly requestsSent: number;
  readonly responsesReceived: number;
  readonly bytesSent: number;
  readonly bytesReceived: number;
  readonly connectedAt: number | null;
  readonly pending: PendingRequestsStats;
}

// =============================================================================
// TcpTransport Class
// =============================================================================

/**
 * Request/response channel over a TCP socket.
 *
 * @example
 * ```typescript
 * const transport = new TcpTransport({ host: '127.0.0.1', port: 8880 });
 * transport.on('disconnected', (reason) => report(reason));
 *
 * const connection = await Bridge.open(transport);
 * ```
 */
export class TcpTransport extends EventEmitter<TcpTransportEvents> implements Transport {
  readonly endpoint: string;

  private socket: net.Socket | null = null;
  private state: TcpTransportState = 'disconnected';
  private receiveBuffer: Buffer = Buffer.alloc(0);
  private lastError: Error | null = null;

  private readonly config: Required<TcpTransportConfig>;
  private readonly pending = new PendingRequests();

  private connectTimer: ReturnType<typeof setTimeout> | null = null;

  // Statistics
  private requestsSent = 0;
  private responsesReceived = 0;
  private bytesSent = 0;
  private bytesReceived = 0;
  private connectedAt: number | null = null;

  constructor(config: TcpTransportConfig = {}) {
    super();

    this.config = {
      host: config.host ?? BRIDGE_DEFAULTS.HOST,
      port: config.port ?? BRIDGE_DEFAULTS.PORT,
      connectTimeoutMs: config.connectTimeoutMs ?? BRIDGE_DEFAULTS.CONNECT_TIMEOUT_MS,
      requestTimeoutMs: config.requestTimeoutMs ?? BRIDGE_DEFAULTS.REQUEST_TIMEOUT_MS,
      closeTimeoutMs: config.closeTimeoutMs ?? BRIDGE_DEFAULTS.CLOSE_TIMEOUT_MS,
    };
    this.endpoint = `tcp://${this.config.host}:${this.config.port}`;
  }

  getState(): TcpTransportState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === 'connected';
  }

  getStats(): TcpTransportStats {
    return {
      state: this.state,
      endpoint: this.endpoint,
      requestsSent: this.requestsSent,
      responsesReceived: this.responsesReceived,
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
      connectedAt: this.connectedAt,
      pending: this.pending.getStats(),
    };
  }

  /**
   * Opens the socket.
   *
   * @throws {ConnectionError} If the runtime is unreachable or the connect times out
   */
  connect(): Promise<void> {
    if (this.state === 'connected') {
      return Promise.resolve();
    }

    if (this.state !== 'disconnected') {
      return Promise.reject(new ConnectionError(this.endpoint, `cannot connect while ${this.state}`));
    }

    return new Promise((resolve, reject) => {
      this.state = 'connecting';
      let settled = false;

      const socket = new net.Socket();
      this.socket = socket;

      this.connectTimer = setTimeout(() => {
        if (settled) return;
        settled = true;
        this.cleanup();
        reject(new ConnectionError(this.endpoint, `connect timed out after ${this.config.connectTimeoutMs}ms`));
      }, this.config.connectTimeoutMs);

      const onConnect = () => {
        if (settled) return;
        settled = true;
        socket.removeListener('error', onError);
        this.clearConnectTimer();
        this.setupSocketHandlers(socket);
        this.state = 'connected';
        this.connectedAt = Date.now();
        this.emit('connected');
        resolve();
      };

      const onError = (err: Error) => {
        if (settled) return;
        settled = true;
        this.cleanup();
        reject(new ConnectionError(this.endpoint, err.message, err));
      };

      socket.once('connect', onConnect);
      socket.once('error', onError);

      socket.connect(this.config.port, this.config.host);
    });
  }

  /**
   * Writes a serialized request envelope and resolves with the matching
   * response envelope payload.
   *
   * @throws {ConnectionError} If not connected, or the socket fails before the response
   * @throws {RequestTimeoutError} If the configured request timeout elapses
   */
  request(payload: Buffer): Promise<Buffer> {
    const socket = this.socket;
    if (this.state !== 'connected' || !socket) {
      return Promise.reject(new ConnectionError(this.endpoint, 'not connected'));
    }

    const requestId = Serializer.peekRequestId(payload);
    if (!requestId) {
      return Promise.reject(
        new MessageSerializationError('serialize', new Error('request payload carries no request id')),
      );
    }

    let framed: Buffer;
    try {
      framed = Serializer.frame(payload);
    } catch (error) {
      return Promise.reject(error);
    }

    const response = this.pending.register(requestId, this.config.requestTimeoutMs);

    socket.write(framed, (err) => {
      if (err) {
        this.pending.reject(requestId, new ConnectionError(this.endpoint, err.message, err));
        return;
      }
      this.requestsSent++;
      this.bytesSent += framed.length;
    });

    return response;
  }

  /**
   * Closes the socket, failing any request still in flight.
   */
  disconnect(): Promise<void> {
    return new Promise((resolve) => {
      const socket = this.socket;
      if (this.state === 'disconnected' || !socket) {
        this.cleanup();
        resolve();
        return;
      }

      this.state = 'closing';
      this.pending.rejectAll(new ConnectionError(this.endpoint, 'transport disconnected'));

      const forceTimer = setTimeout(() => {
        this.finish('close timeout');
        resolve();
      }, this.config.closeTimeoutMs);
      forceTimer.unref();

      socket.end(() => {
        clearTimeout(forceTimer);
        this.finish('graceful close');
        resolve();
      });
    });
  }

  /**
   * Destroys the socket immediately.
   */
  destroy(): void {
    this.finish('destroyed');
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private setupSocketHandlers(socket: net.Socket): void {
    socket.on('data', (data) => this.handleData(data));
    socket.on('close', () => this.handleDisconnect());
    socket.on('error', (err) => {
      // 'close' follows; keep the cause for its reason
      this.lastError = err;
    });

    socket.setKeepAlive(true, 30000);
  }

  private handleData(data: Buffer): void {
    this.bytesReceived += data.length;
    this.receiveBuffer = Buffer.concat([this.receiveBuffer, data]);

    let offset = 0;
    while (offset < this.receiveBuffer.length) {
      let result: { payload: Buffer | null; bytesConsumed: number };
      try {
        result = Serializer.unframe(this.receiveBuffer, offset);
      } catch (err) {
        // Stream is unrecoverable once a frame header is bad
        this.emit('protocolError', err instanceof Error ? err : new Error(String(err)));
        this.socket?.destroy();
        return;
      }

      if (result.payload === null) {
        break;
      }

      offset += result.bytesConsumed;

      const payload = Buffer.from(result.payload);
      const requestId = Serializer.peekRequestId(payload);
      if (requestId && this.pending.resolve(requestId, payload)) {
        this.responsesReceived++;
      } else {
        this.emit('protocolError', new Error('received a response for no pending request'));
      }
    }

    if (offset > 0) {
      this.receiveBuffer = this.receiveBuffer.subarray(offset);
    }
  }

  private handleDisconnect(): void {
    if (this.state === 'disconnected' || this.state === 'closing') {
      return;
    }

    const reason = this.lastError ? this.lastError.message : 'socket closed';
    this.finish(reason);
  }

  private finish(reason: string): void {
    const wasConnected = this.state === 'connected' || this.state === 'closing';
    const cause = this.lastError ?? undefined;
    this.cleanup();
    this.pending.rejectAll(new ConnectionError(this.endpoint, reason, cause));

    if (wasConnected) {
      this.emit('disconnected', reason);
    }
  }

  private cleanup(): void {
    this.clearConnectTimer();

    if (this.socket) {
      this.socket.removeAllListeners();
      this.socket.destroy();
      this.socket = null;
    }

    this.receiveBuffer = Buffer.alloc(0);
    this.lastError = null;
    this.state = 'disconnected';
    this.connectedAt = null;
  }

  private clearConnectTimer(): void {
    if (this.connectTimer) {
      clearTimeout(this.connectTimer);
      this.connectTimer = null;
    }
  }
}
