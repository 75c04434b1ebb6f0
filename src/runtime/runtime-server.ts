/**
 * TCP server exposing an object host to remote bridge connections.
 *
 * Each accepted socket speaks the framed envelope protocol. When a socket
 * goes away, the object tables of every connection seen on it are dropped.
 *
 * @module runtime/runtime-server
 */

import * as net from 'node:net';
import { EventEmitter } from 'node:events';

import { BRIDGE_DEFAULTS, MessageSerializationError, type ConnectionId, type RequestEnvelope } from '../types.js';
import { Serializer } from '../codec/serialization.js';
import { ObjectHost } from './object-host.js';

// =============================================================================
// Types
// =============================================================================

export type RuntimeServerState = 'stopped' | 'starting' | 'running' | 'stopping';

/**
 * Configuration for a runtime server.
 */
export interface RuntimeServerConfig {
  /** @default BRIDGE_DEFAULTS.HOST */
  readonly host?: string;

  /** Port to listen on; 0 picks a free port */
  readonly port?: number;
}

/**
 * Events emitted by RuntimeServer.
 */
export interface RuntimeServerEvents {
  started: [port: number];
  stopped: [];
  clientConnected: [remoteAddress: string];
  clientDisconnected: [remoteAddress: string];

  /** A client sent something that is not a framed envelope */
  protocolError: [error: Error, remoteAddress: string];
}

export interface RuntimeServerStats {
  readonly state: RuntimeServerState;
  readonly listeningPort: number | null;
  readonly activeClients: number;
  readonly totalRequests: number;
}

interface ClientSession {
  readonly socket: net.Socket;
  readonly remoteAddress: string;
  readonly connectionIds: Set<ConnectionId>;
  receiveBuffer: Buffer;
}

// =============================================================================
// RuntimeServer Class
// =============================================================================

/**
 * Serves an object host over TCP.
 *
 * @example
 * ```typescript
 * const server = new RuntimeServer(host, { port: 8880 });
 * await server.start();
 *
 * const connection = await Bridge.connectTcp({ port: server.getListeningPort() ?? 8880 });
 * ```
 */
export class RuntimeServer extends EventEmitter<RuntimeServerEvents> {
  private state: RuntimeServerState = 'stopped';
  private server: net.Server | null = null;
  private readonly sessions = new Set<ClientSession>();
  private listeningPort: number | null = null;
  private totalRequests = 0;

  private readonly config: Required<RuntimeServerConfig>;

  constructor(
    private readonly host: ObjectHost,
    config: RuntimeServerConfig = {},
  ) {
    super();

    this.config = {
      host: config.host ?? BRIDGE_DEFAULTS.HOST,
      port: config.port ?? BRIDGE_DEFAULTS.PORT,
    };
  }

  getState(): RuntimeServerState {
    return this.state;
  }

  getListeningPort(): number | null {
    return this.listeningPort;
  }

  getStats(): RuntimeServerStats {
    return {
      state: this.state,
      listeningPort: this.listeningPort,
      activeClients: this.sessions.size,
      totalRequests: this.totalRequests,
    };
  }

  /**
   * Starts listening.
   */
  start(): Promise<void> {
    if (this.state === 'running') {
      return Promise.resolve();
    }

    if (this.state !== 'stopped') {
      return Promise.reject(new Error(`Cannot start runtime server in ${this.state} state`));
    }

    return new Promise((resolve, reject) => {
      this.state = 'starting';

      const server = net.createServer((socket) => this.handleIncomingConnection(socket));
      this.server = server;

      server.once('error', (err) => {
        if (this.state === 'starting') {
          this.state = 'stopped';
          this.server = null;
          reject(err);
        }
      });

      server.listen(this.config.port, this.config.host, () => {
        const address = server.address();
        this.listeningPort = typeof address === 'object' && address ? address.port : this.config.port;
        this.state = 'running';
        this.emit('started', this.listeningPort);
        resolve();
      });
    });
  }

  /**
   * Stops listening and drops every client.
   */
  stop(): Promise<void> {
    const server = this.server;
    if (this.state === 'stopped' || !server) {
      return Promise.resolve();
    }

    this.state = 'stopping';

    for (const session of Array.from(this.sessions)) {
      session.socket.destroy();
      this.endSession(session);
    }

    return new Promise((resolve) => {
      server.close(() => {
        this.server = null;
        this.listeningPort = null;
        this.state = 'stopped';
        this.emit('stopped');
        resolve();
      });
    });
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private handleIncomingConnection(socket: net.Socket): void {
    const session: ClientSession = {
      socket,
      remoteAddress: `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`,
      connectionIds: new Set(),
      receiveBuffer: Buffer.alloc(0),
    };
    this.sessions.add(session);
    this.emit('clientConnected', session.remoteAddress);

    socket.on('data', (data) => this.handleData(session, data));
    socket.on('close', () => this.endSession(session));
    socket.on('error', () => {
      // 'close' follows and ends the session
    });
  }

  private handleData(session: ClientSession, data: Buffer): void {
    session.receiveBuffer = Buffer.concat([session.receiveBuffer, data]);

    let offset = 0;
    while (offset < session.receiveBuffer.length) {
      let result: { payload: Buffer | null; bytesConsumed: number };
      try {
        result = Serializer.unframe(session.receiveBuffer, offset);
      } catch (err) {
        this.emit('protocolError', err instanceof Error ? err : new Error(String(err)), session.remoteAddress);
        session.socket.destroy();
        return;
      }

      if (result.payload === null) {
        break;
      }

      offset += result.bytesConsumed;
      this.totalRequests++;
      this.respond(session, Buffer.from(result.payload)).catch((err: unknown) => {
        this.emit('protocolError', err instanceof Error ? err : new Error(String(err)), session.remoteAddress);
      });
    }

    if (offset > 0) {
      session.receiveBuffer = session.receiveBuffer.subarray(offset);
    }
  }

  private async respond(session: ClientSession, payload: Buffer): Promise<void> {
    let envelope: RequestEnvelope;

    try {
      envelope = Serializer.deserializeRequest(payload);
    } catch (error) {
      const requestId = Serializer.peekRequestId(payload);
      if (!requestId) {
        throw error;
      }
      this.write(session, Serializer.serialize(ObjectHost.errorResponse(requestId, error)));
      return;
    }

    const { request } = envelope;
    if (request.kind === 'goodbye') {
      session.connectionIds.delete(request.connectionId);
    } else {
      session.connectionIds.add(request.connectionId);
    }

    const response = Serializer.serialize(await this.host.handleEnvelope(envelope));
    try {
      this.write(session, response);
    } catch (error) {
      if (!(error instanceof MessageSerializationError)) {
        throw error;
      }
      // Result too large to frame; answer with the error instead.
      this.write(session, Serializer.serialize(ObjectHost.errorResponse(envelope.requestId, error)));
    }
  }

  private write(session: ClientSession, payload: Buffer): void {
    if (session.socket.destroyed) {
      return;
    }
    session.socket.write(Serializer.frame(payload));
  }

  private endSession(session: ClientSession): void {
    if (!this.sessions.delete(session)) {
      return;
    }

    for (const connectionId of session.connectionIds) {
      this.host.dropConnection(connectionId);
    }
    session.connectionIds.clear();
    this.emit('clientDisconnected', session.remoteAddress);
  }
}
