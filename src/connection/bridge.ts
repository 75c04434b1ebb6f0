/**
 * Opening and closing connections.
 *
 * @module connection/bridge
 */

import { TcpTransport, type TcpTransportConfig } from '../transport/tcp-transport.js';
import type { Transport } from '../transport/transport.js';
import { Connection } from './connection.js';

/**
 * Entry points for connection lifecycle.
 *
 * The bridge never retries: a failed `open` surfaces immediately and the
 * caller decides whether to try again with a fresh transport.
 *
 * @example
 * ```typescript
 * import { Bridge, invokeStatic } from 'crossbridge';
 *
 * const connection = await Bridge.connectTcp({ host: '127.0.0.1', port: 8880 });
 * const hypot = await invokeStatic(connection, 'java.lang.Math', 'hypot', 10, 20);
 * await Bridge.close(connection);
 * ```
 */
export const Bridge = {
  /**
   * Connects a transport and performs the handshake.
   *
   * @throws {ConnectionError} If the transport cannot connect or the handshake fails
   */
  async open(transport: Transport): Promise<Connection> {
    const connection = new Connection(transport);
    await connection._open();
    return connection;
  },

  /**
   * Closes a connection and invalidates every reference issued on it.
   */
  close(connection: Connection): Promise<void> {
    return connection.close();
  },

  /**
   * Opens a connection over TCP.
   *
   * @throws {ConnectionError} If the runtime is unreachable or the handshake fails
   */
  connectTcp(config: TcpTransportConfig = {}): Promise<Connection> {
    return Bridge.open(new TcpTransport(config));
  },
} as const;
