/**
 * In-process transport to an object host.
 *
 * Requests still travel as serialized bytes, so everything above the socket
 * behaves as it does over TCP. Useful for embedding a runtime in the same
 * process and as a test stand-in.
 *
 * @module transport/loopback-transport
 */

import { ConnectionError } from '../types.js';
import type { ObjectHost } from '../runtime/object-host.js';
import type { Transport } from './transport.js';

let loopbackCounter = 0;

/**
 * Transport that hands request bytes straight to an `ObjectHost`.
 *
 * @example
 * ```typescript
 * const transport = new LoopbackTransport(host);
 * const connection = await Bridge.open(transport);
 *
 * // Simulate the channel dying mid-call
 * transport.sever('runtime crashed');
 * ```
 */
export class LoopbackTransport implements Transport {
  readonly endpoint: string;

  private connected = false;
  private readonly inFlight = new Set<(error: Error) => void>();

  constructor(private readonly host: ObjectHost) {
    this.endpoint = `loopback://${++loopbackCounter}`;
  }

  connect(): Promise<void> {
    this.connected = true;
    return Promise.resolve();
  }

  isConnected(): boolean {
    return this.connected;
  }

  request(payload: Buffer): Promise<Buffer> {
    if (!this.connected) {
      return Promise.reject(new ConnectionError(this.endpoint, 'not connected'));
    }

    return new Promise((resolve, reject) => {
      this.inFlight.add(reject);

      void this.host.handle(Buffer.from(payload)).then(
        (response) => {
          if (this.inFlight.delete(reject)) {
            resolve(Buffer.from(response));
          }
        },
        (error: unknown) => {
          if (this.inFlight.delete(reject)) {
            reject(error instanceof Error ? error : new Error(String(error)));
          }
        },
      );
    });
  }

  disconnect(): Promise<void> {
    this.fail('transport disconnected');
    return Promise.resolve();
  }

  /**
   * Breaks the channel: the transport disconnects and every request in
   * flight fails. The host may or may not have executed those requests.
   */
  sever(reason = 'channel severed'): void {
    this.fail(reason);
  }

  /**
   * Number of requests awaiting a response.
   */
  get pendingCount(): number {
    return this.inFlight.size;
  }

  private fail(reason: string): void {
    this.connected = false;
    const rejecters = Array.from(this.inFlight);
    this.inFlight.clear();
    for (const reject of rejecters) {
      reject(new ConnectionError(this.endpoint, reason));
    }
  }
}
