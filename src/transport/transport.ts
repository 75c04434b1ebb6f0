/**
 * Transport contract the bridge needs from a channel to a remote runtime.
 *
 * @module transport/transport
 */

/**
 * A reliable, ordered request/response channel.
 *
 * The bridge hands over serialized request envelopes and expects the
 * serialized response envelope back. Transports neither retry nor reorder.
 * A failed request rejects; if the channel itself is gone afterwards,
 * `isConnected()` reports false.
 */
export interface Transport {
  /** Human-readable channel name used in diagnostics */
  readonly endpoint: string;

  connect(): Promise<void>;

  request(payload: Buffer): Promise<Buffer>;

  disconnect(): Promise<void>;

  isConnected(): boolean;
}
