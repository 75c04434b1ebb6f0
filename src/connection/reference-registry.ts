/**
 * Per-connection arena of remote references.
 *
 * @module connection/reference-registry
 */

import type { EncodedReference, HandleToken } from '../types.js';
import { RemoteReference } from '../reference/remote-reference.js';
import type { Connection } from './connection.js';

/**
 * Arena of the references issued on one connection, keyed by handle token.
 *
 * The same token always yields the same reference instance. Tokens are
 * invalidated en masse on teardown rather than tracked one by one.
 */
export class ReferenceRegistry {
  private readonly references = new Map<HandleToken, RemoteReference>();
  private invalidated = false;

  constructor(private readonly connection: Connection) {}

  /**
   * Returns the reference for an encoded handle, creating it on first sight.
   *
   * @throws {Error} If the registry was already invalidated
   */
  register(encoded: EncodedReference): RemoteReference {
    if (this.invalidated) {
      throw new Error(`Reference registry of connection '${this.connection.id}' was invalidated`);
    }

    const existing = this.references.get(encoded.handle);
    if (existing) {
      return existing;
    }

    const reference = new RemoteReference(
      this.connection,
      encoded.handle,
      encoded.className,
      encoded.classification,
    );
    this.references.set(encoded.handle, reference);
    return reference;
  }

  /**
   * Whether this exact reference is live in the arena.
   */
  holds(reference: RemoteReference): boolean {
    return this.references.get(RemoteReference._tokenOf(reference)) === reference;
  }

  /**
   * Removes one reference.
   *
   * @returns true if the reference was live and is now released
   */
  release(reference: RemoteReference): boolean {
    if (!this.holds(reference)) {
      return false;
    }
    return this.references.delete(RemoteReference._tokenOf(reference));
  }

  /**
   * Drops every reference and refuses new ones.
   *
   * @returns Number of references invalidated
   */
  invalidateAll(): number {
    const count = this.references.size;
    this.references.clear();
    this.invalidated = true;
    return count;
  }

  isInvalidated(): boolean {
    return this.invalidated;
  }

  get size(): number {
    return this.references.size;
  }
}
