/**
 * Opaque handle to an object living inside the remote runtime.
 *
 * @module reference/remote-reference
 */

import type { ConnectionId, HandleToken } from '../types.js';
import type { Connection } from '../connection/connection.js';

/**
 * Anything that can name the connection it belongs to.
 *
 * Implemented by connections themselves, references and every view, so
 * wrapper code can always get back to a connection.
 */
export interface HasOwningConnection {
  owningConnection(): Connection;
}

/**
 * Handle naming one object (or class) inside the remote runtime.
 *
 * References are created only by their connection's registry, as the result
 * of a constructor, method or static call. Identity is the pair
 * (connection id, handle token); the token itself is never exposed.
 *
 * A reference holds its connection for lookup only. It becomes invalid when
 * released or when the connection is closed; using it afterwards fails.
 */
export class RemoteReference implements HasOwningConnection {
  private readonly token: HandleToken;
  private readonly connection: Connection;

  /**
   * @internal Created by `ReferenceRegistry`.
   */
  constructor(
    connection: Connection,
    token: HandleToken,
    readonly className: string,
    readonly classification: string,
  ) {
    this.connection = connection;
    this.token = token;
  }

  /**
   * Id of the owning connection.
   */
  get connectionId(): ConnectionId {
    return this.connection.id;
  }

  owningConnection(): Connection {
    return this.connection;
  }

  /**
   * Whether the reference can still be used in a call.
   */
  isValid(): boolean {
    return this.connection.isOpen() && this.connection._holds(this);
  }

  /**
   * Two references are equal when they name the same handle on the same
   * connection.
   */
  equals(other: RemoteReference): boolean {
    return this.connection.id === other.connection.id && this.token === other.token;
  }

  toString(): string {
    return `<${this.className}#${this.connection.id}>`;
  }

  /**
   * @internal Reads the handle token for encoding.
   */
  static _tokenOf(reference: RemoteReference): HandleToken {
    return reference.token;
  }
}
