/**
 * Specialized views over remote references.
 *
 * A view is a remote reference with a known classification, so domain
 * wrappers can accept e.g. only tabular data. Conversion is structural: the
 * view wraps the very same reference and never copies remote state.
 *
 * @module reference/views
 */

import { Classification, TypeMismatchError } from '../types.js';
import type { Connection } from '../connection/connection.js';
import type { HasOwningConnection, RemoteReference } from './remote-reference.js';

/**
 * Base class of every view.
 */
export abstract class SpecializedView implements HasOwningConnection {
  constructor(readonly reference: RemoteReference) {}

  owningConnection(): Connection {
    return this.reference.owningConnection();
  }

  toString(): string {
    return this.reference.toString();
  }
}

/**
 * View over a remote execution context (the runtime's session-level object).
 */
export class ExecutionContextView extends SpecializedView {
  static readonly classification: string = Classification.EXECUTION_CONTEXT;
}

/**
 * View over a remote tabular dataset.
 */
export class TabularDataView extends SpecializedView {
  static readonly classification: string = Classification.TABULAR_DATA;
}

/**
 * Constructor of a view type together with the classification it accepts.
 */
export interface ViewType<V extends SpecializedView> {
  readonly classification: string;
  readonly name: string;
  new (reference: RemoteReference): V;
}

/**
 * Wraps a reference in a view after checking its classification.
 *
 * @throws {TypeMismatchError} If the reference's classification differs
 *
 * @example
 * ```typescript
 * const df = asView(await invoke(session, 'table', 'flights'), TabularDataView);
 * ```
 */
export function asView<V extends SpecializedView>(reference: RemoteReference, type: ViewType<V>): V {
  if (reference.classification !== type.classification) {
    throw new TypeMismatchError(
      `Cannot view ${reference.toString()} as ${type.name}`,
      type.classification,
      reference.classification,
    );
  }
  return new type(reference);
}

/**
 * Returns the reference a view wraps.
 */
export function underlying(view: SpecializedView): RemoteReference {
  return view.reference;
}

/**
 * Returns the connection owning a connection, reference or view.
 */
export function owningConnection(source: HasOwningConnection): Connection {
  return source.owningConnection();
}
