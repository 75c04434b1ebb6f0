/**
 * Registry of classes a runtime exposes to remote callers.
 *
 * Constructor and static calls name a class; the object host looks the
 * class up here. Instance calls need no registration: any method of a hosted
 * object can be called.
 *
 * @module runtime/class-registry
 *
 * @example
 * ```typescript
 * const classes = new ClassRegistry();
 * classes.register(defineClass('util.Counter', Counter));
 * classes.register({
 *   name: 'session.Tables',
 *   classification: Classification.TABULAR_DATA,
 *   instanceOf: (value) => value instanceof Table,
 * });
 * ```
 */

import { Classification } from '../types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * How a runtime class is created, called statically and recognized.
 */
export interface RuntimeClassDefinition {
  /** Fully-qualified class name used on the wire */
  readonly name: string;

  /** Classification reported for instances; `'object'` when absent */
  readonly classification?: string;

  /** Creates an instance; absent when the class cannot be constructed */
  readonly construct?: (args: readonly unknown[]) => unknown;

  /** Holder of static members, looked up by method name */
  readonly statics?: object;

  /** Recognizes instances returned by methods */
  readonly instanceOf?: (value: object) => boolean;
}

/**
 * Constructor of a class exposed through `defineClass`.
 */
export type RuntimeConstructor = new (...args: never[]) => object;

/**
 * Statistics about a class registry.
 */
export interface ClassRegistryStats {
  readonly count: number;
  readonly names: readonly string[];
}

/**
 * Class name and classification of a hosted object.
 */
export interface ObjectDescriptor {
  readonly className: string;
  readonly classification: string;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Builds a definition from a JavaScript class: constructor calls map to
 * `new`, static calls to the class's static methods.
 */
export function defineClass(
  name: string,
  type: RuntimeConstructor,
  options: { readonly classification?: string } = {},
): RuntimeClassDefinition {
  return {
    name,
    classification: options.classification ?? Classification.OBJECT,
    construct: (args) => Reflect.construct(type, args),
    statics: type,
    instanceOf: (value) => value instanceof type,
  };
}

function constructorName(value: object): string {
  const ctor: unknown = Reflect.get(value, 'constructor');
  if (typeof ctor === 'function' && ctor.name) {
    return ctor.name;
  }
  return 'Object';
}

// =============================================================================
// ClassRegistry
// =============================================================================

/**
 * Runtime-side class table.
 */
export class ClassRegistry {
  private readonly classes = new Map<string, RuntimeClassDefinition>();

  /**
   * Registers a class definition.
   *
   * @throws {Error} If the name is empty or already registered
   */
  register(definition: RuntimeClassDefinition): void {
    if (!definition.name) {
      throw new Error('Class name must be a non-empty string');
    }

    if (this.classes.has(definition.name)) {
      throw new Error(`Class '${definition.name}' is already registered`);
    }

    this.classes.set(definition.name, definition);
  }

  get(name: string): RuntimeClassDefinition | undefined {
    return this.classes.get(name);
  }

  has(name: string): boolean {
    return this.classes.has(name);
  }

  unregister(name: string): boolean {
    return this.classes.delete(name);
  }

  getNames(): readonly string[] {
    return Array.from(this.classes.keys());
  }

  getStats(): ClassRegistryStats {
    return {
      count: this.classes.size,
      names: Array.from(this.classes.keys()),
    };
  }

  /**
   * Describes an object: the first registered class recognizing it wins,
   * otherwise its JavaScript constructor name with the generic classification.
   */
  describe(value: object): ObjectDescriptor {
    for (const definition of this.classes.values()) {
      if (definition.instanceOf?.(value)) {
        return {
          className: definition.name,
          classification: definition.classification ?? Classification.OBJECT,
        };
      }
    }
    return { className: constructorName(value), classification: Classification.OBJECT };
  }
}
