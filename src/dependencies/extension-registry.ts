/**
 * In-process registry of extension modules.
 *
 * @module dependencies/extension-registry
 *
 * @example
 * ```typescript
 * const extensions = new ExtensionRegistry();
 * extensions.register('spatial', spatialExtension);
 * extensions.register('ml', { dependencyProvider: mlDependencies });
 *
 * const manifest = extensions.manifest();
 * ```
 */

import { ModuleLookupError } from '../types.js';
import { dependenciesForAll, type ModuleResolver } from './aggregator.js';
import type { DependencyManifest } from './declaration.js';

/**
 * Extensions registered by name, kept in registration order.
 */
export class ExtensionRegistry implements ModuleResolver {
  private readonly modules = new Map<string, unknown>();

  /**
   * @throws {Error} If the name is empty or already registered
   */
  register(name: string, module: unknown): void {
    if (!name) {
      throw new Error('Extension name must be a non-empty string');
    }

    if (this.modules.has(name)) {
      throw new Error(`Extension '${name}' is already registered`);
    }

    this.modules.set(name, module);
  }

  unregister(name: string): boolean {
    return this.modules.delete(name);
  }

  has(name: string): boolean {
    return this.modules.has(name);
  }

  names(): readonly string[] {
    return Array.from(this.modules.keys());
  }

  /**
   * @throws {ModuleLookupError} If no extension has that name
   */
  resolve(name: string): unknown {
    if (!this.modules.has(name)) {
      throw new ModuleLookupError(name);
    }
    return this.modules.get(name);
  }

  /**
   * Dependencies of every registered extension, in registration order.
   */
  manifest(): DependencyManifest {
    return dependenciesForAll(this.names(), this);
  }
}
