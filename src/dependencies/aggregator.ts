/**
 * Collects the native dependencies declared by extension modules.
 *
 * A module takes part by exposing a `dependencies()` function, either
 * directly, through a `dependencyProvider` member or on its default export.
 * Modules that expose none contribute nothing; that is not an error.
 *
 * @module dependencies/aggregator
 */

import { ModuleLookupError } from '../types.js';
import {
  EMPTY_DECLARATION,
  parseDeclaration,
  type DependencyDeclaration,
  type DependencyManifest,
} from './declaration.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Capability of an extension that needs native dependencies.
 */
export interface DependencyProvider {
  dependencies(): DependencyDeclaration;
}

/**
 * Finds an extension module by name.
 */
export interface ModuleResolver {
  /**
   * @throws {ModuleLookupError} If no module has that name
   */
  resolve(name: string): unknown;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Type guard for DependencyProvider.
 */
export function isDependencyProvider(value: unknown): value is DependencyProvider {
  if ((typeof value !== 'object' && typeof value !== 'function') || value === null) {
    return false;
  }
  return typeof Reflect.get(value, 'dependencies') === 'function';
}

function member(value: unknown, key: string): unknown {
  if ((typeof value !== 'object' && typeof value !== 'function') || value === null) {
    return undefined;
  }
  return Reflect.get(value, key);
}

function findProvider(module: unknown): DependencyProvider | undefined {
  const candidates = [module, member(module, 'dependencyProvider'), member(module, 'default')];
  return candidates.find(isDependencyProvider);
}

function resolveModule(name: string, resolver: ModuleResolver): unknown {
  try {
    return resolver.resolve(name);
  } catch (error) {
    if (error instanceof ModuleLookupError) {
      throw error;
    }
    throw new ModuleLookupError(name, error instanceof Error ? error : new Error(String(error)));
  }
}

// =============================================================================
// Aggregation
// =============================================================================

/**
 * Dependencies declared by one module.
 *
 * @throws {ModuleLookupError} If the module cannot be resolved
 * @throws {InvalidDeclarationError} If its provider returns something that is not a declaration
 */
export function dependenciesFor(name: string, resolver: ModuleResolver): DependencyDeclaration {
  const module = resolveModule(name, resolver);
  const provider = findProvider(module);
  if (!provider) {
    return EMPTY_DECLARATION;
  }
  return parseDeclaration(provider.dependencies(), name);
}

/**
 * Dependencies of several modules, concatenated in the order given.
 * Duplicate entries are kept.
 *
 * @throws {ModuleLookupError} If any module cannot be resolved
 */
export function dependenciesForAll(names: Iterable<string>, resolver: ModuleResolver): DependencyManifest {
  const modules: string[] = [];
  const jars: string[] = [];
  const packages: string[] = [];
  const repositories: string[] = [];

  for (const name of names) {
    const declaration = dependenciesFor(name, resolver);
    modules.push(name);
    jars.push(...declaration.jars);
    packages.push(...declaration.packages);
    repositories.push(...declaration.repositories);
  }

  return { modules, jars, packages, repositories };
}
