/**
 * Dependency declarations published by extension modules.
 *
 * @module dependencies/declaration
 */

import { z } from 'zod';

import { InvalidDeclarationError } from '../types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Native dependencies one extension needs the remote runtime to load.
 */
export interface DependencyDeclaration {
  /** Archive paths added to the runtime's class path */
  readonly jars: readonly string[];

  /** Package coordinates resolved by the runtime at startup */
  readonly packages: readonly string[];

  /** Package repositories consulted when resolving `packages` */
  readonly repositories: readonly string[];
}

/**
 * Input accepted by `declareDependencies`; every list is optional.
 */
export interface DependencyDeclarationInput {
  readonly jars?: readonly string[];
  readonly packages?: readonly string[];
  readonly repositories?: readonly string[];
}

/**
 * Combined dependencies of several extensions, with the modules they came from.
 */
export interface DependencyManifest extends DependencyDeclaration {
  readonly modules: readonly string[];
}

// =============================================================================
// Validation
// =============================================================================

const entryListSchema = z.array(z.string().min(1, 'entries must be non-empty strings')).default([]);

const declarationSchema = z
  .object({
    jars: entryListSchema,
    packages: entryListSchema,
    repositories: entryListSchema,
  })
  .strict();

function freeze(jars: readonly string[], packages: readonly string[], repositories: readonly string[]): DependencyDeclaration {
  return Object.freeze({
    jars: Object.freeze([...jars]),
    packages: Object.freeze([...packages]),
    repositories: Object.freeze([...repositories]),
  });
}

/**
 * The declaration of a module with no dependencies.
 */
export const EMPTY_DECLARATION: DependencyDeclaration = freeze([], [], []);

/**
 * Validates an untrusted value as a declaration and freezes it.
 *
 * @param source - Where the value came from, used in error messages
 * @throws {InvalidDeclarationError} If the value is not a declaration
 */
export function parseDeclaration(value: unknown, source: string): DependencyDeclaration {
  const parsed = declarationSchema.safeParse(value);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new InvalidDeclarationError(source, reason);
  }

  const { jars, packages, repositories } = parsed.data;
  if (jars.length === 0 && packages.length === 0 && repositories.length === 0) {
    return EMPTY_DECLARATION;
  }
  return freeze(jars, packages, repositories);
}

/**
 * Builds a frozen declaration. Omitted lists are empty.
 *
 * @throws {InvalidDeclarationError} If an entry is empty
 *
 * @example
 * ```typescript
 * export function dependencies() {
 *   return declareDependencies({
 *     jars: ['lib/spatial-core.jar'],
 *     packages: ['org.example:spatial:2.1.0'],
 *   });
 * }
 * ```
 */
export function declareDependencies(input: DependencyDeclarationInput = {}): DependencyDeclaration {
  return parseDeclaration(input, 'declareDependencies');
}
