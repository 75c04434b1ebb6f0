/**
 * Resolves extension modules through Node's module loader.
 *
 * @module dependencies/node-module-resolver
 */

import { createRequire } from 'node:module';
import * as path from 'node:path';

import { ModuleLookupError } from '../types.js';
import type { ModuleResolver } from './aggregator.js';

/**
 * Loads extensions with `require`, relative to a base directory.
 *
 * Names are installed package names or paths relative to the base
 * directory. Only CommonJS modules, and ES modules Node can require, load.
 */
export class NodeModuleResolver implements ModuleResolver {
  private readonly load: NodeJS.Require;

  constructor(readonly baseDir: string = process.cwd()) {
    // createRequire needs a file path; the file does not have to exist
    this.load = createRequire(path.join(path.resolve(baseDir), '__resolver__.js'));
  }

  /**
   * @throws {ModuleLookupError} If the module cannot be found or fails to load
   */
  resolve(name: string): unknown {
    try {
      const loaded: unknown = this.load(name);
      return loaded;
    } catch (error) {
      throw new ModuleLookupError(name, error instanceof Error ? error : new Error(String(error)));
    }
  }
}
