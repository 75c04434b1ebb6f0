import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { dependenciesFor, dependenciesForAll } from '../../src/dependencies/aggregator.js';
import { EMPTY_DECLARATION } from '../../src/dependencies/declaration.js';
import { NodeModuleResolver } from '../../src/dependencies/node-module-resolver.js';
import { InvalidDeclarationError, ModuleLookupError } from '../../src/types.js';

const extensionsDir = fileURLToPath(new URL('../fixtures/extensions/', import.meta.url));

describe('NodeModuleResolver', () => {
  const resolver = new NodeModuleResolver(extensionsDir);

  it('loads modules relative to its base directory', () => {
    expect(resolver.resolve('./plain.cjs')).toEqual({ answer: 42 });
  });

  it('fails with ModuleLookupError for a missing module', () => {
    expect(() => resolver.resolve('./missing.cjs')).toThrow(ModuleLookupError);
    expect(() => resolver.resolve('./missing.cjs')).toThrow(/^Extension module '\.\/missing\.cjs' could not be resolved: /);
  });

  it('feeds the aggregator', () => {
    expect(dependenciesFor('./spatial.cjs', resolver)).toEqual({
      jars: ['lib/spatial-core.jar'],
      packages: ['org.example:spatial:2.1.0'],
      repositories: [],
    });
    expect(dependenciesFor('./plain.cjs', resolver)).toBe(EMPTY_DECLARATION);
  });

  it('combines several modules in order', () => {
    expect(dependenciesForAll(['./provider-member.cjs', './plain.cjs', './spatial.cjs'], resolver)).toEqual({
      modules: ['./provider-member.cjs', './plain.cjs', './spatial.cjs'],
      jars: ['lib/ml.jar', 'lib/spatial-core.jar'],
      packages: ['org.example:spatial:2.1.0'],
      repositories: ['https://repo.example.org/maven'],
    });
  });

  it('reports a malformed declaration', () => {
    expect(() => dependenciesFor('./broken.cjs', resolver)).toThrow(InvalidDeclarationError);
  });
});
