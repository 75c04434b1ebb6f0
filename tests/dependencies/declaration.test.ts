import { describe, it, expect } from 'vitest';
import { EMPTY_DECLARATION, declareDependencies, parseDeclaration } from '../../src/dependencies/declaration.js';
import { InvalidDeclarationError } from '../../src/types.js';

describe('declareDependencies', () => {
  it('returns the shared empty declaration when nothing is declared', () => {
    expect(declareDependencies()).toBe(EMPTY_DECLARATION);
    expect(declareDependencies({ jars: [] })).toBe(EMPTY_DECLARATION);
    expect(EMPTY_DECLARATION).toEqual({ jars: [], packages: [], repositories: [] });
  });

  it('fills in omitted lists', () => {
    expect(declareDependencies({ jars: ['lib/a.jar'] })).toEqual({
      jars: ['lib/a.jar'],
      packages: [],
      repositories: [],
    });
  });

  it('freezes the declaration and its lists', () => {
    const declaration = declareDependencies({ packages: ['org.example:a:1.0'] });

    expect(Object.isFrozen(declaration)).toBe(true);
    expect(Object.isFrozen(declaration.packages)).toBe(true);
  });

  it('copies the input lists', () => {
    const jars = ['lib/a.jar'];
    const declaration = declareDependencies({ jars });

    jars.push('lib/b.jar');

    expect(declaration.jars).toEqual(['lib/a.jar']);
  });

  it('rejects empty entries', () => {
    expect(() => declareDependencies({ jars: [''] })).toThrow(
      "Invalid dependency declaration from 'declareDependencies': jars.0: entries must be non-empty strings",
    );
  });
});

describe('parseDeclaration', () => {
  it('rejects a list of the wrong type', () => {
    expect(() => parseDeclaration({ jars: 'lib/a.jar' }, 'spatial')).toThrow(
      "Invalid dependency declaration from 'spatial': jars: Expected array, received string",
    );
  });

  it('rejects unknown keys', () => {
    expect(() => parseDeclaration({ jars: [], natives: ['x.so'] }, 'spatial')).toThrow(InvalidDeclarationError);
  });

  it('rejects values that are not objects', () => {
    expect(() => parseDeclaration(null, 'spatial')).toThrow(
      "Invalid dependency declaration from 'spatial': Expected object, received null",
    );
  });
});
