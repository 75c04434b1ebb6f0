import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Bridge } from '../../src/connection/bridge.js';
import type { Connection } from '../../src/connection/connection.js';
import { ReferenceRegistry } from '../../src/connection/reference-registry.js';
import type { EncodedReference } from '../../src/types.js';
import { createTestRuntime } from '../fixtures/runtime.js';
import { referenceResult } from '../fixtures/scripted-transport.js';

function encoded(handle: string, className = 'x.Widget'): EncodedReference {
  const result = referenceResult(handle, className);
  if (result.kind !== 'reference') throw new Error('expected a reference result');
  return result.reference;
}

describe('ReferenceRegistry', () => {
  let connection: Connection;
  let registry: ReferenceRegistry;

  beforeEach(async () => {
    connection = await Bridge.open(createTestRuntime().transport());
    registry = new ReferenceRegistry(connection);
  });

  afterEach(async () => {
    await connection.close();
  });

  it('interns references by handle', () => {
    const first = registry.register(encoded('h1'));
    const second = registry.register(encoded('h1'));

    expect(second).toBe(first);
    expect(registry.size).toBe(1);
  });

  it('creates distinct references for distinct handles', () => {
    const a = registry.register(encoded('h1'));
    const b = registry.register(encoded('h2'));

    expect(a).not.toBe(b);
    expect(a.equals(b)).toBe(false);
    expect(registry.holds(a)).toBe(true);
    expect(registry.holds(b)).toBe(true);
  });

  it('releases one reference', () => {
    const a = registry.register(encoded('h1'));

    expect(registry.release(a)).toBe(true);
    expect(registry.release(a)).toBe(false);
    expect(registry.holds(a)).toBe(false);
  });

  it('issues a fresh reference for a handle seen again after release', () => {
    const a = registry.register(encoded('h1'));
    registry.release(a);

    const again = registry.register(encoded('h1'));

    expect(again).not.toBe(a);
    expect(again.equals(a)).toBe(true);
  });

  it('invalidates everything at once', () => {
    registry.register(encoded('h1'));
    registry.register(encoded('h2'));

    expect(registry.invalidateAll()).toBe(2);
    expect(registry.isInvalidated()).toBe(true);
    expect(registry.size).toBe(0);
    expect(() => registry.register(encoded('h3'))).toThrow(
      `Reference registry of connection '${connection.id}' was invalidated`,
    );
  });
});
