import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Bridge } from '../../src/connection/bridge.js';
import type { Connection } from '../../src/connection/connection.js';
import { invoke, invokeNew } from '../../src/invocation/invoke.js';
import { RemoteReference } from '../../src/reference/remote-reference.js';
import {
  ExecutionContextView,
  TabularDataView,
  asView,
  owningConnection,
  underlying,
} from '../../src/reference/views.js';
import { TypeMismatchError } from '../../src/types.js';
import { createTestRuntime } from '../fixtures/runtime.js';

describe('specialized views', () => {
  let connection: Connection;
  let session: RemoteReference;

  beforeEach(async () => {
    connection = await Bridge.open(createTestRuntime().transport());
    const entry = connection.entryPoint;
    if (!entry) throw new Error('entry point missing');
    session = entry;
  });

  afterEach(async () => {
    await connection.close();
  });

  async function flights(): Promise<RemoteReference> {
    const table = await invoke(session, 'table', 'flights');
    if (!(table instanceof RemoteReference)) throw new Error('expected a reference');
    return table;
  }

  describe('asView', () => {
    it('wraps a reference of the matching classification', async () => {
      const table = await flights();

      const view = asView(table, TabularDataView);

      expect(view).toBeInstanceOf(TabularDataView);
      expect(underlying(view)).toBe(table);
    });

    it('rejects a reference of another classification', async () => {
      const table = await flights();

      expect(() => asView(table, ExecutionContextView)).toThrow(TypeMismatchError);
      expect(() => asView(table, ExecutionContextView)).toThrow(
        `Cannot view ${table.toString()} as ExecutionContextView: expected 'execution-context' but got 'tabular-data'`,
      );
    });

    it('passes a view as a call argument by its underlying reference', async () => {
      const view = asView(await flights(), TabularDataView);
      const list = await invokeNew(connection, 'java.util.ArrayList');

      await invoke(list, 'add', view);

      expect(await invoke(list, 'get', 0)).toBe(underlying(view));
    });

    it('rejects a plain object reference', async () => {
      const list = await invokeNew(connection, 'java.util.ArrayList');

      expect(() => asView(list, TabularDataView)).toThrow(TypeMismatchError);
    });
  });

  describe('calls through a view', () => {
    it('invokes methods on the wrapped reference', async () => {
      const context = asView(session, ExecutionContextView);

      expect(await invoke(context, 'version')).toBe('3.5.0');
    });

    it('returns the same remote object for repeated lookups', async () => {
      const context = asView(session, ExecutionContextView);

      const first = await invoke(context, 'table', 'flights');
      const second = await invoke(context, 'table', 'flights');

      expect(second).toBe(first);
    });

    it('reaches the tabular data methods', async () => {
      const data = asView(await flights(), TabularDataView);

      expect(await invoke(data, 'count')).toBe(42);
      expect(await invoke(data, 'columns')).toEqual(['origin', 'destination', 'delay']);
    });
  });

  describe('owningConnection', () => {
    it('resolves from a connection, a reference and a view', async () => {
      const table = await flights();
      const view = asView(table, TabularDataView);

      expect(owningConnection(connection)).toBe(connection);
      expect(owningConnection(table)).toBe(connection);
      expect(owningConnection(view)).toBe(connection);
    });
  });

  describe('validity', () => {
    it('follows the wrapped reference', async () => {
      const view = asView(await flights(), TabularDataView);

      await connection.close();

      expect(underlying(view).isValid()).toBe(false);
      expect(view.toString()).toBe(`<runtime.Dataset#${connection.id}>`);
    });
  });
});
