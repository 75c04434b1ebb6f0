import { describe, it, expect } from 'vitest';
import { CallQueue } from '../../src/connection/call-queue.js';

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('CallQueue', () => {
  it('runs tasks one at a time in submission order', async () => {
    const queue = new CallQueue();
    const log: string[] = [];
    const gate = deferred<void>();

    const first = queue.run(async () => {
      log.push('first:start');
      await gate.promise;
      log.push('first:end');
      return 1;
    });
    const second = queue.run(async () => {
      log.push('second');
      return 2;
    });

    await Promise.resolve();
    expect(log).toEqual(['first:start']);
    expect(queue.size).toBe(2);

    gate.resolve();

    expect(await first).toBe(1);
    expect(await second).toBe(2);
    expect(log).toEqual(['first:start', 'first:end', 'second']);
    expect(queue.size).toBe(0);
  });

  it('keeps going after a task rejects', async () => {
    const queue = new CallQueue();

    const failing = queue.run(() => Promise.reject(new Error('boom')));
    const next = queue.run(() => Promise.resolve('after'));

    await expect(failing).rejects.toThrow('boom');
    expect(await next).toBe('after');
  });
});
