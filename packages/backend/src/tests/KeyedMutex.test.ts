import { KeyedMutex } from '../services/tracking/utils/KeyedMutex';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(done => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  test('work for the same key runs one at a time, in order', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.runExclusive('subject-1', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.runExclusive('subject-1', async () => {
      order.push('second');
    });

    await new Promise(resolve => setImmediate(resolve));
    expect(order).toEqual(['first:start']);
    expect(mutex.isLocked('subject-1')).toBe(true);

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.isLocked('subject-1')).toBe(false);
  });

  test('different keys do not wait on each other', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();

    const blocked = mutex.runExclusive('subject-1', () => gate.promise);
    const result = await mutex.runExclusive('subject-2', async () => 'done');

    expect(result).toBe('done');
    gate.resolve();
    await blocked;
  });

  test('a failing holder releases the lock', async () => {
    const mutex = new KeyedMutex();

    await expect(mutex.runExclusive('subject-1', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(mutex.runExclusive('subject-1', async () => 42)).resolves.toBe(42);
    expect(mutex.isLocked('subject-1')).toBe(false);
  });
});
