import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../../src/infrastructure/memory/keyed-mutex.js';
import { deferred } from '../helpers.js';

/** Lets every queued microtask run. */
function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe('KeyedMutex', () => {
  it('runs work on the same key one at a time', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.runExclusive(['project:P-1'], async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.runExclusive(['project:P-1'], async () => {
      order.push('second');
    });

    await flush();
    expect(order).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not make different keys wait', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    let otherRan = false;

    const blocked = mutex.runExclusive(['project:P-1'], () => gate.promise);
    await mutex.runExclusive(['project:P-2'], async () => {
      otherRan = true;
    });

    expect(otherRan).toBe(true);
    gate.resolve();
    await blocked;
  });

  it('takes overlapping key sets in one global order', async () => {
    const mutex = new KeyedMutex();
    const results: string[] = [];

    await Promise.all([
      mutex.runExclusive(['project:P-1', 'issue:I-1'], async () => {
        results.push('a');
      }),
      mutex.runExclusive(['issue:I-1', 'project:P-1'], async () => {
        results.push('b');
      }),
    ]);

    expect(results).toEqual(['a', 'b']);
  });

  it('releases keys when work throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive(['issue:I-1'], async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(mutex.size).toBe(0);
    await expect(mutex.runExclusive(['issue:I-1'], async () => 'ok')).resolves.toBe('ok');
  });

  it('forgets keys once nobody holds them', async () => {
    const mutex = new KeyedMutex();
    await mutex.runExclusive(['a', 'b', 'a'], async () => {
      expect(mutex.size).toBe(2);
    });
    expect(mutex.size).toBe(0);
  });
});
