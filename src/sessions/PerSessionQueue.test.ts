/**
 * PerSessionQueue Unit Tests
 *
 * Tests for per-session ordering, independence between sessions, and
 * error propagation.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { PerSessionQueue } from './PerSessionQueue.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('PerSessionQueue', () => {
  let queue: PerSessionQueue;

  beforeEach(() => {
    queue = new PerSessionQueue(2); // Small size for testing
  });

  it('should run tasks of one session in submission order', async () => {
    const order: string[] = [];
    const gate = deferred();

    const first = queue.run('s1', async () => {
      await gate.promise;
      order.push('first');
      return 1;
    });
    const second = queue.run('s1', async () => {
      order.push('second');
      return 2;
    });

    expect(queue.size('s1')).toBe(2);
    gate.resolve();

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(order).toEqual(['first', 'second']);
  });

  it('should not block other sessions', async () => {
    const gate = deferred();
    const blocked = queue.run('s1', () => gate.promise);

    await expect(queue.run('s2', async () => 'done')).resolves.toBe('done');
    expect(queue.isProcessing('s1')).toBe(true);

    gate.resolve();
    await blocked;
    expect(queue.isProcessing('s1')).toBe(false);
  });

  it('should pass a rejection to its caller and keep going', async () => {
    const failing = queue.run('s1', async () => {
      throw new Error('boom');
    });
    const next = queue.run('s1', async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('should reject when too many tasks are pending', async () => {
    const gate = deferred();
    const a = queue.run('s1', () => gate.promise);
    const b = queue.run('s1', async () => undefined);

    await expect(queue.run('s1', async () => undefined)).rejects.toThrow('Too many pending tasks for session s1');

    gate.resolve();
    await Promise.all([a, b]);
    expect(queue.getStats()).toEqual({ sessions: 0, totalTasks: 0 });
  });

  it('should drain queued work', async () => {
    const order: string[] = [];
    void queue.run('s1', async () => {
      order.push('task');
    });

    await queue.drain('s1');

    expect(order).toEqual(['task']);
  });
});
