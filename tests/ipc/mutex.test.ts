import { describe, it, expect } from 'vitest';
import { Mutex } from '../../src/ipc/mutex.js';

describe('Mutex', () => {
  it('should start unlocked', () => {
    expect(new Mutex().isLocked()).toBe(false);
  });

  it('should lock on acquire and unlock on release', async () => {
    const mutex = new Mutex();
    await mutex.acquire();
    expect(mutex.isLocked()).toBe(true);
    mutex.release();
    expect(mutex.isLocked()).toBe(false);
  });

  it('should throw when releasing an unlocked mutex', () => {
    expect(() => new Mutex().release()).toThrow('Cannot release an unlocked mutex.');
  });

  it('should run exclusive sections one at a time, in call order', async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    const section = (name: string, delay: number) =>
      mutex.runExclusive(async () => {
        events.push(`${name}:start`);
        await new Promise((resolve) => setTimeout(resolve, delay));
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([section('a', 30), section('b', 10), section('c', 0)]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
    expect(mutex.isLocked()).toBe(false);
  });

  it('should drop a queued waiter whose signal aborts', async () => {
    const mutex = new Mutex();
    const controller = new AbortController();
    const order: string[] = [];

    await mutex.acquire();
    const aborted = mutex.acquire(controller.signal);
    const next = mutex.acquire().then(() => order.push('next'));

    controller.abort(new Error('gave up'));
    await expect(aborted).rejects.toThrow('gave up');

    mutex.release();
    await next;
    expect(order).toEqual(['next']);
    mutex.release();
    expect(mutex.isLocked()).toBe(false);
  });

  it('should reject at once when the signal is already aborted', async () => {
    const mutex = new Mutex();
    const controller = new AbortController();
    controller.abort(new Error('too late'));

    await expect(mutex.acquire(controller.signal)).rejects.toThrow('too late');
    expect(mutex.isLocked()).toBe(false);
  });

  it('should release the lock when the callback throws', async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(mutex.isLocked()).toBe(false);
    await expect(mutex.runExclusive(async () => 'next')).resolves.toBe('next');
  });
});
