import { describe, expect, it } from 'vitest';
import { AsyncMutex } from './mutex.js';

const tick = () => new Promise<void>(resolve => setImmediate(resolve));

describe('AsyncMutex', () => {
  it('runs critical sections one at a time in arrival order', async () => {
    const mutex = new AsyncMutex();
    const events: string[] = [];

    const section = (name: string) => mutex.runExclusive(async () => {
      events.push(`${name}:enter`);
      await tick();
      events.push(`${name}:leave`);
      return name;
    });

    const results = await Promise.all([section('a'), section('b'), section('c')]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:enter', 'a:leave', 'b:enter', 'b:leave', 'c:enter', 'c:leave']);
  });

  it('releases the lock when a section throws', async () => {
    const mutex = new AsyncMutex();

    await expect(mutex.runExclusive(() => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(mutex.runExclusive(() => 'after')).resolves.toBe('after');
    expect(mutex.isLocked()).toBe(false);
  });

  it('reports whether the lock is held or awaited', async () => {
    const mutex = new AsyncMutex();
    const release = await mutex.acquire();
    expect(mutex.isLocked()).toBe(true);

    release();
    release();
    expect(mutex.isLocked()).toBe(false);
  });
});
