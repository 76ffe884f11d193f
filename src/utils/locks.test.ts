import { describe, it, expect } from 'vitest';
import { KeyedLock } from './locks';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('KeyedLock', () => {
  it('runs callers of the same key one after the other', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    const first = lock.run('persons', async () => {
      events.push('first:start');
      await delay(20);
      events.push('first:end');
    });
    const second = lock.run('persons', async () => {
      events.push('second:start');
    });

    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('does not make different keys wait for each other', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    const slow = lock.run('persons', async () => {
      await delay(20);
      events.push('persons');
    });
    const fast = lock.run('firestations', async () => {
      events.push('firestations');
    });

    await Promise.all([slow, fast]);
    expect(events).toEqual(['firestations', 'persons']);
  });

  it('releases the key when the holder fails', async () => {
    const lock = new KeyedLock();

    const failing = lock.run('persons', async () => {
      throw new Error('boom');
    });
    const next = lock.run('persons', async () => 'done');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('done');
  });
});
