import { describe, expect, it } from 'vitest';
import { KeyedMutex } from '../src/keyedMutex.js';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe('KeyedMutex', () => {
  it('runs tasks for one key one at a time, in order', async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];

    await Promise.all(
      ['a', 'b', 'c'].map((name) =>
        mutex.run('k', async () => {
          log.push(`${name}:start`);
          await tick();
          log.push(`${name}:end`);
        })
      )
    );

    expect(log).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
    expect(mutex.pending).toBe(0);
  });

  it('does not block other keys', async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];

    await Promise.all([
      mutex.run('x', async () => {
        log.push('x:start');
        await tick();
        log.push('x:end');
      }),
      mutex.run('y', async () => {
        log.push('y:start');
        await tick();
        log.push('y:end');
      })
    ]);

    expect(log.slice(0, 2)).toEqual(['x:start', 'y:start']);
  });

  it('releases the key when a task throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.run('k', () => {
        throw new Error('task failed');
      })
    ).rejects.toThrow('task failed');
    await expect(mutex.run('k', () => 'next')).resolves.toBe('next');
    expect(mutex.pending).toBe(0);
  });

  it('avoids lost updates in read-modify-write', async () => {
    const mutex = new KeyedMutex();
    let counter = 0;

    await Promise.all(
      Array.from({ length: 50 }, () =>
        mutex.run('counter', async () => {
          const read = counter;
          await tick();
          counter = read + 1;
        })
      )
    );

    expect(counter).toBe(50);
  });
});
