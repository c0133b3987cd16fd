import { KeyedMutex } from '../src/lib/keyedMutex';

describe('KeyedMutex', () => {
  it('runs tasks with the same key one at a time and leaves other keys alone', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    let releaseFirst: () => void = () => undefined;

    const first = mutex.runExclusive('doctor-1', async () => {
      events.push('first:start');
      await new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });
      events.push('first:end');
    });
    const second = mutex.runExclusive('doctor-1', async () => {
      events.push('second');
    });
    const other = mutex.runExclusive('doctor-2', async () => {
      events.push('other');
    });

    await other;
    expect(events).toEqual(['first:start', 'other']);

    releaseFirst();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'other', 'first:end', 'second']);
    expect(mutex.size).toBe(0);
  });

  it('releases the key when a task fails', async () => {
    const mutex = new KeyedMutex();

    await expect(mutex.runExclusive('k', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(mutex.runExclusive('k', async () => 'next')).resolves.toBe('next');
    expect(mutex.size).toBe(0);
  });
});
