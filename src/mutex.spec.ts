import { Mutex } from './mutex';

describe('Mutex', () => {
  it('runs critical sections one at a time, in request order', async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    const section = (name: string, delay: number) => mutex.runExclusive(async () => {
      events.push(`${name}:start`);
      await new Promise((resolve) => setTimeout(resolve, delay));
      events.push(`${name}:end`);
      return name;
    });

    const results = await Promise.all([section('a', 20), section('b', 0), section('c', 5)]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
    expect(mutex.isLocked).toBe(false);
  });

  it('releases the lock when the section throws', async () => {
    const mutex = new Mutex();

    await expect(mutex.runExclusive(() => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(mutex.isLocked).toBe(false);
    await expect(mutex.runExclusive(() => 1)).resolves.toEqual(1);
  });

  it('ignores a second release', async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();
    const next = mutex.acquire();

    release();
    release();

    const releaseNext = await next;
    expect(mutex.isLocked).toBe(true);
    releaseNext();
    expect(mutex.isLocked).toBe(false);
  });
});
