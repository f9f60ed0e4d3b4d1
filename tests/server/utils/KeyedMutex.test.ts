import { KeyedMutex } from '../../../src/server/utils/KeyedMutex.js';

const tick = () => new Promise<void>(resolve => setImmediate(resolve));

describe('KeyedMutex', () => {
  it('runs sections for the same key one after another', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const section = (name: string) =>
      mutex.runExclusive('key', async () => {
        events.push(`${name}:start`);
        await tick();
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([section('a'), section('b'), section('c')]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
    expect(mutex.activeKeys).toBe(0);
  });

  it('does not serialize different keys', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    await Promise.all([
      mutex.runExclusive('x', async () => {
        events.push('x:start');
        await tick();
        events.push('x:end');
      }),
      mutex.runExclusive('y', async () => {
        events.push('y:start');
        await tick();
        events.push('y:end');
      }),
    ]);

    expect(events.indexOf('y:start')).toBeLessThan(events.indexOf('x:end'));
  });

  it('releases the key when a section throws', async () => {
    const mutex = new KeyedMutex();
    await expect(mutex.runExclusive('k', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(mutex.runExclusive('k', async () => 'next')).resolves.toBe('next');
    expect(mutex.activeKeys).toBe(0);
  });
});
