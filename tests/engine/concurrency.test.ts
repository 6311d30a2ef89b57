import { KeyedSerialQueue, mapWithConcurrency } from '../../src/engine/concurrency';

const tick = (ms = 5) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('mapWithConcurrency', () => {
  test('keeps input order', async () => {
    const results = await mapWithConcurrency([30, 10, 20], 3, async (ms, index) => {
      await tick(ms);
      return `${index}:${ms}`;
    });
    expect(results).toEqual(['0:30', '1:10', '2:20']);
  });

  test('never exceeds the limit', async () => {
    let active = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await tick();
      active--;
    });
    expect(peak).toBe(2);
  });

  test('empty input', async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });

  test('rejects with the first error and starts no new work', async () => {
    const started: number[] = [];
    const run = mapWithConcurrency([1, 2, 3, 4], 1, async (n) => {
      started.push(n);
      if (n === 2) throw new Error('item 2 failed');
      return n;
    });
    await expect(run).rejects.toThrow('item 2 failed');
    expect(started).toEqual([1, 2]);
  });
});

describe('KeyedSerialQueue', () => {
  test('runs work of one key one after another', async () => {
    const queue = new KeyedSerialQueue();
    const events: string[] = [];
    const job = (name: string, ms: number) => async () => {
      events.push(`start ${name}`);
      await tick(ms);
      events.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([queue.run('a', job('a1', 20)), queue.run('a', job('a2', 1))]);

    expect(results).toEqual(['a1', 'a2']);
    expect(events).toEqual(['start a1', 'end a1', 'start a2', 'end a2']);
  });

  test('different keys run concurrently', async () => {
    const queue = new KeyedSerialQueue();
    const events: string[] = [];
    const job = (name: string, ms: number) => async () => {
      events.push(`start ${name}`);
      await tick(ms);
      events.push(`end ${name}`);
    };

    await Promise.all([queue.run('a', job('a', 20)), queue.run('b', job('b', 1))]);

    expect(events.slice(0, 2)).toEqual(['start a', 'start b']);
  });

  test('a failure does not block the next task of its key', async () => {
    const queue = new KeyedSerialQueue();
    const first = queue.run('a', async () => {
      throw new Error('first failed');
    });
    const second = queue.run('a', async () => 'second');

    await expect(first).rejects.toThrow('first failed');
    await expect(second).resolves.toBe('second');
  });

  test('forgets keys once their work settles', async () => {
    const queue = new KeyedSerialQueue();
    await queue.run('a', async () => undefined);
    await tick(1);
    expect(queue.activeKeys).toBe(0);
  });
});
