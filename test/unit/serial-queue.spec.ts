import { SerialQueue } from '../../src';

describe('SerialQueue', () => {
  const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

  it('should run work one item at a time in submission order', async () => {
    const queue = new SerialQueue();
    const log: string[] = [];

    const task = (name: string, ms: number) => async () => {
      log.push(`start ${name}`);
      await delay(ms);
      log.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([
      queue.run(task('a', 10)),
      queue.run(task('b', 1)),
      queue.run(task('c', 5)),
    ]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(log).toEqual([
      'start a',
      'end a',
      'start b',
      'end b',
      'start c',
      'end c',
    ]);
  });

  it('should keep running after a rejected item', async () => {
    const queue = new SerialQueue();

    const failing = queue.run(async () => {
      throw new Error('boom');
    });
    const following = queue.run(async () => 'next');

    await expect(failing).rejects.toThrow('boom');
    await expect(following).resolves.toBe('next');
  });

  it('should report the number of unsettled items', async () => {
    const queue = new SerialQueue();

    const first = queue.run(() => delay(5));
    const second = queue.run(() => delay(5));
    expect(queue.size).toBe(2);

    await Promise.all([first, second]);
    await delay(0);
    expect(queue.size).toBe(0);
  });
});
