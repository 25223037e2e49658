import { describe, it, expect, jest } from '@jest/globals';
import { AsyncQueue } from '../streams/async-queue.js';

describe('AsyncQueue', () => {
  it('delivers buffered and later items in order', async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.push(2);
    setTimeout(() => {
      queue.push(3);
      queue.end();
    }, 5);

    const seen: number[] = [];
    for await (const n of queue) seen.push(n);
    expect(seen).toEqual([1, 2, 3]);
  });

  it('rejects the pending read on fail', async () => {
    const queue = new AsyncQueue<string>();
    const pending = queue.next();
    queue.fail(new Error('boom'));
    await expect(pending).rejects.toThrow('boom');
  });

  it('ignores pushes after end', async () => {
    const queue = new AsyncQueue<string>();
    queue.end();
    queue.push('late');
    await expect(queue.next()).resolves.toEqual({ value: undefined, done: true });
  });

  it('runs onReturn once when the consumer breaks out early', async () => {
    const onReturn = jest.fn();
    const queue = new AsyncQueue<number>(onReturn);
    queue.push(1);
    queue.push(2);

    for await (const n of queue) {
      if (n === 1) break;
    }
    await queue.return();

    expect(onReturn).toHaveBeenCalledTimes(1);
  });
});
