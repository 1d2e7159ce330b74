import { describe, it, expect, vi } from 'vitest';
import { DeliveryQueue } from './delivery-queue.js';

function drain<T extends {}>(queue: DeliveryQueue<T>): T[] {
  const items: T[] = [];
  for (let item = queue.tryPop(); item !== undefined; item = queue.tryPop()) {
    items.push(item);
  }
  return items;
}

describe('DeliveryQueue', () => {
  it('rejects invalid capacity and high-water ratio', () => {
    expect(() => new DeliveryQueue<number>({ capacity: 0 })).toThrow(RangeError);
    expect(() => new DeliveryQueue<number>({ capacity: 1.5 })).toThrow(RangeError);
    expect(() => new DeliveryQueue<number>({ capacity: 4, highWaterMark: 0 })).toThrow(RangeError);
    expect(() => new DeliveryQueue<number>({ capacity: 4, highWaterMark: 1.2 })).toThrow(RangeError);
  });

  it('delivers in push order', async () => {
    const queue = new DeliveryQueue<number>({ capacity: 10 });
    [1, 2, 3].forEach((n) => queue.push(n));

    expect(await queue.pop()).toEqual({ done: false, value: 1 });
    expect(queue.tryPop()).toBe(2);
    expect(await queue.pop()).toEqual({ done: false, value: 3 });
    expect(queue.size).toBe(0);
  });

  it('keeps the newest N under the oldest policy', () => {
    const onDrop = vi.fn();
    const queue = new DeliveryQueue<number>({ capacity: 3, onDrop });

    for (let n = 1; n <= 7; n++) {
      expect(queue.push(n)).toBe(true);
    }

    expect(drain(queue)).toEqual([5, 6, 7]);
    expect(queue.dropped).toBe(4);
    expect(onDrop).toHaveBeenCalledTimes(4);
    expect(onDrop).toHaveBeenNthCalledWith(1, 1, 'oldest');
  });

  it('discards incoming messages under the newest policy', () => {
    const queue = new DeliveryQueue<number>({ capacity: 2, dropPolicy: 'newest' });
    expect(queue.push(1)).toBe(true);
    expect(queue.push(2)).toBe(true);
    expect(queue.push(3)).toBe(false);

    expect(drain(queue)).toEqual([1, 2]);
    expect(queue.dropped).toBe(1);
  });

  it('wraps around the ring without reordering', () => {
    const queue = new DeliveryQueue<number>({ capacity: 3 });
    queue.push(1);
    queue.push(2);
    queue.tryPop();
    queue.push(3);
    queue.push(4);
    queue.push(5);

    expect(drain(queue)).toEqual([3, 4, 5]);
  });

  it('warns once per crossing of the high-water mark', () => {
    const onHighWater = vi.fn();
    const queue = new DeliveryQueue<number>({ capacity: 10, highWaterMark: 0.8, onHighWater });
    expect(queue.highWaterSize).toBe(8);

    for (let n = 1; n <= 10; n++) queue.push(n);
    expect(onHighWater).toHaveBeenCalledTimes(1);
    expect(onHighWater).toHaveBeenCalledWith(8, 10);

    queue.push(11);
    expect(onHighWater).toHaveBeenCalledTimes(1);

    // Fall below the mark, then cross it again.
    queue.tryPop();
    queue.tryPop();
    queue.tryPop();
    queue.push(12);
    expect(onHighWater).toHaveBeenCalledTimes(2);
  });

  it('hands a message straight to a waiting consumer', async () => {
    const queue = new DeliveryQueue<string>({ capacity: 1 });
    const pending = queue.pop();

    queue.push('a');

    expect(await pending).toEqual({ done: false, value: 'a' });
    expect(queue.size).toBe(0);
  });

  it('unblocks waiting consumers on close and discards the buffer', async () => {
    const queue = new DeliveryQueue<string>({ capacity: 4 });
    const first = queue.pop();
    const second = queue.pop();

    queue.close();

    expect(await first).toEqual({ done: true, value: undefined });
    expect(await second).toEqual({ done: true, value: undefined });
    expect(queue.push('late')).toBe(false);
    expect(queue.size).toBe(0);
    expect(await queue.pop()).toEqual({ done: true, value: undefined });
  });

  it('drops buffered messages on a discarding close', async () => {
    const queue = new DeliveryQueue<string>({ capacity: 4 });
    queue.push('a');
    queue.push('b');

    queue.close('discard');

    expect(queue.size).toBe(0);
    expect(await queue.pop()).toEqual({ done: true, value: undefined });
  });

  it('keeps buffered messages readable after a draining close', async () => {
    const queue = new DeliveryQueue<string>({ capacity: 4 });
    queue.push('a');
    queue.push('b');

    queue.close('drain');

    expect(queue.push('late')).toBe(false);
    expect(await queue.pop()).toEqual({ done: false, value: 'a' });
    expect(await queue.pop()).toEqual({ done: false, value: 'b' });
    expect(await queue.pop()).toEqual({ done: true, value: undefined });
  });

  it('discards what a draining close left behind', async () => {
    const queue = new DeliveryQueue<string>({ capacity: 4 });
    queue.push('a');
    queue.close('drain');

    queue.close('discard');

    expect(queue.size).toBe(0);
    expect(await queue.pop()).toEqual({ done: true, value: undefined });
  });

  it('iterates until closed', async () => {
    const queue = new DeliveryQueue<number>({ capacity: 4 });
    queue.push(1);
    queue.push(2);

    const seen: number[] = [];
    const consumer = (async () => {
      for await (const item of queue) {
        seen.push(item);
        if (item === 2) queue.close();
      }
    })();

    await consumer;
    expect(seen).toEqual([1, 2]);
  });
});
