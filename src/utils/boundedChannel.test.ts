import { describe, expect, it, vi } from 'vitest';
import { BoundedChannel } from './boundedChannel.js';

describe('BoundedChannel', () => {
  it('delivers items in push order', async () => {
    const channel = new BoundedChannel<number>(4);
    channel.push(1);
    channel.push(2);
    channel.close();

    const seen: number[] = [];
    for await (const item of channel) {
      seen.push(item);
    }
    expect(seen).toEqual([1, 2]);
  });

  it('evicts the oldest item when full and reports the drop', () => {
    const onDrop = vi.fn();
    const channel = new BoundedChannel<string>(2, onDrop);
    channel.push('a');
    channel.push('b');
    channel.push('c');

    expect(channel.drain()).toEqual(['b', 'c']);
    expect(channel.dropped).toBe(1);
    expect(onDrop).toHaveBeenCalledWith('a');
  });

  it('evicts only items the predicate allows and keeps the rest past capacity', () => {
    const onDrop = vi.fn();
    const channel = new BoundedChannel<string>(2, onDrop, (item) => item.startsWith('audio'));
    channel.push('audio-1');
    channel.push('commit');
    channel.push('audio-2');
    channel.push('cancel');
    channel.push('end');

    expect(channel.drain()).toEqual(['commit', 'cancel', 'end']);
    expect(channel.dropped).toBe(2);
    expect(onDrop.mock.calls).toEqual([['audio-1'], ['audio-2']]);
  });

  it('hands an item straight to a waiting consumer', async () => {
    const channel = new BoundedChannel<number>(1);
    const pending = channel.next();
    channel.push(7);

    await expect(pending).resolves.toEqual({ value: 7, done: false });
    expect(channel.size).toBe(0);
  });

  it('resolves a pending next() as done on close', async () => {
    const channel = new BoundedChannel<number>(1);
    const pending = channel.next();
    channel.close();

    await expect(pending).resolves.toEqual({ value: undefined, done: true });
    expect(channel.push(1)).toBe(false);
  });

  it('drops queued items when closed with discard', async () => {
    const channel = new BoundedChannel<number>(3);
    channel.push(1);
    channel.close({ discard: true });

    await expect(channel.next()).resolves.toEqual({ value: undefined, done: true });
  });

  it('rejects a second concurrent consumer', async () => {
    const channel = new BoundedChannel<number>(1);
    void channel.next();
    await expect(channel.next()).rejects.toThrow('single consumer');
    channel.close();
  });
});
