import { EventChannel } from '@race/bench/infrastructure/adapters/channel/event-channel';
import { describe, expect, it } from 'vitest';

describe('EventChannel', () => {
  it('delivers values in enqueue order', async () => {
    const channel = new EventChannel<number>();
    channel.send(1);
    channel.send(2);
    channel.send(3);

    expect(channel.size).toBe(3);
    expect(await channel.recv()).toBe(1);
    expect(await channel.recv()).toBe(2);
    expect(await channel.recv()).toBe(3);
  });

  it('keeps order and size across a large backlog drained while producing', async () => {
    const channel = new EventChannel<number>();
    for (let value = 0; value < 5_000; value += 1) {
      channel.send(value);
    }

    const received: number[] = [];
    for (let value = 0; value < 3_000; value += 1) {
      received.push(await channel.recv().then((next) => next ?? -1));
    }
    for (let value = 5_000; value < 6_000; value += 1) {
      channel.send(value);
    }
    expect(channel.size).toBe(3_000);

    while (channel.size > 0) {
      received.push(await channel.recv().then((next) => next ?? -1));
    }
    expect(received).toEqual(Array.from({ length: 6_000 }, (_, index) => index));
  });

  it('wakes a waiting receiver', async () => {
    const channel = new EventChannel<string>();
    const pending = channel.recv();

    expect(channel.send('slot')).toBe(true);
    await expect(pending).resolves.toBe('slot');
  });

  it('drains buffered values after close, then ends', async () => {
    const channel = new EventChannel<number>();
    channel.send(7);
    channel.close();

    expect(channel.send(8)).toBe(false);
    expect(await channel.recv()).toBe(7);
    expect(await channel.recv()).toBeNull();
  });

  it('ends iteration on close', async () => {
    const channel = new EventChannel<number>();
    channel.send(1);
    channel.send(2);
    channel.close();

    const seen: number[] = [];
    for await (const value of channel) {
      seen.push(value);
    }
    expect(seen).toEqual([1, 2]);
  });

  it('rejects a waiting receiver when closed with a reason', async () => {
    const channel = new EventChannel<number>();
    const pending = channel.recv();
    channel.close(new Error('connection reset'));

    await expect(pending).rejects.toThrow('connection reset');
    await expect(channel.recv()).rejects.toThrow('connection reset');
  });

  it('refuses a second concurrent receiver', async () => {
    const channel = new EventChannel<number>();
    const first = channel.recv();

    await expect(channel.recv()).rejects.toThrow('EventChannel already has a pending receiver');

    channel.send(4);
    await expect(first).resolves.toBe(4);
  });
});
