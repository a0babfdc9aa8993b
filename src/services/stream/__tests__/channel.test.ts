import { describe, it, expect, vi } from 'vitest';
import { StreamChannel, type StreamEvent } from '../channel.js';

describe('StreamChannel', () => {
  it('delivers items in FIFO order', async () => {
    const channel = new StreamChannel<number>();
    channel.push(1);
    channel.push(2);
    channel.push(3);
    channel.finish();

    const received: number[] = [];
    for await (const item of channel) {
      received.push(item);
    }

    expect(received).toEqual([1, 2, 3]);
  });

  it('tryReceive returns undefined on an empty queue without meaning completion', () => {
    const channel = new StreamChannel<string>();

    expect(channel.tryReceive()).toBeUndefined();
    expect(channel.isDone).toBe(false);

    channel.push('later');
    expect(channel.tryReceive()).toBe('later');
  });

  it('wakes a waiting consumer when an item arrives', async () => {
    const channel = new StreamChannel<string>();
    const next = channel.receive();

    channel.push('hello');

    await expect(next).resolves.toBe('hello');
    expect(channel.pending).toBe(0);
  });

  it('resolves a waiting consumer with undefined once finished', async () => {
    const channel = new StreamChannel<string>();
    const next = channel.receive();

    channel.finish();

    await expect(next).resolves.toBeUndefined();
    expect(channel.isDone).toBe(true);
  });

  it('drain returns everything queued', () => {
    const channel = new StreamChannel<StreamEvent>();
    channel.push({ type: 'chunk', text: 'a' });
    channel.push({ type: 'chunk', text: 'b' });
    channel.push({ type: 'complete' });

    expect(channel.drain()).toEqual([
      { type: 'chunk', text: 'a' },
      { type: 'chunk', text: 'b' },
      { type: 'complete' },
    ]);
    expect(channel.drain()).toEqual([]);
  });

  it('fails pushes after the consumer closes and drops queued items', () => {
    const channel = new StreamChannel<number>();
    channel.push(1);

    channel.close();

    expect(channel.push(2)).toBe(false);
    expect(channel.pending).toBe(0);
    expect(channel.isClosed).toBe(true);
    expect(channel.isDone).toBe(true);
  });

  it('fails pushes after finish', () => {
    const channel = new StreamChannel<number>();
    channel.finish();
    expect(channel.push(1)).toBe(false);
  });

  it('notifies close listeners once, including late registrations', () => {
    const channel = new StreamChannel<number>();
    const early = vi.fn();
    channel.onClose(early);

    channel.close();
    channel.close();

    const late = vi.fn();
    channel.onClose(late);

    expect(early).toHaveBeenCalledTimes(1);
    expect(late).toHaveBeenCalledTimes(1);
  });

  it('rejects a second concurrent receiver', async () => {
    const channel = new StreamChannel<number>();
    const first = channel.receive();

    await expect(channel.receive()).rejects.toThrow('StreamChannel supports a single consumer');

    channel.push(5);
    await expect(first).resolves.toBe(5);
  });
});
