import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { FrameChannel } from './types';
import { ClosedError, TimeoutError } from '../errors';

class MemoryChannel extends FrameChannel {
  async sendFrame(): Promise<void> {}

  close(): void {
    this.markClosed(new ClosedError('Closed locally', 1000), false);
  }

  push(frame: Uint8Array): void {
    this.deliver(frame);
  }

  drop(): void {
    this.markClosed(new ClosedError('Connection lost', 1006), true);
  }
}

describe('FrameChannel', () => {
  let channel: MemoryChannel;

  beforeEach(() => {
    vi.useFakeTimers();
    channel = new MemoryChannel();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('hands frames out in arrival order', async () => {
    channel.push(Uint8Array.of(1));
    channel.push(Uint8Array.of(2));

    expect(await channel.receiveFrame()).toEqual(Uint8Array.of(1));
    expect(await channel.receiveFrame()).toEqual(Uint8Array.of(2));
  });

  it('resolves a waiting receive with the next frame', async () => {
    const next = channel.receiveFrame(1000);
    channel.push(Uint8Array.of(7));

    await expect(next).resolves.toEqual(Uint8Array.of(7));
  });

  it('times out a receive and queues the frame that arrives afterwards', async () => {
    const late = channel.receiveFrame(500);
    vi.advanceTimersByTime(499);
    channel.push(Uint8Array.of(9));
    await expect(late).resolves.toEqual(Uint8Array.of(9));

    const timedOut = channel.receiveFrame(500).catch((error: unknown) => error);
    vi.advanceTimersByTime(500);

    const error = await timedOut;
    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toHaveProperty('message', 'No frame received within 500ms');

    channel.push(Uint8Array.of(10));
    expect(await channel.receiveFrame()).toEqual(Uint8Array.of(10));
  });

  it('rejects pending and later receives once closed, after draining the queue', async () => {
    const closed = vi.fn();
    channel.on('closed', closed);

    const pending = channel.receiveFrame().catch((error: unknown) => error);
    channel.drop();
    expect(await pending).toBeInstanceOf(ClosedError);
    expect(closed).toHaveBeenCalledWith({ error: expect.any(ClosedError), remote: true });
    expect(channel.listenerCount('closed')).toBe(0);

    const other = new MemoryChannel();
    other.push(Uint8Array.of(3));
    other.close();
    expect(await other.receiveFrame()).toEqual(Uint8Array.of(3));
    await expect(other.receiveFrame()).rejects.toThrow('Closed locally');
    expect(other.isOpen).toBe(false);
  });

  it('ignores frames that arrive after closing', async () => {
    channel.close();
    channel.push(Uint8Array.of(4));

    await expect(channel.receiveFrame()).rejects.toBeInstanceOf(ClosedError);
  });
});
