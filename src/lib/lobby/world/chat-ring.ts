/**
 * ChatRing
 * Fixed-capacity FIFO of chat messages; a push into a full ring evicts the oldest entry
 */

import type { ChatMessage } from '../types';

export class ChatRing {
  private readonly buffer: (ChatMessage | undefined)[];
  private start = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Chat ring capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array<ChatMessage | undefined>(capacity);
  }

  /**
   * Append a message, returning the evicted one when the ring was full
   */
  push(message: ChatMessage): ChatMessage | undefined {
    if (this.count < this.capacity) {
      this.buffer[(this.start + this.count) % this.capacity] = message;
      this.count++;
      return undefined;
    }

    const evicted = this.buffer[this.start];
    this.buffer[this.start] = message;
    this.start = (this.start + 1) % this.capacity;
    return evicted;
  }

  get size(): number {
    return this.count;
  }

  /**
   * Oldest first
   */
  toArray(): ChatMessage[] {
    const result: ChatMessage[] = [];
    for (let i = 0; i < this.count; i++) {
      const message = this.buffer[(this.start + i) % this.capacity];
      if (message) {
        result.push(message);
      }
    }
    return result;
  }

  clear(): void {
    this.buffer.fill(undefined);
    this.start = 0;
    this.count = 0;
  }
}
