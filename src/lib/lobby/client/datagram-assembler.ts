/**
 * DatagramAssembler
 * Turns RakNet-style UDP datagrams back into whole application messages
 *
 * Frame-set datagram:
 *   u8 id (0x80..0x8F) | u24le sequence | frame+
 * Frame:
 *   u8 flags | u16be body length in bits | [split: u32be count | u16be id | u32be index] | body
 *
 * Any other leading byte is an unconnected message and passes through as is.
 */

import { RAKNET_CONSTANTS } from '../constants';
import { DecodeError } from '../errors';
import { ByteReader } from '../codec/byte-buffer';
import { logger } from '../../utils/logger';

const SEQUENCE_MODULO = 0x1000000;
const HALF_WINDOW = 0x800000;

export interface DatagramAssemblerOptions {
  /** How long a sequence number is remembered for duplicate detection */
  retentionMs?: number;
  /** The gap is skipped once this many out-of-order datagrams are held */
  maxPending?: number;
  /** Age of the oldest held datagram before the gap is skipped */
  reorderTimeoutMs?: number;
  maxSplitCount?: number;
  now?: () => number;
}

export interface AssemblyResult {
  messages: Uint8Array[];
  /** Frames inside an accepted datagram that could not be read */
  errors: DecodeError[];
}

interface PendingDatagram {
  frames: Uint8Array;
  receivedAt: number;
}

interface SplitBuffer {
  count: number;
  parts: Map<number, Uint8Array>;
  startedAt: number;
}

function isFrameSet(id: number): boolean {
  return id >= RAKNET_CONSTANTS.FRAME_SET_MIN && id <= RAKNET_CONSTANTS.FRAME_SET_MAX;
}

/**
 * Forward distance from `from` to `to` on the 24-bit sequence ring
 */
function sequenceDistance(from: number, to: number): number {
  return (to - from + SEQUENCE_MODULO) % SEQUENCE_MODULO;
}

function concat(parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.byteLength, 0);
  const joined = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    joined.set(part, offset);
    offset += part.byteLength;
  }
  return joined;
}

export class DatagramAssembler {
  private readonly retentionMs: number;
  private readonly maxPending: number;
  private readonly reorderTimeoutMs: number;
  private readonly maxSplitCount: number;
  private readonly now: () => number;

  private nextSequence: number | null = null;
  private seen = new Map<number, number>();
  private pending = new Map<number, PendingDatagram>();
  private splits = new Map<number, SplitBuffer>();

  constructor(options: DatagramAssemblerOptions = {}) {
    this.retentionMs = options.retentionMs ?? 10000;
    this.maxPending = options.maxPending ?? 64;
    this.reorderTimeoutMs = options.reorderTimeoutMs ?? 1000;
    this.maxSplitCount = options.maxSplitCount ?? 1024;
    this.now = options.now ?? Date.now;
  }

  /**
   * Feed one datagram; returns the messages it completes, in sequence order
   * @throws DecodeError when the datagram header is malformed
   */
  push(datagram: Uint8Array): AssemblyResult {
    if (datagram.byteLength === 0) {
      throw new DecodeError('Empty datagram', 0);
    }

    if (!isFrameSet(datagram[0])) {
      return { messages: [datagram], errors: [] };
    }

    const reader = new ByteReader(datagram);
    reader.u8('frame set id');
    const sequence = reader.u24le('sequence number');
    const frames = reader.rest();
    const now = this.now();
    this.forgetExpired(now);

    if (this.seen.has(sequence)) {
      logger.debug('Dropping duplicate datagram', { sequence });
      return { messages: [], errors: [] };
    }
    this.seen.set(sequence, now);

    if (this.nextSequence === null) {
      this.nextSequence = sequence;
    }

    const distance = sequenceDistance(this.nextSequence, sequence);
    if (distance >= HALF_WINDOW) {
      logger.debug('Dropping late datagram', { sequence, expected: this.nextSequence });
      return { messages: [], errors: [] };
    }

    this.pending.set(sequence, { frames, receivedAt: now });
    return this.release(now);
  }

  /**
   * Release held datagrams whose gap has timed out; call periodically while idle
   */
  poll(): AssemblyResult {
    const now = this.now();
    this.forgetExpired(now);
    return this.release(now);
  }

  /**
   * Datagrams held back waiting for a missing sequence number
   */
  get pendingCount(): number {
    return this.pending.size;
  }

  reset(): void {
    this.nextSequence = null;
    this.seen.clear();
    this.pending.clear();
    this.splits.clear();
  }

  private release(now: number): AssemblyResult {
    const result: AssemblyResult = { messages: [], errors: [] };

    for (;;) {
      if (this.nextSequence === null) {
        return result;
      }

      const ready = this.pending.get(this.nextSequence);
      if (ready) {
        this.pending.delete(this.nextSequence);
        this.nextSequence = (this.nextSequence + 1) % SEQUENCE_MODULO;
        this.readFrames(ready.frames, result);
        continue;
      }

      if (!this.shouldSkipGap(now)) {
        return result;
      }

      const skipTo = this.closestPending(this.nextSequence);
      logger.debug('Skipping missing datagrams', { from: this.nextSequence, to: skipTo });
      this.nextSequence = skipTo;
    }
  }

  private shouldSkipGap(now: number): boolean {
    if (this.pending.size === 0) {
      return false;
    }
    if (this.pending.size >= this.maxPending) {
      return true;
    }

    let oldest = Infinity;
    for (const held of this.pending.values()) {
      oldest = Math.min(oldest, held.receivedAt);
    }
    return now - oldest >= this.reorderTimeoutMs;
  }

  private closestPending(from: number): number {
    let closest = from;
    let best = Infinity;
    for (const sequence of this.pending.keys()) {
      const distance = sequenceDistance(from, sequence);
      if (distance < best) {
        best = distance;
        closest = sequence;
      }
    }
    return closest;
  }

  /**
   * Frames after a malformed one cannot be located, so the rest of the datagram is lost
   */
  private readFrames(frames: Uint8Array, result: AssemblyResult): void {
    try {
      this.readFramesInto(frames, result.messages);
    } catch (error) {
      if (!(error instanceof DecodeError)) {
        throw error;
      }
      result.errors.push(error);
    }
  }

  private readFramesInto(frames: Uint8Array, messages: Uint8Array[]): void {
    const reader = new ByteReader(frames);

    while (reader.remaining > 0) {
      const flags = reader.u8('frame flags');
      const bodyBits = reader.u16(false, 'frame length');

      if ((flags & RAKNET_CONSTANTS.SPLIT_FLAG) === 0) {
        messages.push(reader.bytesOf(Math.ceil(bodyBits / 8), 'frame body'));
        continue;
      }

      const count = reader.u32(false, 'split count');
      const splitId = reader.u16(false, 'split id');
      const index = reader.u32(false, 'split index');
      const body = reader.bytesOf(Math.ceil(bodyBits / 8), 'split body');

      const joined = this.addSplit(splitId, count, index, body, frames.byteLength);
      if (joined) {
        messages.push(joined);
      }
    }
  }

  private addSplit(
    splitId: number,
    count: number,
    index: number,
    body: Uint8Array,
    frameLength: number
  ): Uint8Array | null {
    if (count === 0 || count > this.maxSplitCount) {
      throw new DecodeError(`Split count ${count} out of range`, frameLength);
    }
    if (index >= count) {
      throw new DecodeError(`Split index ${index} not below count ${count}`, frameLength);
    }

    let buffer = this.splits.get(splitId);
    if (buffer && buffer.count !== count) {
      throw new DecodeError(`Split ${splitId} changed part count from ${buffer.count} to ${count}`, frameLength);
    }
    if (!buffer) {
      buffer = { count, parts: new Map(), startedAt: this.now() };
      this.splits.set(splitId, buffer);
    }

    buffer.parts.set(index, body);
    if (buffer.parts.size < buffer.count) {
      return null;
    }

    this.splits.delete(splitId);
    const ordered: Uint8Array[] = [];
    for (let i = 0; i < buffer.count; i++) {
      const part = buffer.parts.get(i);
      if (part) {
        ordered.push(part);
      }
    }
    return concat(ordered);
  }

  private forgetExpired(now: number): void {
    for (const [sequence, seenAt] of this.seen) {
      if (now - seenAt > this.retentionMs) {
        this.seen.delete(sequence);
      }
    }
    for (const [splitId, buffer] of this.splits) {
      if (now - buffer.startedAt > this.retentionMs) {
        logger.debug('Discarding incomplete split message', {
          splitId,
          received: buffer.parts.size,
          count: buffer.count,
        });
        this.splits.delete(splitId);
      }
    }
  }
}
