/**
 * Transport Types
 * Contract shared by the WebSocket and UDP transports
 */

import { v7 as uuidv7 } from 'uuid';
import { EventEmitter } from '../events/event-emitter';
import { ClosedError, TimeoutError } from '../errors';
import type { ProxyConfig } from '../config/monitor-config';
import type { ProtocolVariant } from '../types';

export interface TransportEvents extends Record<string, unknown> {
  closed: { error: ClosedError; remote: boolean };
  error: Error;
}

interface FrameWaiter {
  resolve: (frame: Uint8Array) => void;
  reject: (error: Error) => void;
  timeout: ReturnType<typeof setTimeout> | null;
}

/**
 * An open connection. Incoming frames queue up until `receiveFrame` takes them;
 * closing (from either side) rejects every pending and future receive with ClosedError.
 */
export abstract class FrameChannel extends EventEmitter<TransportEvents> {
  readonly connectionId = uuidv7();

  private inbox: Uint8Array[] = [];
  private waiters: FrameWaiter[] = [];
  private closedWith: ClosedError | null = null;

  abstract sendFrame(frame: Uint8Array): Promise<void>;

  /**
   * Close locally; idempotent
   */
  abstract close(): void;

  get isOpen(): boolean {
    return this.closedWith === null;
  }

  /**
   * Next frame in arrival order
   * @param timeoutMs - reject with TimeoutError when nothing arrives in time
   */
  receiveFrame(timeoutMs?: number): Promise<Uint8Array> {
    const queued = this.inbox.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.closedWith) {
      return Promise.reject(this.closedWith);
    }

    return new Promise((resolve, reject) => {
      const waiter: FrameWaiter = { resolve, reject, timeout: null };
      if (timeoutMs !== undefined) {
        waiter.timeout = setTimeout(() => {
          this.waiters = this.waiters.filter((candidate) => candidate !== waiter);
          reject(new TimeoutError(`No frame received within ${timeoutMs}ms`));
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  /**
   * Hand an incoming frame to the oldest waiting receive, or queue it
   */
  protected deliver(frame: Uint8Array): void {
    if (this.closedWith) {
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timeout) {
        clearTimeout(waiter.timeout);
      }
      waiter.resolve(frame);
      return;
    }
    this.inbox.push(frame);
  }

  /**
   * Mark the channel closed; frames already queued stay readable
   */
  protected markClosed(error: ClosedError, remote: boolean): void {
    if (this.closedWith) {
      return;
    }
    this.closedWith = error;

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      if (waiter.timeout) {
        clearTimeout(waiter.timeout);
      }
      waiter.reject(error);
    }

    this.emit('closed', { error, remote });
    // Nothing is emitted after closing
    this.removeAllListeners();
  }
}

export interface TransportConnector {
  readonly variant: ProtocolVariant;

  /**
   * Open a channel to `address`, routed through `proxy` when one is given
   * @throws ConnectError
   */
  connect(address: string, proxy: ProxyConfig | null): Promise<FrameChannel>;
}

/**
 * Split `host:port`; bracketed IPv6 literals are accepted
 */
export function parseHostPort(address: string, defaultPort: number): { host: string; port: number } {
  const bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(address);
  if (bracketed) {
    return { host: bracketed[1], port: bracketed[2] ? Number(bracketed[2]) : defaultPort };
  }

  const at = address.lastIndexOf(':');
  if (at === -1 || address.indexOf(':') !== at) {
    return { host: address, port: defaultPort };
  }

  const port = Number(address.slice(at + 1));
  return {
    host: address.slice(0, at),
    port: Number.isInteger(port) && port > 0 && port < 65536 ? port : defaultPort,
  };
}
