/**
 * RequestTracker
 * Track intents that wait for a server acknowledgement (lobby joined / created)
 */

import { TimeoutError } from '../errors';

interface RequestWaiter<T> {
  resolve: (ack: T) => void;
  reject: (error: Error) => void;
}

export interface PendingRequest<T> {
  key: string;
  intent: string;
  timestamp: number;
  waiters: RequestWaiter<T>[];
  timeout: ReturnType<typeof setTimeout>;
}

export class RequestTracker<T> {
  private pendingRequests = new Map<string, PendingRequest<T>>();

  constructor(
    private readonly defaultTimeout = 10000,
    private readonly maxPendingRequests = 16
  ) {}

  /**
   * Track a sent request
   * A duplicate key joins the pending request instead of starting a new one
   */
  trackRequest(key: string, intent: string, timeout: number = this.defaultTimeout): Promise<T> {
    const existing = this.pendingRequests.get(key);
    if (existing) {
      return new Promise((resolve, reject) => {
        existing.waiters.push({ resolve, reject });
      });
    }

    // Enforce max pending requests limit
    if (this.pendingRequests.size >= this.maxPendingRequests) {
      const oldest = Array.from(this.pendingRequests.values()).sort((a, b) => a.timestamp - b.timestamp)[0];
      if (oldest) {
        this.settle(oldest.key, (waiter) => waiter.reject(new Error('Request tracker limit reached')));
      }
    }

    return new Promise((resolve, reject) => {
      const request: PendingRequest<T> = {
        key,
        intent,
        timestamp: Date.now(),
        waiters: [{ resolve, reject }],
        timeout: setTimeout(() => {
          this.settle(key, (waiter) =>
            waiter.reject(new TimeoutError(`No acknowledgement for ${intent} within ${timeout}ms`))
          );
        }, timeout),
      };

      this.pendingRequests.set(key, request);
    });
  }

  /**
   * Resolve the request waiting on `key`
   */
  matchAck(key: string, ack: T): boolean {
    return this.settle(key, (waiter) => waiter.resolve(ack));
  }

  /**
   * Reject the request waiting on `key`
   */
  rejectRequest(key: string, error: Error): boolean {
    return this.settle(key, (waiter) => waiter.reject(error));
  }

  has(key: string): boolean {
    return this.pendingRequests.has(key);
  }

  /**
   * Key of the oldest pending request, if any
   */
  oldestKey(): string | undefined {
    let oldest: PendingRequest<T> | undefined;
    for (const request of this.pendingRequests.values()) {
      if (!oldest || request.timestamp < oldest.timestamp) {
        oldest = request;
      }
    }
    return oldest?.key;
  }

  /**
   * Reject every pending request
   */
  clear(error: Error = new Error('Request tracker cleared')): void {
    for (const key of Array.from(this.pendingRequests.keys())) {
      this.settle(key, (waiter) => waiter.reject(error));
    }
  }

  getPendingCount(): number {
    return this.pendingRequests.size;
  }

  private settle(key: string, outcome: (waiter: RequestWaiter<T>) => void): boolean {
    const request = this.pendingRequests.get(key);
    if (!request) {
      return false;
    }

    // Remove from map before settling so a waiter can track a new request with the same key
    clearTimeout(request.timeout);
    this.pendingRequests.delete(key);
    request.waiters.forEach(outcome);
    return true;
  }
}
