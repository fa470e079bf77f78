/**
 * EventBus
 * Fan-out of domain events from a session to its consumers
 *
 * Every consumer owns a bounded queue. Publishing only enqueues; delivery happens on a
 * later microtask, one event at a time per consumer, so a slow consumer grows its own
 * backlog and never holds up the publisher or the other consumers. A full queue drops
 * its oldest event.
 */

import { logger } from '../../utils/logger';
import type { DomainEvent, DomainEventOf, DomainEventType } from '../types';

export type EventConsumer<E extends DomainEvent = DomainEvent> = (event: E) => void | Promise<void>;

export interface SubscribeOptions {
  /** Used in logs */
  name?: string;
  /** Only these event types are queued for the consumer */
  types?: readonly DomainEventType[];
  queueCapacity?: number;
}

interface Subscription {
  name: string;
  consumer: EventConsumer;
  types: ReadonlySet<DomainEventType> | null;
  capacity: number;
  queue: DomainEvent[];
  dropped: number;
  draining: Promise<void> | null;
}

export function isEventOf<T extends DomainEventType>(event: DomainEvent, type: T): event is DomainEventOf<T> {
  return event.type === type;
}

export class EventBus {
  private subscriptions = new Set<Subscription>();
  private nextAnonymousId = 1;

  constructor(private readonly defaultQueueCapacity = 1000) {}

  /**
   * Register a consumer for all (or the filtered) event types
   * Returns the unsubscribe function
   */
  subscribe(consumer: EventConsumer, options: SubscribeOptions = {}): () => void {
    const subscription: Subscription = {
      name: options.name ?? `consumer-${this.nextAnonymousId++}`,
      consumer,
      types: options.types ? new Set(options.types) : null,
      capacity: Math.max(1, options.queueCapacity ?? this.defaultQueueCapacity),
      queue: [],
      dropped: 0,
      draining: null,
    };
    this.subscriptions.add(subscription);

    return () => {
      this.subscriptions.delete(subscription);
    };
  }

  /**
   * Register a consumer for a single event type
   */
  on<T extends DomainEventType>(
    type: T,
    consumer: EventConsumer<DomainEventOf<T>>,
    options: Omit<SubscribeOptions, 'types'> = {}
  ): () => void {
    return this.subscribe(
      (event) => {
        if (isEventOf(event, type)) {
          return consumer(event);
        }
      },
      { ...options, types: [type] }
    );
  }

  /**
   * Queue an event for every consumer registered at the time of the call
   */
  publish(event: DomainEvent): void {
    const frozen = Object.freeze(event);
    const snapshot = Array.from(this.subscriptions);

    for (const subscription of snapshot) {
      if (subscription.types && !subscription.types.has(frozen.type)) {
        continue;
      }

      if (subscription.queue.length >= subscription.capacity) {
        subscription.queue.shift();
        subscription.dropped++;
        logger.warn('Event queue full, dropped oldest event', {
          consumer: subscription.name,
          capacity: subscription.capacity,
          dropped: subscription.dropped,
        });
      }
      subscription.queue.push(frozen);
      this.scheduleDrain(subscription);
    }
  }

  /**
   * Resolve once every queued event has been delivered
   */
  async flush(): Promise<void> {
    for (;;) {
      const pending = Array.from(this.subscriptions)
        .map((subscription) => subscription.draining)
        .filter((draining): draining is Promise<void> => draining !== null);
      if (pending.length === 0) {
        return;
      }
      await Promise.all(pending);
    }
  }

  /**
   * Number of events dropped for a consumer because its queue was full
   */
  getDroppedCount(name: string): number {
    for (const subscription of this.subscriptions) {
      if (subscription.name === name) {
        return subscription.dropped;
      }
    }
    return 0;
  }

  getConsumerCount(): number {
    return this.subscriptions.size;
  }

  clear(): void {
    this.subscriptions.clear();
  }

  private scheduleDrain(subscription: Subscription): void {
    if (subscription.draining) {
      return;
    }

    subscription.draining = new Promise<void>((resolve) => {
      queueMicrotask(() => {
        this.drain(subscription)
          .catch((error: unknown) => {
            logger.error('Event consumer drain failed', error, { consumer: subscription.name });
          })
          .finally(() => {
            subscription.draining = null;
            resolve();
            // Events queued after the loop saw an empty queue
            if (subscription.queue.length > 0 && this.subscriptions.has(subscription)) {
              this.scheduleDrain(subscription);
            }
          });
      });
    });
  }

  private async drain(subscription: Subscription): Promise<void> {
    let event = subscription.queue.shift();
    while (event) {
      try {
        await subscription.consumer(event);
      } catch (error) {
        logger.error(`Error in event consumer ${subscription.name}`, error, {
          consumer: subscription.name,
          eventType: event.type,
        });
      }
      event = subscription.queue.shift();
    }
  }
}
