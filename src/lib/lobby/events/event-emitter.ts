/**
 * EventEmitter
 * Lightweight typed event emitter
 */

import { logger } from '../../utils/logger';

type EventCallback<T = unknown> = (data: T) => void;

export class EventEmitter<TEventMap extends Record<string, unknown> = Record<string, unknown>> {
  private listeners = new Map<keyof TEventMap, Set<EventCallback<never>>>();

  /**
   * Subscribe to an event
   */
  on<K extends keyof TEventMap>(event: K, callback: EventCallback<TEventMap[K]>): () => void {
    let callbacks = this.listeners.get(event);
    if (!callbacks) {
      callbacks = new Set();
      this.listeners.set(event, callbacks);
    }
    callbacks.add(callback);

    // Return unsubscribe function
    return () => {
      this.off(event, callback);
    };
  }

  /**
   * Subscribe to an event once (automatically unsubscribes after first emission)
   */
  once<K extends keyof TEventMap>(event: K, callback: EventCallback<TEventMap[K]>): () => void {
    const onceCallback: EventCallback<TEventMap[K]> = (data) => {
      this.off(event, onceCallback);
      callback(data);
    };
    return this.on(event, onceCallback);
  }

  /**
   * Unsubscribe from an event
   */
  off<K extends keyof TEventMap>(event: K, callback: EventCallback<TEventMap[K]>): void {
    const callbacks = this.listeners.get(event);
    if (callbacks) {
      callbacks.delete(callback);
      if (callbacks.size === 0) {
        this.listeners.delete(event);
      }
    }
  }

  /**
   * Emit an event
   * Listeners added or removed by a callback take effect from the next emit
   */
  emit<K extends keyof TEventMap>(event: K, data: TEventMap[K]): void {
    const callbacks = this.listeners.get(event);
    if (!callbacks) {
      return;
    }

    // Set<EventCallback<never>> only ever holds callbacks registered for this key
    const snapshot = Array.from(callbacks) as EventCallback<TEventMap[K]>[];
    for (const callback of snapshot) {
      try {
        callback(data);
      } catch (error) {
        logger.error(`Error in event listener for ${String(event)}`, error, { event: String(event) });
      }
    }
  }

  /**
   * Remove all listeners for an event
   */
  removeAllListeners<K extends keyof TEventMap>(event?: K): void {
    if (event) {
      this.listeners.delete(event);
    } else {
      this.listeners.clear();
    }
  }

  /**
   * Get listener count for an event
   */
  listenerCount<K extends keyof TEventMap>(event: K): number {
    return this.listeners.get(event)?.size ?? 0;
  }
}
