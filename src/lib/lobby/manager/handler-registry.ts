/**
 * HandlerRegistry
 * Message handler registration and routing by message kind
 */

import type { Message, MessageKind, MessageOf } from '../types';

export type MessageHandler<K extends MessageKind> = (message: MessageOf<K>) => void;

function isMessageOf<K extends MessageKind>(message: Message, kind: K): message is MessageOf<K> {
  return message.kind === kind;
}

export class HandlerRegistry {
  private handlers = new Map<MessageKind, (message: Message) => void>();

  /**
   * Register the handler for a message kind, replacing any previous one
   */
  registerHandler<K extends MessageKind>(kind: K, handler: MessageHandler<K>): void {
    this.handlers.set(kind, (message) => {
      if (isMessageOf(message, kind)) {
        handler(message);
      }
    });
  }

  unregisterHandler(kind: MessageKind): void {
    this.handlers.delete(kind);
  }

  /**
   * Route a message to its handler
   * Returns false when no handler is registered; handler errors propagate to the caller
   */
  routeMessage(message: Message): boolean {
    const handler = this.handlers.get(message.kind);
    if (!handler) {
      return false;
    }
    handler(message);
    return true;
  }

  clear(): void {
    this.handlers.clear();
  }

  getRegisteredKinds(): MessageKind[] {
    return Array.from(this.handlers.keys());
  }
}
