/**
 * EventLogger
 * Read-only consumer that writes every domain event to the log
 */

import { logger as defaultLogger, type LogContext, type Logger } from '../utils/logger';
import type { DomainEvent, EventBus } from '../lobby';

export interface LoggedEvent {
  level: 'info' | 'warn';
  message: string;
  context: LogContext;
}

export function describeEvent(event: DomainEvent): LoggedEvent {
  switch (event.type) {
    case 'LobbyListChanged':
      return {
        level: 'info',
        message: `Lobby list: ${event.lobbies.length} lobbies`,
        context: { added: event.added, removed: event.removed },
      };
    case 'LobbyJoined':
      return {
        level: 'info',
        message: event.created ? 'Created lobby' : 'Joined lobby',
        context: { lobbyId: event.lobbyId },
      };
    case 'LobbyLeft':
      return { level: 'info', message: `Left lobby (${event.reason})`, context: { lobbyId: event.lobbyId } };
    case 'ChatReceived':
      return {
        level: 'info',
        message: `[CHAT] ${event.message.senderId ?? 'system'}: ${event.message.body}`,
        context: { lobbyId: event.message.lobbyId, direction: event.message.direction },
      };
    case 'PlayerJoined':
      return {
        level: 'info',
        message: `${event.player.displayName} joined`,
        context: { lobbyId: event.lobbyId, playerId: event.player.id, authKind: event.player.authKind },
      };
    case 'PlayerLeft':
      return { level: 'info', message: 'Player left', context: { lobbyId: event.lobbyId, playerId: event.playerId } };
    case 'ConnectionStateChanged':
      return {
        level: event.error ? 'warn' : 'info',
        message: `Connection ${event.previous} -> ${event.state}`,
        context: { state: event.state, attempt: event.attempt, error: event.error?.message },
      };
    case 'ProtocolError':
      return {
        level: 'warn',
        message: 'Protocol error',
        context: { code: event.error.code, error: event.error.message },
      };
  }
}

export class EventLogger {
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly bus: EventBus,
    private readonly log: Logger = defaultLogger
  ) {}

  start(): void {
    if (this.unsubscribe) {
      return;
    }
    this.unsubscribe = this.bus.subscribe((event) => this.write(event), { name: 'event-logger' });
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  private write(event: DomainEvent): void {
    const { level, message, context } = describeEvent(event);
    if (level === 'warn') {
      this.log.warn(message, context);
      return;
    }
    this.log.info(message, context);
  }
}
