/**
 * AutoGreeter
 * Greets players joining the monitored lobby
 */

import { logger } from '../utils/logger';
import type { DomainEventOf } from '../lobby';
import type { ConsumerSession } from './types';

export interface AutoGreeterOptions {
  /** `{name}` is replaced with the player's display name */
  template: string;
  /** Minimum time between two greetings for the same player */
  cooldownMs?: number;
  now?: () => number;
}

export function renderGreeting(template: string, name: string): string {
  return template.replace(/\{name\}/g, name);
}

export class AutoGreeter {
  private readonly cooldownMs: number;
  private readonly now: () => number;
  private readonly lastGreeted = new Map<string, number>();
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly session: ConsumerSession,
    private readonly options: AutoGreeterOptions
  ) {
    this.cooldownMs = options.cooldownMs ?? 5 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  start(): void {
    if (this.unsubscribe) {
      return;
    }
    this.unsubscribe = this.session.events.on('PlayerJoined', (event) => this.greet(event), {
      name: 'auto-greeter',
    });
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /**
   * Players still inside their cooldown
   */
  getCoolingDownCount(): number {
    this.forgetExpired(this.now());
    return this.lastGreeted.size;
  }

  private forgetExpired(now: number): void {
    for (const [playerId, greetedAt] of this.lastGreeted) {
      if (now - greetedAt >= this.cooldownMs) {
        this.lastGreeted.delete(playerId);
      }
    }
  }

  private async greet(event: DomainEventOf<'PlayerJoined'>): Promise<void> {
    const { player } = event;
    if (event.lobbyId !== this.session.getSubscribedLobbyId() || player.id === this.session.getSelfId()) {
      return;
    }

    const now = this.now();
    this.forgetExpired(now);
    if (this.lastGreeted.has(player.id)) {
      return;
    }
    this.lastGreeted.set(player.id, now);

    try {
      await this.session.sendChat(renderGreeting(this.options.template, player.displayName));
    } catch (error) {
      logger.warn('Greeting not sent', {
        lobbyId: event.lobbyId,
        playerId: player.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
