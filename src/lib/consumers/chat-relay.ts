/**
 * ChatRelay
 * Bridges the monitored lobby's chat to an external channel in both directions
 */

import { logger } from '../utils/logger';
import type { ChatMessage, DomainEventOf } from '../lobby';
import type { ConsumerSession } from './types';

export interface RelayLine {
  lobbyId: string;
  senderName: string;
  body: string;
  timestamp: number;
  direction: ChatMessage['direction'];
}

/**
 * The external side (a webhook, a bot, a pipe); delivery itself is up to the implementation
 */
export interface RelayChannel {
  post(line: RelayLine): void | Promise<void>;
  /** Register for text typed on the external side; returns the unsubscribe function */
  onMessage(handler: (text: string) => void): () => void;
}

export interface ChatRelayOptions {
  /** Prepended to lines going into the lobby */
  prefix?: string;
  /** Also forward the session's own lines */
  relayOutgoing?: boolean;
  /** Sent lines remembered for echo suppression; the oldest is forgotten first */
  maxAwaitingEcho?: number;
}

export class ChatRelay {
  private readonly prefix: string;
  private readonly relayOutgoing: boolean;
  private readonly maxAwaitingEcho: number;
  private unsubscribes: Array<() => void> = [];
  /** Lines sent into the lobby whose server echo has not come back yet */
  private awaitingEcho: string[] = [];

  constructor(
    private readonly session: ConsumerSession,
    private readonly channel: RelayChannel,
    options: ChatRelayOptions = {}
  ) {
    this.prefix = options.prefix ?? '';
    this.relayOutgoing = options.relayOutgoing ?? false;
    this.maxAwaitingEcho = options.maxAwaitingEcho ?? 32;
  }

  start(): void {
    if (this.unsubscribes.length > 0) {
      return;
    }
    this.unsubscribes = [
      this.session.events.on('ChatReceived', (event) => this.forward(event), { name: 'chat-relay' }),
      this.channel.onMessage((text) => {
        this.submit(text).catch((error: unknown) => {
          logger.error('Relay submit failed', error);
        });
      }),
    ];
  }

  stop(): void {
    this.unsubscribes.forEach((unsubscribe) => unsubscribe());
    this.unsubscribes = [];
    this.awaitingEcho = [];
  }

  /**
   * Send text from the external side into the monitored lobby
   * Returns false when it could not be sent
   */
  async submit(text: string): Promise<boolean> {
    const body = `${this.prefix}${text}`;
    this.awaitingEcho.push(body);
    if (this.awaitingEcho.length > this.maxAwaitingEcho) {
      this.awaitingEcho.shift();
    }
    try {
      await this.session.sendChat(body);
    } catch (error) {
      const at = this.awaitingEcho.lastIndexOf(body);
      if (at !== -1) {
        this.awaitingEcho.splice(at, 1);
      }
      logger.warn('Relay could not send chat', {
        lobbyId: this.session.getSubscribedLobbyId() ?? undefined,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
    return true;
  }

  getAwaitingEchoCount(): number {
    return this.awaitingEcho.length;
  }

  private async forward(event: DomainEventOf<'ChatReceived'>): Promise<void> {
    const { message } = event;
    if (message.lobbyId !== this.session.getSubscribedLobbyId()) {
      return;
    }

    if (message.direction === 'outgoing') {
      const echoAt = this.awaitingEcho.indexOf(message.body);
      if (echoAt !== -1) {
        this.awaitingEcho.splice(echoAt, 1);
        return;
      }
      if (!this.relayOutgoing) {
        return;
      }
    }

    await this.channel.post({
      lobbyId: message.lobbyId,
      senderName: this.senderName(message),
      body: message.body,
      timestamp: message.timestamp,
      direction: message.direction,
    });
  }

  private senderName(message: ChatMessage): string {
    if (message.senderId === null) {
      return 'System';
    }
    return this.session.world.getPlayer(message.senderId)?.displayName ?? message.senderId;
  }
}
