/**
 * Announcer
 * Posts a rotating set of announcements into the monitored lobby on a timer
 */

import { logger } from '../utils/logger';
import type { ConsumerSession } from './types';

export interface AnnouncerOptions {
  messages: readonly string[];
  intervalMs: number;
}

export class Announcer {
  private timer: ReturnType<typeof setInterval> | null = null;
  private next = 0;

  constructor(
    private readonly session: ConsumerSession,
    private readonly options: AnnouncerOptions
  ) {
    if (options.intervalMs <= 0) {
      throw new RangeError(`intervalMs must be positive, got ${options.intervalMs}`);
    }
  }

  start(): void {
    if (this.timer || this.options.messages.length === 0) {
      return;
    }
    this.timer = setInterval(() => {
      this.announce().catch((error: unknown) => {
        logger.error('Announcement failed', error);
      });
    }, this.options.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Send the next announcement; skipped while no lobby is joined
   * Returns the text sent, or null
   */
  async announce(): Promise<string | null> {
    const lobbyId = this.session.getSubscribedLobbyId();
    if (!lobbyId) {
      return null;
    }

    const text = this.options.messages[this.next % this.options.messages.length];
    this.next++;
    try {
      await this.session.sendChat(text);
    } catch (error) {
      logger.warn('Announcement not sent', {
        lobbyId,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
    return text;
  }
}
