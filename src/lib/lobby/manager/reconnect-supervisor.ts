/**
 * ReconnectSupervisor
 * Decides when the next connection attempt runs
 *
 * Delay for attempt n is base * factor^(n-1), capped at maxDelayMs. At most one attempt
 * is scheduled at a time; the timer callback only posts back into the session.
 */

import { logger } from '../../utils/logger';
import type { ReconnectPolicy } from '../config/monitor-config';

export interface ScheduledAttempt {
  attempt: number;
  delayMs: number;
}

export class ReconnectSupervisor {
  private attempts = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private scheduled: ScheduledAttempt | null = null;

  constructor(private readonly policy: ReconnectPolicy) {}

  /**
   * Backoff delay for the given 1-based attempt number
   */
  delayFor(attempt: number): number {
    const exponent = Math.max(0, attempt - 1);
    return Math.min(this.policy.baseDelayMs * Math.pow(this.policy.factor, exponent), this.policy.maxDelayMs);
  }

  /**
   * Attempts made since the last successful connect
   */
  getAttempts(): number {
    return this.attempts;
  }

  isPending(): boolean {
    return this.timer !== null;
  }

  canRetry(): boolean {
    if (!this.policy.enabled) {
      return false;
    }
    return this.policy.maxAttempts === null || this.attempts < this.policy.maxAttempts;
  }

  /**
   * Schedule the next attempt
   * Returns the already scheduled attempt when one is pending, null when retries are exhausted
   */
  schedule(callback: () => void): ScheduledAttempt | null {
    if (this.scheduled) {
      return this.scheduled;
    }

    if (!this.canRetry()) {
      logger.warn('Reconnect attempts exhausted', {
        attempts: this.attempts,
        maxAttempts: this.policy.maxAttempts,
      });
      return null;
    }

    this.attempts++;
    const scheduled: ScheduledAttempt = { attempt: this.attempts, delayMs: this.delayFor(this.attempts) };
    this.scheduled = scheduled;

    logger.info('Scheduling reconnect attempt', {
      attempt: scheduled.attempt,
      maxAttempts: this.policy.maxAttempts,
      delayMs: scheduled.delayMs,
    });

    this.timer = setTimeout(() => {
      this.timer = null;
      this.scheduled = null;
      callback();
    }, scheduled.delayMs);

    return scheduled;
  }

  /**
   * Drop the pending attempt, if any; safe to call repeatedly
   */
  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.scheduled = null;
  }

  /**
   * A connection succeeded; the next failure starts from the base delay again
   */
  reset(): void {
    this.cancel();
    this.attempts = 0;
  }
}
