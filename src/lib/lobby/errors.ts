/**
 * Lobby Monitor Errors
 * Every error raised by the core carries a stable code so consumers can branch on it
 */

export type LobbyMonitorErrorCode =
  | 'CONNECT_FAILED'
  | 'DECODE_FAILED'
  | 'TIMEOUT'
  | 'PROTOCOL_VIOLATION'
  | 'CLOSED'
  | 'NOT_SUBSCRIBED'
  | 'NOT_CONNECTED'
  | 'UNSUPPORTED_INTENT'
  | 'INTENT_REJECTED'
  | 'SESSION_CLOSED';

export class LobbyMonitorError extends Error {
  readonly code: LobbyMonitorErrorCode;

  constructor(code: LobbyMonitorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Address unreachable, proxy verification failed, or connect timed out. */
export class ConnectError extends LobbyMonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECT_FAILED', message, options);
  }
}

/** Malformed or unrecognised frame. Non-fatal: the frame is dropped. */
export class DecodeError extends LobbyMonitorError {
  readonly frameLength: number;

  constructor(message: string, frameLength: number, options?: { cause?: unknown }) {
    super('DECODE_FAILED', message, options);
    this.frameLength = frameLength;
  }
}

export class TimeoutError extends LobbyMonitorError {
  constructor(message: string) {
    super('TIMEOUT', message);
  }
}

/** A decoded update that contradicts the world model, e.g. chat for an unknown lobby. */
export class ProtocolViolationError extends LobbyMonitorError {
  constructor(message: string) {
    super('PROTOCOL_VIOLATION', message);
  }
}

export class ClosedError extends LobbyMonitorError {
  readonly closeCode?: number;

  constructor(message: string, closeCode?: number) {
    super('CLOSED', message);
    this.closeCode = closeCode;
  }
}

export class NotSubscribedError extends LobbyMonitorError {
  constructor(message = 'No lobby is joined') {
    super('NOT_SUBSCRIBED', message);
  }
}

export class NotConnectedError extends LobbyMonitorError {
  constructor(state: string) {
    super('NOT_CONNECTED', `Session is not connected (state: ${state})`);
  }
}

export class UnsupportedIntentError extends LobbyMonitorError {
  constructor(intent: string, variant: string) {
    super('UNSUPPORTED_INTENT', `Intent "${intent}" is not supported by the ${variant} protocol`);
  }
}

export class IntentRejectedError extends LobbyMonitorError {
  constructor(message: string) {
    super('INTENT_REJECTED', message);
  }
}

export class SessionClosedError extends LobbyMonitorError {
  constructor() {
    super('SESSION_CLOSED', 'Session is closed; create a new session to reconnect');
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
