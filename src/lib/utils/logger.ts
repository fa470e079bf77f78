/**
 * Structured Logger
 * Provides log levels and structured logging with context
 */

export const LogLevel = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
} as const;

export type LogLevelValue = typeof LogLevel[keyof typeof LogLevel];

export interface LogContext {
  sessionId?: string;
  connectionId?: string;
  lobbyId?: string;
  playerId?: string;
  state?: string;
  [key: string]: unknown;
}

/** Where formatted lines go. `console` satisfies it. */
export interface LogSink {
  debug(line: string): void;
  info(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export interface SerializedError {
  name: string;
  message: string;
  code?: string;
  stack?: string;
  cause?: unknown;
}

const MAX_CAUSE_DEPTH = 3;

function isLogLevelName(value: string): value is keyof typeof LogLevel {
  return value in LogLevel;
}

export function serializeError(error: unknown, depth = 0): SerializedError | unknown {
  if (!(error instanceof Error)) {
    return error;
  }
  const serialized: SerializedError = { name: error.name, message: error.message, stack: error.stack };
  if ('code' in error && typeof error.code === 'string') {
    serialized.code = error.code;
  }
  if (error.cause !== undefined && depth < MAX_CAUSE_DEPTH) {
    serialized.cause = serializeError(error.cause, depth + 1);
  }
  return serialized;
}

export class Logger {
  private level: LogLevelValue;
  private enabled: boolean;

  constructor(
    env: NodeJS.ProcessEnv = process.env,
    private readonly sink: LogSink = console,
    private readonly bindings: LogContext = {}
  ) {
    // Set log level from environment or default to INFO
    const envLevel = env.LOBBY_MONITOR_LOG_LEVEL?.toUpperCase();
    this.level = envLevel && isLogLevelName(envLevel) ? LogLevel[envLevel] : LogLevel.INFO;
    this.enabled = env.NODE_ENV !== 'production' || env.LOBBY_MONITOR_LOGGING === 'true';
  }

  /** Logger that adds `bindings` to every line; level and switch are copied at creation. */
  child(bindings: LogContext): Logger {
    const child = new Logger({}, this.sink, { ...this.bindings, ...bindings });
    child.level = this.level;
    child.enabled = this.enabled;
    return child;
  }

  setLevel(level: LogLevelValue): void {
    this.level = level;
  }

  private shouldLog(level: LogLevelValue): boolean {
    return this.enabled && level >= this.level;
  }

  formatMessage(level: string, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const merged = context || Object.keys(this.bindings).length > 0 ? { ...this.bindings, ...context } : undefined;
    const contextStr = merged ? ` ${JSON.stringify(merged)}` : '';
    return `[${timestamp}] [${level}] ${message}${contextStr}`;
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      this.sink.debug(this.formatMessage('DEBUG', message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.INFO)) {
      this.sink.info(this.formatMessage('INFO', message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.WARN)) {
      this.sink.warn(this.formatMessage('WARN', message, context));
    }
  }

  error(message: string, error?: Error | unknown, context?: LogContext): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      this.sink.error(this.formatMessage('ERROR', message, { ...context, error: serializeError(error) }));
    }
  }
}

export const logger = new Logger();
