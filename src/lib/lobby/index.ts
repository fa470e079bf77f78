/**
 * Lobby Monitor Library
 * Public API exports
 */

// Session (High-Level API)
export { Session } from './manager/session';
export type { SessionOptions, WorldView } from './manager/session';

// Transports (Low-Level API - for advanced use cases)
export * from './client';

// Codecs
export * from './codec';

// Manager utilities
export { HandlerRegistry } from './manager/handler-registry';
export { ReconnectSupervisor } from './manager/reconnect-supervisor';
export { RequestTracker } from './manager/request-tracker';
export type { MessageHandler } from './manager/handler-registry';
export type { ScheduledAttempt } from './manager/reconnect-supervisor';

// World
export { WorldModel } from './world/world-model';
export { ChatRing } from './world/chat-ring';
export type { LobbyListResult, RemovedLobby, WorldModelOptions } from './world/world-model';

// Events
export { EventEmitter } from './events/event-emitter';
export { EventBus, isEventOf } from './events/event-bus';
export type { EventConsumer, SubscribeOptions } from './events/event-bus';

// Configuration
export * from './config/monitor-config';

// Types and errors
export * from './types';
export * from './errors';
