/**
 * Consumers shipped with the monitor
 */

export { EventLogger, describeEvent } from './event-logger';
export { ChatRelay } from './chat-relay';
export { AutoGreeter, renderGreeting } from './auto-greeter';
export { Announcer } from './announcer';
export type { LoggedEvent } from './event-logger';
export type { ChatRelayOptions, RelayChannel, RelayLine } from './chat-relay';
export type { AutoGreeterOptions } from './auto-greeter';
export type { AnnouncerOptions } from './announcer';
export type { ConsumerSession } from './types';
