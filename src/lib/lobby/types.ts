/**
 * Lobby Monitor Types
 * Data model, protocol-neutral messages, outgoing intents and domain events
 */

import type { LobbyMonitorError } from './errors';

export type ProtocolVariant = 'websocket' | 'raknet';

export type AuthKind = 'steam' | 'gog' | 'unknown';

// ============================================================================
// Data Model
// ============================================================================

export interface Lobby {
  id: string;
  name: string;
  rawName: string;
  mapId: string | null;
  modIds: readonly string[];
  playerCount: number;
  capacity: number | null;
  locked: boolean;
  isPrivate: boolean;
  hostId: string | null;
  variant: ProtocolVariant;
  gameType: string | null;
  clientVersion: string | null;
  launched: boolean;
}

export interface Player {
  id: string;
  displayName: string;
  authKind: AuthKind;
  ipAddress?: string;
  wanAddress?: string;
  lanAddresses?: readonly string[];
  metadata: Readonly<Record<string, string>>;
  /** Lobby id, never the lobby itself */
  lobbyId: string | null;
}

export type ChatDirection = 'incoming' | 'outgoing' | 'system';

export interface ChatMessage {
  id: string;
  timestamp: number;
  senderId: string | null;
  lobbyId: string;
  body: string;
  direction: ChatDirection;
}

// ============================================================================
// Protocol-neutral Messages (codec output)
// ============================================================================

export type PlayerEntry = Omit<Player, 'lobbyId'>;

/** The fields of a player the server actually sent */
export type PlayerPatch = Partial<PlayerEntry> & { id: string };

/** A lobby as reported by the server; `members` is present when the server sent a member list */
export interface LobbyEntry extends Omit<Lobby, 'variant'> {
  members?: readonly PlayerEntry[];
}

export type Message =
  | { kind: 'authorized'; success: boolean; selfId: string | null }
  | { kind: 'lobbyList'; full: boolean; lobbies: LobbyEntry[] }
  | { kind: 'lobbyRemoved'; lobbyId: string }
  | { kind: 'lobbyJoined'; lobbyId: string | null; success: boolean; created: boolean; reason?: string }
  | { kind: 'chat'; lobbyId: string | null; senderId: string | null; body: string; timestamp: number | null }
  | { kind: 'playerJoined'; lobbyId: string; player: PlayerPatch }
  | { kind: 'playerLeft'; lobbyId: string; playerId: string }
  | { kind: 'playerUpdated'; player: PlayerPatch }
  | { kind: 'heartbeat'; latencyMs: number | null; serverInfo?: string }
  | { kind: 'notice'; type: string; detail?: string }
  | { kind: 'error'; code: string; message: string; fatal: boolean };

export type MessageKind = Message['kind'];

export type MessageOf<K extends MessageKind> = Extract<Message, { kind: K }>;

// ============================================================================
// Outgoing Intents (codec input)
// ============================================================================

export interface CreateLobbyParams {
  name: string;
  isPrivate?: boolean;
  memberLimit?: number;
  password?: string;
  /** Chat lobbies carry the `~chat~pub~~` name prefix; defaults to true */
  chatLobby?: boolean;
}

export type OutgoingIntent =
  | { kind: 'authorize'; key: string; name: string | null; clientVersion: string }
  | { kind: 'enterLounge' }
  | { kind: 'getLobbyList' }
  | { kind: 'setPlayerData'; key: string; value: string }
  | { kind: 'join'; lobbyId: string; password: string }
  | { kind: 'leave'; lobbyId: string }
  | { kind: 'create'; name: string; isPrivate: boolean; memberLimit: number; password: string }
  | { kind: 'setLobbyData'; key: string; value: string }
  | { kind: 'chat'; text: string }
  | { kind: 'ping'; sentAt: number };

export type IntentKind = OutgoingIntent['kind'];

// ============================================================================
// Session
// ============================================================================

export type ConnectionState =
  | 'disconnected'
  | 'connecting'
  | 'connected'
  | 'degraded'
  | 'reconnecting'
  | 'closed';

// ============================================================================
// Domain Events
// ============================================================================

/** `removed`: the lobby disappeared from the server; `kicked`: the server dropped us from it */
export type LobbyLeftReason = 'requested' | 'removed' | 'kicked';

export type DomainEvent =
  | { type: 'LobbyListChanged'; lobbies: readonly Lobby[]; added: readonly string[]; removed: readonly string[] }
  | { type: 'LobbyJoined'; lobbyId: string; created: boolean }
  | { type: 'LobbyLeft'; lobbyId: string; reason: LobbyLeftReason }
  | { type: 'ChatReceived'; message: ChatMessage }
  | { type: 'PlayerJoined'; lobbyId: string; player: Player }
  | { type: 'PlayerLeft'; lobbyId: string; playerId: string }
  | {
      type: 'ConnectionStateChanged';
      previous: ConnectionState;
      state: ConnectionState;
      attempt: number;
      error?: LobbyMonitorError;
    }
  | { type: 'ProtocolError'; error: LobbyMonitorError };

export type DomainEventType = DomainEvent['type'];

export type DomainEventOf<T extends DomainEventType> = Extract<DomainEvent, { type: T }>;
