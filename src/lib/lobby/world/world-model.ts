/**
 * WorldModel
 * Id-indexed store of every known lobby, player and chat ring
 *
 * Lobbies, players and chat rings live in separate maps keyed by id, so removing a
 * lobby is a handful of deletes and nothing can keep pointing at it. Every record
 * handed out is frozen; callers never see the internal maps.
 *
 * Only the owning session mutates the model, from inside its serial task queue.
 */

import { v7 as uuidv7 } from 'uuid';
import { ProtocolViolationError } from '../errors';
import { ChatRing } from './chat-ring';
import type {
  ChatDirection,
  ChatMessage,
  Lobby,
  LobbyEntry,
  Player,
  PlayerEntry,
  PlayerPatch,
  ProtocolVariant,
} from '../types';

export interface WorldModelOptions {
  variant: ProtocolVariant;
  /** Consecutive full updates a lobby may be missing from before it is removed */
  staleThreshold: number;
  chatCapacity: number;
}

export interface PlayerMove {
  lobbyId: string;
  playerId: string;
}

export interface PlayerJoin {
  lobbyId: string;
  player: Player;
}

export interface LobbyListResult {
  added: string[];
  updated: string[];
  removed: string[];
  joined: PlayerJoin[];
  left: PlayerMove[];
}

export interface RemovedLobby {
  lobby: Lobby;
  playerIds: string[];
}

export interface ChatInput {
  senderId: string | null;
  body: string;
  timestamp?: number | null;
  direction: ChatDirection;
}

interface LobbyRecord {
  lobby: Lobby;
  /** Consecutive full updates this lobby was missing from */
  missedUpdates: number;
}

function freezePlayer(player: Player): Player {
  return Object.freeze({
    ...player,
    metadata: Object.freeze({ ...player.metadata }),
    lanAddresses: player.lanAddresses ? Object.freeze([...player.lanAddresses]) : undefined,
  });
}

export class WorldModel {
  private readonly lobbies = new Map<string, LobbyRecord>();
  private readonly players = new Map<string, Player>();
  private readonly members = new Map<string, Set<string>>();
  private readonly chats = new Map<string, ChatRing>();

  constructor(private readonly options: WorldModelOptions) {
    if (options.staleThreshold < 1) {
      throw new RangeError(`staleThreshold must be at least 1, got ${options.staleThreshold}`);
    }
  }

  // ==========================================================================
  // Mutations
  // ==========================================================================

  /**
   * Reconcile a lobby list
   * A full list ages every lobby it omits; a partial list only upserts.
   */
  applyLobbyListUpdate(entries: readonly LobbyEntry[], options: { full: boolean }): LobbyListResult {
    const result: LobbyListResult = { added: [], updated: [], removed: [], joined: [], left: [] };
    const seen = new Set<string>();

    for (const entry of entries) {
      seen.add(entry.id);
      const existing = this.lobbies.get(entry.id);
      const { members, ...fields } = entry;

      this.lobbies.set(entry.id, {
        lobby: Object.freeze({
          ...fields,
          modIds: Object.freeze([...fields.modIds]),
          variant: this.options.variant,
        }),
        missedUpdates: 0,
      });
      if (!this.members.has(entry.id)) {
        this.members.set(entry.id, new Set());
      }

      if (existing) {
        result.updated.push(entry.id);
      } else {
        result.added.push(entry.id);
      }

      if (members) {
        this.syncMembers(entry.id, members, result);
      }
    }

    if (options.full) {
      for (const [lobbyId, record] of Array.from(this.lobbies.entries())) {
        if (seen.has(lobbyId)) {
          continue;
        }
        record.missedUpdates++;
        if (record.missedUpdates >= this.options.staleThreshold) {
          this.removeLobby(lobbyId);
          result.removed.push(lobbyId);
        }
      }
    }

    return result;
  }

  /**
   * Remove a lobby together with its players and chat history
   */
  removeLobby(lobbyId: string): RemovedLobby | null {
    const record = this.lobbies.get(lobbyId);
    if (!record) {
      return null;
    }

    const playerIds = Array.from(this.members.get(lobbyId) ?? []);
    for (const playerId of playerIds) {
      this.players.delete(playerId);
    }
    this.members.delete(lobbyId);
    this.chats.delete(lobbyId);
    this.lobbies.delete(lobbyId);

    return { lobby: record.lobby, playerIds };
  }

  applyChat(lobbyId: string, input: ChatInput): ChatMessage {
    if (!this.lobbies.has(lobbyId)) {
      throw new ProtocolViolationError(`Chat for unknown lobby ${lobbyId}`);
    }

    let ring = this.chats.get(lobbyId);
    if (!ring) {
      ring = new ChatRing(this.options.chatCapacity);
      this.chats.set(lobbyId, ring);
    }

    const message: ChatMessage = Object.freeze({
      id: uuidv7(),
      timestamp: input.timestamp ?? Date.now(),
      senderId: input.senderId,
      lobbyId,
      body: input.body,
      direction: input.direction,
    });
    ring.push(message);
    return message;
  }

  /**
   * Add a player to a lobby, moving them out of any other lobby
   * The entry is merged over what is already known; a player never seen before is
   * named by their id until the server sends a name.
   * Returns null when the player was already a member and only their details changed
   */
  applyPlayerJoin(lobbyId: string, entry: PlayerPatch): Player | null {
    if (!this.lobbies.has(lobbyId)) {
      throw new ProtocolViolationError(`Player ${entry.id} joined unknown lobby ${lobbyId}`);
    }

    const previous = this.players.get(entry.id);
    const alreadyMember = previous?.lobbyId === lobbyId;
    if (previous?.lobbyId && !alreadyMember) {
      this.detachMember(previous.lobbyId, entry.id);
    }

    const known: PlayerEntry = previous ?? { id: entry.id, displayName: entry.id, authKind: 'unknown', metadata: {} };
    const player = freezePlayer({
      ...known,
      ...entry,
      metadata: { ...known.metadata, ...entry.metadata },
      lobbyId,
    });
    this.players.set(entry.id, player);
    if (alreadyMember) {
      return null;
    }

    this.attachMember(lobbyId, entry.id);
    return player;
  }

  applyPlayerLeave(lobbyId: string, playerId: string): Player {
    const player = this.players.get(playerId);
    if (!player || player.lobbyId !== lobbyId) {
      throw new ProtocolViolationError(`Player ${playerId} is not a member of lobby ${lobbyId}`);
    }

    this.detachMember(lobbyId, playerId);
    this.players.delete(playerId);
    return player;
  }

  applyPlayerUpdate(update: PlayerPatch): Player {
    const player = this.players.get(update.id);
    if (!player) {
      throw new ProtocolViolationError(`Metadata for unknown player ${update.id}`);
    }

    const updated = freezePlayer({
      ...player,
      ...update,
      metadata: { ...player.metadata, ...update.metadata },
      lobbyId: player.lobbyId,
    });
    this.players.set(update.id, updated);
    return updated;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  getLobbies(): readonly Lobby[] {
    return Object.freeze(Array.from(this.lobbies.values(), (record) => record.lobby));
  }

  getLobby(lobbyId: string): Lobby | undefined {
    return this.lobbies.get(lobbyId)?.lobby;
  }

  hasLobby(lobbyId: string): boolean {
    return this.lobbies.has(lobbyId);
  }

  getPlayers(lobbyId: string): readonly Player[] {
    const ids = this.members.get(lobbyId) ?? new Set<string>();
    const result: Player[] = [];
    for (const id of ids) {
      const player = this.players.get(id);
      if (player) {
        result.push(player);
      }
    }
    return Object.freeze(result);
  }

  getPlayer(playerId: string): Player | undefined {
    return this.players.get(playerId);
  }

  getChatHistory(lobbyId: string): readonly ChatMessage[] {
    return Object.freeze(this.chats.get(lobbyId)?.toArray() ?? []);
  }

  /**
   * Lobby whose member list contains the given player
   */
  findLobbyOf(playerId: string): string | null {
    return this.players.get(playerId)?.lobbyId ?? null;
  }

  // ==========================================================================
  // Membership index
  // ==========================================================================

  private syncMembers(lobbyId: string, entries: readonly PlayerEntry[], result: LobbyListResult): void {
    const listed = new Set(entries.map((entry) => entry.id));
    for (const playerId of Array.from(this.members.get(lobbyId) ?? [])) {
      if (!listed.has(playerId)) {
        this.detachMember(lobbyId, playerId);
        this.players.delete(playerId);
        result.left.push({ lobbyId, playerId });
      }
    }

    for (const entry of entries) {
      const player = this.applyPlayerJoin(lobbyId, entry);
      if (player) {
        result.joined.push({ lobbyId, player });
      }
    }

    // Member lists are authoritative for the head count
    this.setPlayerCount(lobbyId, listed.size);
  }

  private attachMember(lobbyId: string, playerId: string): void {
    let ids = this.members.get(lobbyId);
    if (!ids) {
      ids = new Set();
      this.members.set(lobbyId, ids);
    }
    ids.add(playerId);
    this.adjustPlayerCount(lobbyId, 1);
  }

  private detachMember(lobbyId: string, playerId: string): void {
    if (this.members.get(lobbyId)?.delete(playerId)) {
      this.adjustPlayerCount(lobbyId, -1);
    }
  }

  private adjustPlayerCount(lobbyId: string, delta: number): void {
    const record = this.lobbies.get(lobbyId);
    if (record) {
      this.setPlayerCount(lobbyId, Math.max(0, record.lobby.playerCount + delta));
    }
  }

  private setPlayerCount(lobbyId: string, playerCount: number): void {
    const record = this.lobbies.get(lobbyId);
    if (record && record.lobby.playerCount !== playerCount) {
      record.lobby = Object.freeze({ ...record.lobby, playerCount });
    }
  }
}
