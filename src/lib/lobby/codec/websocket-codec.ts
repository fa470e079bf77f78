/**
 * WebSocketCodec
 * JSON text frames: `{ type, data }` from the server, `{ type, content }` to it
 */

import { WEBSOCKET_CONSTANTS } from '../constants';
import { DecodeError, UnsupportedIntentError } from '../errors';
import {
  isRecord,
  numberField,
  recordField,
  stringField,
  stringList,
  stringMap,
  type JsonRecord,
} from './json-fields';
import { displayLobbyName, mapFromSettings, modsFromSettings, parseAuthKind } from './lobby-fields';
import type { ProtocolCodec } from './types';
import type { IntentKind, LobbyEntry, Message, OutgoingIntent, PlayerEntry, PlayerPatch } from '../types';

const textDecoder = new TextDecoder('utf-8', { fatal: true });
const textEncoder = new TextEncoder();

const LOBBY_LIST_TYPES = new Set(['OnLobbyListChanged', 'OnLobbyList', 'OnGetLobbyList']);
const LOBBY_CHANGED_TYPES = new Set(['OnLobbyChanged', 'OnLobbyUpdate']);
const HEARTBEAT_TYPES = new Set(['Pong', 'OnPing', 'OnPong']);

/**
 * Numeric lobby ids go over the wire as numbers
 */
function wireLobbyId(lobbyId: string): string | number {
  return /^\d+$/.test(lobbyId) ? Number(lobbyId) : lobbyId;
}

export function parsePlayer(id: string, user: JsonRecord): PlayerEntry {
  const metadata = stringMap(recordField(user, 'metadata'));
  let displayName = stringField(user, 'name');
  if (!displayName || displayName === 'unknown') {
    displayName = metadata.name ?? 'Unknown';
  }

  const wanAddress = stringField(user, 'wanAddress');
  const lanAddresses = stringList(user.lanAddresses);

  return {
    id,
    displayName,
    authKind: parseAuthKind(stringField(user, 'authType'), id),
    ipAddress: stringField(user, 'ipAddress'),
    wanAddress: wanAddress && wanAddress !== 'unknown' ? wanAddress : undefined,
    lanAddresses: lanAddresses.length > 0 ? lanAddresses : undefined,
    metadata,
  };
}

/**
 * Only the fields the server actually sent, so a metadata-only update keeps the known name
 */
export function parsePlayerUpdate(id: string, user: JsonRecord): PlayerPatch {
  const parsed = parsePlayer(id, user);
  const update: PlayerPatch = { id, metadata: parsed.metadata };
  const name = stringField(user, 'name');

  if ((name && name !== 'unknown') || parsed.metadata.name) {
    update.displayName = parsed.displayName;
  }
  if (stringField(user, 'authType')) {
    update.authKind = parsed.authKind;
  }
  if (parsed.ipAddress) {
    update.ipAddress = parsed.ipAddress;
  }
  if (parsed.wanAddress) {
    update.wanAddress = parsed.wanAddress;
  }
  if (parsed.lanAddresses) {
    update.lanAddresses = parsed.lanAddresses;
  }
  return update;
}

export function parseLobby(key: string, lobby: JsonRecord): LobbyEntry {
  const metadata = stringMap(recordField(lobby, 'metadata'));
  const rawName = metadata.name ?? 'Unknown';
  const users = recordField(lobby, 'users');
  const owner = stringField(lobby, 'owner');

  const members = users
    ? Object.entries(users)
        .filter((entry): entry is [string, JsonRecord] => isRecord(entry[1]))
        .map(([id, user]) => parsePlayer(id, user))
    : undefined;

  return {
    id: stringField(lobby, 'id') ?? key,
    name: displayLobbyName(rawName),
    rawName,
    mapId: mapFromSettings(metadata.ready || metadata.gameSettings),
    modIds: modsFromSettings(metadata.gameSettings),
    playerCount: members ? members.length : numberField(lobby, 'playerCount') ?? 0,
    capacity: numberField(lobby, 'memberLimit') ?? null,
    locked: lobby.isLocked === true,
    isPrivate: lobby.isPrivate === true,
    hostId: owner === undefined || owner === '-1' ? null : owner,
    gameType: metadata.gameType ?? null,
    clientVersion: stringField(lobby, 'clientVersion') ?? null,
    launched: metadata.launched === '1',
    members,
  };
}

function parseLobbyMap(lobbies: JsonRecord): LobbyEntry[] {
  return Object.entries(lobbies)
    .filter((entry): entry is [string, JsonRecord] => isRecord(entry[1]))
    .map(([key, lobby]) => parseLobby(key, lobby));
}

function parseJsonFrame(frame: Uint8Array): unknown {
  try {
    return JSON.parse(textDecoder.decode(frame));
  } catch (error) {
    throw new DecodeError('Frame is not valid UTF-8 JSON', frame.byteLength, { cause: error });
  }
}

function toFrame(type: string, content: unknown): Uint8Array {
  return textEncoder.encode(JSON.stringify({ type, content }));
}

export class WebSocketCodec implements ProtocolCodec {
  readonly variant = 'websocket' as const;
  readonly requiresAuthorization = true;
  readonly supportedIntents: ReadonlySet<IntentKind> = new Set<IntentKind>([
    'authorize',
    'enterLounge',
    'getLobbyList',
    'setPlayerData',
    'join',
    'leave',
    'create',
    'setLobbyData',
    'chat',
    'ping',
  ]);

  decode(frame: Uint8Array): Message {
    const parsed = parseJsonFrame(frame);
    const type = isRecord(parsed) ? parsed.type : undefined;
    if (!isRecord(parsed) || typeof type !== 'string') {
      throw new DecodeError('Frame has no message type', frame.byteLength);
    }

    const data = recordField(parsed, 'data') ?? {};
    return this.decodeTyped(type, data, frame.byteLength);
  }

  private decodeTyped(type: string, data: JsonRecord, frameLength: number): Message {
    if (LOBBY_LIST_TYPES.has(type)) {
      return { kind: 'lobbyList', full: true, lobbies: parseLobbyMap(recordField(data, 'lobbies') ?? data) };
    }

    if (LOBBY_CHANGED_TYPES.has(type)) {
      const lobbies = recordField(data, 'lobbies');
      const single = recordField(data, 'lobby');
      const entries = lobbies
        ? parseLobbyMap(lobbies)
        : single
          ? [parseLobby(stringField(single, 'id') ?? '', single)]
          : [];
      return { kind: 'lobbyList', full: false, lobbies: entries.filter((entry) => entry.id !== '') };
    }

    if (HEARTBEAT_TYPES.has(type)) {
      return { kind: 'heartbeat', latencyMs: null };
    }

    switch (type) {
      case 'OnAuthorization':
        return {
          kind: 'authorized',
          success: data.success === true,
          selfId: stringField(data, 'id') ?? null,
        };

      case 'OnLobbyRemoved': {
        const lobbyId = stringField(data, 'id');
        if (lobbyId === undefined) {
          throw new DecodeError('OnLobbyRemoved without lobby id', frameLength);
        }
        return { kind: 'lobbyRemoved', lobbyId };
      }

      case 'OnLobbyJoined':
      case 'OnLobbyCreated':
        return {
          kind: 'lobbyJoined',
          lobbyId: stringField(data, 'id') ?? null,
          success: data.success !== false,
          created: type === 'OnLobbyCreated',
          reason: stringField(data, 'reason'),
        };

      case 'OnChatMessage':
        return {
          kind: 'chat',
          lobbyId: stringField(data, 'lobbyId') ?? null,
          // Older servers send `author`, newer ones `speakerId`
          senderId: stringField(data, 'author') || stringField(data, 'speakerId') || null,
          body: stringField(data, 'text') ?? '',
          timestamp: numberField(data, 'time') ?? null,
        };

      case 'OnLobbyMemberListChanged':
        return this.decodeMemberChange(data, frameLength);

      case 'OnUserDataChanged': {
        const member = recordField(data, 'member');
        const memberId = member ? stringField(member, 'id') : undefined;
        if (!member || memberId === undefined) {
          return { kind: 'notice', type, detail: stringField(data, 'member') };
        }
        return { kind: 'playerUpdated', player: parsePlayerUpdate(memberId, member) };
      }

      case 'OnLobbyDataChanged': {
        const lobby = recordField(data, 'lobby');
        const lobbyId = stringField(data, 'changedLobby');
        if (lobby) {
          const entries = [parseLobby(lobbyId ?? '', lobby)];
          return { kind: 'lobbyList', full: false, lobbies: entries.filter((entry) => entry.id !== '') };
        }
        return { kind: 'notice', type, detail: lobbyId };
      }

      case 'OnError':
        return {
          kind: 'error',
          code: stringField(data, 'code') ?? 'server_error',
          message: stringField(data, 'message') ?? stringField(data, 'reason') ?? 'Server reported an error',
          fatal: data.fatal === true,
        };

      default:
        throw new DecodeError(`Unrecognized message type ${type}`, frameLength);
    }
  }

  private decodeMemberChange(data: JsonRecord, frameLength: number): Message {
    const lobbyId = stringField(data, 'lobbyId');
    const member = data.member;
    const memberRecord = isRecord(member) ? member : undefined;
    const playerId = memberRecord ? stringField(memberRecord, 'id') : stringField(data, 'member');

    if (lobbyId === undefined || playerId === undefined) {
      throw new DecodeError('OnLobbyMemberListChanged without lobby or member id', frameLength);
    }

    if (data.removed === true) {
      return { kind: 'playerLeft', lobbyId, playerId };
    }

    // The member may be a bare id; the session fills in what it already knows
    return {
      kind: 'playerJoined',
      lobbyId,
      player: {
        ...parsePlayerUpdate(playerId, memberRecord ?? {}),
        authKind: parseAuthKind(memberRecord ? stringField(memberRecord, 'authType') : undefined, playerId),
      },
    };
  }

  encode(intent: OutgoingIntent): Uint8Array[] {
    switch (intent.kind) {
      case 'authorize': {
        const content: JsonRecord = {
          authtype: WEBSOCKET_CONSTANTS.AUTH_TYPE,
          key: intent.key,
          id: '0',
          apiVer: WEBSOCKET_CONSTANTS.API_VERSION,
          clientVersion: intent.clientVersion,
        };
        if (intent.name) {
          content.name = intent.name;
          content.playerName = intent.name;
        }
        return [toFrame('Authorization', content)];
      }
      case 'enterLounge':
        return [toFrame('DoEnterLounge', true)];
      case 'getLobbyList':
        return [toFrame('GetLobbyList', true)];
      case 'setPlayerData':
        return [toFrame('SetPlayerData', { key: intent.key, value: intent.value })];
      case 'join':
        return [toFrame('DoJoinLobby', { id: wireLobbyId(intent.lobbyId), password: intent.password })];
      case 'leave':
        return [toFrame('DoExitLobby', wireLobbyId(intent.lobbyId))];
      case 'create':
        return [
          toFrame('CreateLobby', {
            name: intent.name,
            isPrivate: intent.isPrivate,
            memberLimit: intent.memberLimit,
            password: intent.password,
          }),
        ];
      case 'setLobbyData':
        return [toFrame('SetLobbyData', { key: intent.key, value: intent.value })];
      case 'chat':
        return [toFrame('DoSendChat', intent.text)];
      case 'ping':
        // Servers answer one or the other depending on version
        return [toFrame('Ping', true), toFrame('DoPing', true)];
      default:
        throw new UnsupportedIntentError(JSON.stringify(intent), this.variant);
    }
  }
}
