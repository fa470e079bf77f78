/**
 * RakNetCodec
 * Binary application messages carried over the RakNet-style UDP transport
 *
 * Layouts (offsets follow the 1-byte message id):
 *   0x1C pong         u64be ping time | u64be server guid | 16B offline magic | str16 server info
 *   0x15 disconnect   (empty)
 *   0x86 lobby list   u16be count | count × lobby
 *        lobby        u32le id | str8 name | str8 map | str8 mod | str8 host | u8 players | u8 capacity | u8 flags
 *   0x87 player join  u32le lobby | str8 player id | str8 name | u8 auth kind
 *   0x88 player leave u32le lobby | str8 player id
 *   0x89 chat         u32le lobby | u64be epoch ms | str8 sender | str16 body
 *
 * The monitor only listens on this protocol; the single outgoing message is the
 * unconnected ping used as poll and heartbeat.
 */

import { RAKNET_CONSTANTS } from '../constants';
import { DecodeError, UnsupportedIntentError } from '../errors';
import { ByteReader, ByteWriter } from './byte-buffer';
import { displayLobbyName } from './lobby-fields';
import type { ProtocolCodec } from './types';
import type { AuthKind, IntentKind, LobbyEntry, Message, OutgoingIntent } from '../types';

const { IDS, OFFLINE_MAGIC } = RAKNET_CONSTANTS;

const LOBBY_FLAGS = {
  LOCKED: 0x01,
  PRIVATE: 0x02,
  LAUNCHED: 0x04,
} as const;

const AUTH_KINDS: readonly AuthKind[] = ['unknown', 'steam', 'gog'];

export interface RakNetCodecOptions {
  /** Client guid sent in unconnected pings */
  clientGuid?: bigint;
  now?: () => number;
}

function hexId(id: number): string {
  return `0x${id.toString(16).padStart(2, '0')}`;
}

export class RakNetCodec implements ProtocolCodec {
  readonly variant = 'raknet' as const;
  readonly requiresAuthorization = false;
  readonly supportedIntents: ReadonlySet<IntentKind> = new Set<IntentKind>(['ping']);

  private readonly clientGuid: bigint;
  private readonly now: () => number;

  constructor(options: RakNetCodecOptions = {}) {
    this.clientGuid = options.clientGuid ?? 0n;
    this.now = options.now ?? Date.now;
  }

  decode(frame: Uint8Array): Message {
    const reader = new ByteReader(frame);
    const id = reader.u8('message id');

    let message: Message;
    switch (id) {
      case IDS.UNCONNECTED_PONG:
        message = this.decodePong(reader);
        break;
      case IDS.DISCONNECTION_NOTIFICATION:
        message = {
          kind: 'error',
          code: 'disconnected',
          message: 'Server sent a disconnection notification',
          fatal: true,
        };
        break;
      case IDS.LOBBY_LIST:
        message = this.decodeLobbyList(reader);
        break;
      case IDS.PLAYER_JOIN:
        message = this.decodePlayerJoin(reader);
        break;
      case IDS.PLAYER_LEAVE:
        message = {
          kind: 'playerLeft',
          lobbyId: String(reader.u32(true, 'lobby id')),
          playerId: reader.str8('player id'),
        };
        break;
      case IDS.CHAT:
        message = this.decodeChat(reader);
        break;
      default:
        throw new DecodeError(`Unknown message id ${hexId(id)}`, frame.byteLength);
    }

    reader.expectEnd();
    return message;
  }

  private decodePong(reader: ByteReader): Message {
    const sentAt = Number(reader.u64(false, 'ping time'));
    reader.u64(false, 'server guid');
    const magic = reader.bytesOf(OFFLINE_MAGIC.byteLength, 'offline magic');
    if (!magic.every((byte, index) => byte === OFFLINE_MAGIC[index])) {
      throw new DecodeError('Pong carries a bad offline magic', reader.length);
    }
    const serverInfo = reader.str16('server info');
    const latency = this.now() - sentAt;

    return {
      kind: 'heartbeat',
      latencyMs: latency >= 0 ? latency : null,
      serverInfo,
    };
  }

  private decodeLobbyList(reader: ByteReader): Message {
    const count = reader.u16(false, 'lobby count');
    const lobbies: LobbyEntry[] = [];

    for (let i = 0; i < count; i++) {
      const id = String(reader.u32(true, 'lobby id'));
      const rawName = reader.str8('lobby name');
      const map = reader.str8('map');
      const mod = reader.str8('mod');
      const host = reader.str8('host');
      const playerCount = reader.u8('player count');
      const capacity = reader.u8('capacity');
      const flags = reader.u8('flags');

      lobbies.push({
        id,
        name: displayLobbyName(rawName),
        rawName,
        mapId: map || null,
        modIds: mod && mod !== '0' ? [mod] : [],
        playerCount,
        capacity,
        locked: (flags & LOBBY_FLAGS.LOCKED) !== 0,
        isPrivate: (flags & LOBBY_FLAGS.PRIVATE) !== 0,
        hostId: host || null,
        gameType: null,
        clientVersion: null,
        launched: (flags & LOBBY_FLAGS.LAUNCHED) !== 0,
      });
    }

    return { kind: 'lobbyList', full: true, lobbies };
  }

  private decodePlayerJoin(reader: ByteReader): Message {
    const lobbyId = String(reader.u32(true, 'lobby id'));
    const id = reader.str8('player id');
    const displayName = reader.str8('player name');
    const authCode = reader.u8('auth kind');
    const authKind = AUTH_KINDS[authCode];
    if (!authKind) {
      throw new DecodeError(`Unknown auth kind ${authCode}`, reader.length);
    }

    return {
      kind: 'playerJoined',
      lobbyId,
      player: { id, displayName: displayName || 'Unknown', authKind, metadata: {} },
    };
  }

  private decodeChat(reader: ByteReader): Message {
    const lobbyId = String(reader.u32(true, 'lobby id'));
    const timestamp = Number(reader.u64(false, 'timestamp'));
    const sender = reader.str8('sender');
    const body = reader.str16('body');

    return {
      kind: 'chat',
      lobbyId,
      senderId: sender || null,
      body,
      timestamp,
    };
  }

  encode(intent: OutgoingIntent): Uint8Array[] {
    if (intent.kind !== 'ping') {
      throw new UnsupportedIntentError(intent.kind, this.variant);
    }

    const ping = new ByteWriter()
      .u8(IDS.UNCONNECTED_PING)
      .u64(BigInt(Math.max(0, Math.trunc(intent.sentAt))), false)
      .bytes(OFFLINE_MAGIC)
      .u64(this.clientGuid, false)
      .toBytes();
    return [ping];
  }
}
