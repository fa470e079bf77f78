import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Session } from './session';
import { FrameChannel, type TransportConnector } from '../client/types';
import { ByteWriter } from '../codec/byte-buffer';
import { createMonitorConfig, type MonitorConfigOverrides } from '../config/monitor-config';
import { RAKNET_CONSTANTS } from '../constants';
import {
  ClosedError,
  ConnectError,
  DecodeError,
  IntentRejectedError,
  NotConnectedError,
  NotSubscribedError,
  ProtocolViolationError,
  SessionClosedError,
  TimeoutError,
  UnsupportedIntentError,
} from '../errors';
import type { ConnectionState, DomainEvent, DomainEventOf, DomainEventType, ProtocolVariant } from '../types';
import { Logger } from '../../utils/logger';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

interface SentMessage {
  type: string;
  content: unknown;
}

class FakeChannel extends FrameChannel {
  sent: Uint8Array[] = [];
  closedLocally = false;

  async sendFrame(frame: Uint8Array): Promise<void> {
    if (!this.isOpen) {
      throw new ClosedError('Channel is closed');
    }
    this.sent.push(frame);
  }

  close(): void {
    this.closedLocally = true;
    this.markClosed(new ClosedError('Closed locally', 1000), false);
  }

  /** Frame from the server */
  receive(frame: Uint8Array): void {
    this.deliver(frame);
  }

  receiveJson(type: string, data: unknown = {}): void {
    this.deliver(encoder.encode(JSON.stringify({ type, data })));
  }

  dropFromServer(): void {
    this.markClosed(new ClosedError('Connection lost', 1006), true);
  }

  sentMessages(): SentMessage[] {
    return this.sent.map((frame): SentMessage => JSON.parse(decoder.decode(frame)));
  }

  sentTypes(): string[] {
    return this.sentMessages().map((message) => message.type);
  }
}

class FakeConnector implements TransportConnector {
  readonly channels: FakeChannel[] = [];
  connectCalls = 0;
  failing = false;

  constructor(readonly variant: ProtocolVariant) {}

  async connect(): Promise<FrameChannel> {
    this.connectCalls++;
    if (this.failing) {
      throw new ConnectError('Connection refused');
    }
    const channel = new FakeChannel();
    this.channels.push(channel);
    return channel;
  }

  get latest(): FakeChannel {
    const channel = this.channels[this.channels.length - 1];
    if (!channel) {
      throw new Error('No channel opened yet');
    }
    return channel;
  }
}

const READY_TYPES = [
  'DoEnterLounge',
  'SetPlayerData',
  'SetPlayerData',
  'SetPlayerData',
  'SetPlayerData',
  'GetLobbyList',
];

function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

async function advance(ms: number): Promise<void> {
  vi.advanceTimersByTime(ms);
  await settle();
}

function lobbyMap(...ids: string[]): Record<string, unknown> {
  const lobbies: Record<string, unknown> = {};
  for (const id of ids) {
    lobbies[id] = { id, metadata: { name: `~chat~pub~~Lobby ${id}` }, users: { S100: { name: 'Monitor' } } };
  }
  return { lobbies };
}

describe('Session', () => {
  let connector: FakeConnector;
  let session: Session;
  let states: ConnectionState[];
  let events: DomainEvent[];

  function createSession(variant: ProtocolVariant = 'websocket', overrides: MonitorConfigOverrides = {}): Session {
    connector = new FakeConnector(variant);
    const created = new Session({
      config: createMonitorConfig({
        game: variant === 'websocket' ? 'bz98r' : 'bzcc',
        address: 'lobby.test:1337',
        auth: { key: 'test-secret', playerName: 'Monitor' },
        ...overrides,
      }),
      connector,
      requestTimeoutMs: 60000,
      now: () => Date.now(),
    });

    states = [];
    events = [];
    created.onStateChange((state) => {
      states.push(state);
    });
    created.events.subscribe((event) => {
      events.push(event);
    });
    return created;
  }

  function eventsOf<T extends DomainEventType>(type: T): DomainEventOf<T>[] {
    return events.filter((event): event is DomainEventOf<T> => event.type === type);
  }

  async function connectAndAuthorize(): Promise<FakeChannel> {
    await session.connect();
    await settle();
    const channel = connector.latest;
    channel.receiveJson('OnAuthorization', { success: true, id: 'S100' });
    await settle();
    return channel;
  }

  async function joinLobby(channel: FakeChannel, lobbyId: string): Promise<void> {
    channel.receiveJson('OnLobbyListChanged', lobbyMap(lobbyId));
    await settle();
    const joined = session.joinLobby(lobbyId);
    await settle();
    channel.receiveJson('OnLobbyJoined', { id: lobbyId });
    await expect(joined).resolves.toBe(lobbyId);
    await settle();
  }

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'setInterval', 'clearInterval', 'Date'] });
    session = createSession();
  });

  afterEach(async () => {
    await session.close();
    vi.useRealTimers();
  });

  describe('connecting', () => {
    it('authorizes, then enters the lounge', async () => {
      await session.connect();
      await settle();

      const channel = connector.latest;
      expect(states).toEqual(['connecting', 'connected']);
      expect(channel.sentTypes()).toEqual(['Authorization']);

      channel.receiveJson('OnAuthorization', { success: true, id: 'S100' });
      await settle();

      expect(session.getSelfId()).toBe('S100');
      expect(channel.sentTypes()).toEqual(['Authorization', ...READY_TYPES]);
      expect(channel.sentMessages()[2]).toEqual({ type: 'SetPlayerData', content: { key: 'name', value: 'Monitor' } });
    });

    it('names the player after its id when no name is configured', async () => {
      session = createSession('websocket', { auth: { key: 'test-secret', playerName: null } });
      const channel = await connectAndAuthorize();

      expect(channel.sentMessages()[2]).toEqual({
        type: 'SetPlayerData',
        content: { key: 'name', value: 'User_S100' },
      });
    });

    it('ignores a second connect while connected', async () => {
      await connectAndAuthorize();
      await session.connect();
      await settle();

      expect(connector.connectCalls).toBe(1);
      expect(session.getState()).toBe('connected');
    });

    it('stops without retrying when authorization is refused', async () => {
      await session.connect();
      await settle();
      const channel = connector.latest;

      channel.receiveJson('OnAuthorization', { success: false });
      await settle();
      await advance(60000);

      expect(session.getState()).toBe('disconnected');
      expect(session.getLastError()).toBeInstanceOf(ConnectError);
      expect(channel.closedLocally).toBe(true);
      expect(connector.connectCalls).toBe(1);
    });

    it('gives up after the configured number of attempts', async () => {
      session = createSession('websocket', { reconnect: { maxAttempts: 1 } });
      connector.failing = true;

      await session.connect();
      await settle();
      expect(session.getState()).toBe('reconnecting');

      await advance(1000);

      expect(states).toEqual(['connecting', 'reconnecting', 'connecting', 'disconnected']);
      expect(connector.connectCalls).toBe(2);
      expect(session.getLastError()).toBeInstanceOf(ConnectError);

      const last = eventsOf('ConnectionStateChanged').at(-1);
      expect(last?.error).toBeInstanceOf(ConnectError);
    });
  });

  describe('reconnecting', () => {
    it('restores the subscribed lobby after the connection drops', async () => {
      const first = await connectAndAuthorize();
      await joinLobby(first, '1');

      first.dropFromServer();
      await settle();

      expect(session.getState()).toBe('reconnecting');
      expect(session.getSubscribedLobbyId()).toBe('1');

      await advance(999);
      expect(connector.connectCalls).toBe(1);
      await advance(1);

      const second = connector.latest;
      expect(second).not.toBe(first);
      expect(second.sentTypes()).toEqual(['Authorization']);

      second.receiveJson('OnAuthorization', { success: true, id: 'S100' });
      await settle();

      const joins = second.sentMessages().filter((message) => message.type === 'DoJoinLobby');
      expect(joins).toEqual([{ type: 'DoJoinLobby', content: { id: 1, password: '' } }]);

      second.receiveJson('OnLobbyJoined', { id: '1' });
      await settle();

      expect(states).toEqual(['connecting', 'connected', 'reconnecting', 'connecting', 'connected']);
      expect(session.getSubscribedLobbyId()).toBe('1');
      expect(eventsOf('LobbyJoined')).toEqual([
        { type: 'LobbyJoined', lobbyId: '1', created: false },
        { type: 'LobbyJoined', lobbyId: '1', created: false },
      ]);

      const transitions = eventsOf('ConnectionStateChanged').map(({ state, attempt }) => ({ state, attempt }));
      expect(transitions).toEqual([
        { state: 'connecting', attempt: 0 },
        { state: 'connected', attempt: 0 },
        { state: 'reconnecting', attempt: 1 },
        { state: 'connecting', attempt: 1 },
        { state: 'connected', attempt: 1 },
      ]);
      expect(session.getReconnectAttempts()).toBe(0);
    });

    it('drops the subscription when the server refuses the re-join', async () => {
      const first = await connectAndAuthorize();
      await joinLobby(first, '1');

      first.dropFromServer();
      await settle();
      await advance(1000);

      const second = connector.latest;
      second.receiveJson('OnAuthorization', { success: true, id: 'S100' });
      await settle();
      second.receiveJson('OnLobbyJoined', { id: '1', success: false, reason: 'Lobby is full' });
      await settle();

      expect(session.getSubscribedLobbyId()).toBeNull();
      expect(eventsOf('LobbyLeft')).toEqual([{ type: 'LobbyLeft', lobbyId: '1', reason: 'kicked' }]);
    });
  });

  describe('lobbies', () => {
    it('rejects chat once the subscribed lobby goes stale', async () => {
      const channel = await connectAndAuthorize();
      await joinLobby(channel, '1');

      channel.receiveJson('OnLobbyListChanged', { lobbies: {} });
      await settle();
      expect(session.getSubscribedLobbyId()).toBe('1');

      channel.receiveJson('OnLobbyListChanged', { lobbies: {} });
      await settle();

      expect(session.world.hasLobby('1')).toBe(false);
      expect(eventsOf('LobbyLeft')).toEqual([{ type: 'LobbyLeft', lobbyId: '1', reason: 'removed' }]);
      await expect(session.sendChat('hello')).rejects.toBeInstanceOf(NotSubscribedError);
    });

    it('leaves immediately when the server removes the lobby', async () => {
      const channel = await connectAndAuthorize();
      await joinLobby(channel, '1');

      channel.receiveJson('OnLobbyRemoved', { id: '1' });
      await settle();

      expect(session.getSubscribedLobbyId()).toBeNull();
      expect(eventsOf('LobbyListChanged').at(-1)?.removed).toEqual(['1']);
    });

    it('leaves on request', async () => {
      const channel = await connectAndAuthorize();
      await joinLobby(channel, '1');

      await session.leaveLobby();

      expect(channel.sentMessages().at(-1)).toEqual({ type: 'DoExitLobby', content: 1 });
      expect(eventsOf('LobbyLeft').at(-1)).toEqual({ type: 'LobbyLeft', lobbyId: '1', reason: 'requested' });
      await expect(session.leaveLobby()).rejects.toBeInstanceOf(NotSubscribedError);
    });

    it('treats its own removal from the member list as a kick', async () => {
      const channel = await connectAndAuthorize();
      await joinLobby(channel, '1');

      channel.receiveJson('OnLobbyMemberListChanged', { lobbyId: '1', member: { id: 'S100' }, removed: true });
      await settle();

      expect(session.getSubscribedLobbyId()).toBeNull();
      expect(eventsOf('LobbyLeft')).toEqual([{ type: 'LobbyLeft', lobbyId: '1', reason: 'kicked' }]);
    });

    it('treats a member list without itself as a kick', async () => {
      const channel = await connectAndAuthorize();
      await joinLobby(channel, '1');

      channel.receiveJson('OnLobbyChanged', { lobby: { id: '1', users: { S999: { name: 'Other' } } } });
      await settle();

      expect(eventsOf('PlayerLeft')).toEqual([{ type: 'PlayerLeft', lobbyId: '1', playerId: 'S100' }]);
      expect(session.getSubscribedLobbyId()).toBeNull();
      expect(eventsOf('LobbyLeft')).toEqual([{ type: 'LobbyLeft', lobbyId: '1', reason: 'kicked' }]);
      await expect(session.sendChat('hello')).rejects.toBeInstanceOf(NotSubscribedError);
    });

    it('keeps what it knows about a member announced by id only', async () => {
      const channel = await connectAndAuthorize();
      channel.receiveJson('OnLobbyListChanged', {
        lobbies: {
          1: {
            id: '1',
            metadata: { name: 'Lobby 1' },
            users: { S200: { name: 'Alice', ipAddress: '10.0.0.5', metadata: { team: '1' } } },
          },
          2: { id: '2', metadata: { name: 'Lobby 2' }, users: {} },
        },
      });
      await settle();

      channel.receiveJson('OnLobbyMemberListChanged', { lobbyId: '2', member: 'S200' });
      channel.receiveJson('OnLobbyMemberListChanged', { lobbyId: '2', member: 'S300' });
      await settle();

      expect(session.world.getPlayer('S200')).toMatchObject({
        displayName: 'Alice',
        ipAddress: '10.0.0.5',
        metadata: { team: '1' },
        lobbyId: '2',
      });
      expect(eventsOf('PlayerJoined').map((event) => [event.lobbyId, event.player.displayName])).toEqual([
        ['1', 'Alice'],
        ['2', 'Alice'],
        ['2', 'S300'],
      ]);
    });

    it('rejects a join the server refuses', async () => {
      const channel = await connectAndAuthorize();
      const joined = session.joinLobby('4');
      await settle();

      channel.receiveJson('OnLobbyJoined', { id: '4', success: false, reason: 'Wrong password' });

      await expect(joined).rejects.toThrow(IntentRejectedError);
      expect(session.getSubscribedLobbyId()).toBeNull();
    });

    it('refuses a second join while one is in flight', async () => {
      await connectAndAuthorize();
      const first = session.joinLobby('1');
      first.catch(() => undefined);

      await expect(session.joinLobby('2')).rejects.toThrow('Another join or create is waiting for the server');
    });

    it('creates a chat lobby and describes it', async () => {
      const channel = await connectAndAuthorize();
      const created = session.createLobby({ name: 'Room', memberLimit: 8 });
      await settle();

      expect(channel.sentMessages().at(-1)).toEqual({
        type: 'CreateLobby',
        content: { name: '~chat~pub~~Room', isPrivate: false, memberLimit: 8, password: '' },
      });

      channel.receiveJson('OnLobbyCreated', { id: '5' });
      await expect(created).resolves.toBe('5');
      await settle();

      expect(channel.sentMessages().slice(-5)).toEqual([
        { type: 'SetLobbyData', content: { key: 'clientVersion', value: '2.2.301' } },
        { type: 'SetLobbyData', content: { key: 'GameVersion', value: '2.2.301' } },
        { type: 'SetLobbyData', content: { key: 'gameType', value: '1' } },
        { type: 'SetLobbyData', content: { key: 'gameSettings', value: '*' } },
        { type: 'SetLobbyData', content: { key: 'name', value: '~chat~pub~~Room' } },
      ]);
      expect(eventsOf('LobbyJoined')).toEqual([{ type: 'LobbyJoined', lobbyId: '5', created: true }]);
    });

    it('fails a pending join when the server reports an error', async () => {
      const channel = await connectAndAuthorize();
      const joined = session.joinLobby('3');
      await settle();

      channel.receiveJson('OnError', { message: 'Lobby does not exist' });

      await expect(joined).rejects.toThrow('Lobby does not exist');
    });
  });

  describe('chat', () => {
    it('records chat with its direction', async () => {
      const channel = await connectAndAuthorize();
      await joinLobby(channel, '1');

      channel.receiveJson('OnChatMessage', { author: 'S2', text: 'hi all' });
      channel.receiveJson('OnChatMessage', { author: 'S100', text: 'hello' });
      channel.receiveJson('OnChatMessage', { text: 'Server restarting' });
      await settle();

      const history = session.world.getChatHistory('1').map(({ senderId, body, direction }) => ({
        senderId,
        body,
        direction,
      }));
      expect(history).toEqual([
        { senderId: 'S2', body: 'hi all', direction: 'incoming' },
        { senderId: 'S100', body: 'hello', direction: 'outgoing' },
        { senderId: null, body: 'Server restarting', direction: 'system' },
      ]);
      expect(eventsOf('ChatReceived')).toHaveLength(3);
    });

    it('sends chat to the subscribed lobby', async () => {
      const channel = await connectAndAuthorize();
      await joinLobby(channel, '1');

      await session.sendChat('gg');

      expect(channel.sentMessages().at(-1)).toEqual({ type: 'DoSendChat', content: 'gg' });
    });

    it('rejects empty chat', async () => {
      const channel = await connectAndAuthorize();
      await joinLobby(channel, '1');

      await expect(session.sendChat('   ')).rejects.toBeInstanceOf(IntentRejectedError);
    });

    it('rejects chat while disconnected', async () => {
      const channel = await connectAndAuthorize();
      await joinLobby(channel, '1');
      await session.disconnect();

      expect(session.getSubscribedLobbyId()).toBe('1');
      await expect(session.sendChat('hello')).rejects.toBeInstanceOf(NotConnectedError);
    });
  });

  describe('protocol errors', () => {
    it('drops a corrupt frame and keeps going', async () => {
      const channel = await connectAndAuthorize();

      channel.receive(encoder.encode('{"type": "OnLobbyList'));
      channel.receiveJson('OnLobbyListChanged', lobbyMap('1'));
      await settle();

      expect(session.getState()).toBe('connected');
      const errors = eventsOf('ProtocolError');
      expect(errors).toHaveLength(1);
      expect(errors[0].error).toBeInstanceOf(DecodeError);
      expect(session.world.hasLobby('1')).toBe(true);
    });

    it('reports a transport decode error without changing state', async () => {
      const channel = await connectAndAuthorize();

      channel.emit('error', new DecodeError('Split count 0 out of range', 12));
      await settle();

      expect(session.getState()).toBe('connected');
      expect(eventsOf('ProtocolError').map(({ error }) => error.message)).toEqual(['Split count 0 out of range']);
    });

    it('reports updates that contradict the world model', async () => {
      const channel = await connectAndAuthorize();

      channel.receiveJson('OnChatMessage', { author: 'S2', text: 'hi', lobbyId: '77' });
      await settle();

      expect(eventsOf('ProtocolError')[0].error).toBeInstanceOf(ProtocolViolationError);
    });

    it('degrades on a transport error and recovers on the next frame', async () => {
      const channel = await connectAndAuthorize();

      channel.emit('error', new Error('ECONNRESET'));
      await settle();
      expect(session.getState()).toBe('degraded');
      expect(session.isConnected()).toBe(true);

      channel.receiveJson('Pong');
      await settle();
      expect(session.getState()).toBe('connected');
    });

    it('reconnects on a fatal server error', async () => {
      const channel = await connectAndAuthorize();

      channel.receiveJson('OnError', { code: 'banned', message: 'Go away', fatal: true });
      await settle();

      expect(session.getState()).toBe('reconnecting');
      expect(session.getLastError()).toBeInstanceOf(ClosedError);
      expect(channel.closedLocally).toBe(true);
    });
  });

  describe('heartbeat', () => {
    it('pings, degrades when silent, recovers, then gives up after the grace period', async () => {
      const channel = await connectAndAuthorize();

      await advance(5000);
      expect(channel.sentTypes().slice(-2)).toEqual(['Ping', 'DoPing']);

      await advance(5000);
      await advance(5000);
      expect(session.getState()).toBe('connected');

      await advance(5000);
      expect(session.getState()).toBe('degraded');
      expect(session.getLastError()).toBeInstanceOf(TimeoutError);

      channel.receiveJson('Pong');
      await settle();
      expect(session.getState()).toBe('connected');

      for (let i = 0; i < 4; i++) {
        await advance(5000);
      }
      expect(session.getState()).toBe('degraded');

      await advance(5000);
      expect(session.getState()).toBe('degraded');

      await advance(5000);
      expect(session.getState()).toBe('reconnecting');
      expect(states).toEqual(['connecting', 'connected', 'degraded', 'connected', 'degraded', 'reconnecting']);
    });
  });

  describe('closing', () => {
    it('is terminal', async () => {
      const channel = await connectAndAuthorize();

      const closing = session.close();
      expect(session.close()).toBe(closing);
      await closing;

      expect(session.getState()).toBe('closed');
      expect(channel.closedLocally).toBe(true);
      await expect(session.connect()).rejects.toBeInstanceOf(SessionClosedError);
      await expect(session.sendChat('hello')).rejects.toBeInstanceOf(SessionClosedError);
      await expect(session.joinLobby('1')).rejects.toBeInstanceOf(SessionClosedError);
    });

    it('cancels a scheduled reconnect', async () => {
      const channel = await connectAndAuthorize();
      channel.dropFromServer();
      await settle();
      expect(session.getState()).toBe('reconnecting');

      await session.close();
      await advance(60000);

      expect(connector.connectCalls).toBe(1);
      expect(session.getState()).toBe('closed');
    });

    it('rejects a join still waiting for the server', async () => {
      await connectAndAuthorize();
      const outcome = session.joinLobby('1').catch((error: unknown) => error);
      await settle();

      await session.close();

      expect(await outcome).toBeInstanceOf(SessionClosedError);
    });
  });

  describe('raknet', () => {
    function lobbyListFrame(lobbyId: number): Uint8Array {
      return new ByteWriter()
        .u8(RAKNET_CONSTANTS.IDS.LOBBY_LIST)
        .u16(1, false)
        .u32(lobbyId, true)
        .str8('Skirmish')
        .str8('map1')
        .str8('0')
        .str8('S9')
        .u8(1)
        .u8(8)
        .u8(0)
        .toBytes();
    }

    beforeEach(async () => {
      await session.close();
      session = createSession('raknet');
    });

    it('pings on connect without authorizing', async () => {
      await session.connect();
      await settle();

      const sent = connector.latest.sent;
      expect(session.getState()).toBe('connected');
      expect(sent).toHaveLength(1);
      expect(sent[0][0]).toBe(RAKNET_CONSTANTS.IDS.UNCONNECTED_PING);
    });

    it('subscribes locally to a known lobby', async () => {
      await session.connect();
      await settle();
      const channel = connector.latest;

      await expect(session.joinLobby('7')).rejects.toBeInstanceOf(ProtocolViolationError);

      channel.receive(lobbyListFrame(7));
      await settle();

      await expect(session.joinLobby('7')).resolves.toBe('7');
      expect(session.getSubscribedLobbyId()).toBe('7');
      expect(channel.sent).toHaveLength(1);

      const chat = new ByteWriter()
        .u8(RAKNET_CONSTANTS.IDS.CHAT)
        .u32(7, true)
        .u64(1000n, false)
        .str8('S9')
        .str16('glhf')
        .toBytes();
      channel.receive(chat);
      await settle();

      expect(session.world.getChatHistory('7').map((message) => message.body)).toEqual(['glhf']);
    });

    it('keeps and logs the server info from a pong', async () => {
      const info = vi.spyOn(Logger.prototype, 'info').mockImplementation(() => undefined);
      await session.connect();
      await settle();
      expect(session.getServerInfo()).toBeNull();

      const pong = new ByteWriter()
        .u8(RAKNET_CONSTANTS.IDS.UNCONNECTED_PONG)
        .u64(BigInt(Date.now()), false)
        .u64(42n, false)
        .bytes(RAKNET_CONSTANTS.OFFLINE_MAGIC)
        .str16('Combat Commander lobby')
        .toBytes();
      connector.latest.receive(pong);
      await settle();

      expect(session.getServerInfo()).toBe('Combat Commander lobby');
      expect(info).toHaveBeenCalledWith(
        'Server info',
        expect.objectContaining({ latencyMs: 0, serverInfo: 'Combat Commander lobby' })
      );
      info.mockRestore();
    });

    it('does not support chat or lobby creation', async () => {
      await session.connect();
      await settle();

      expect(session.supports('chat')).toBe(false);
      await expect(session.sendChat('hello')).rejects.toBeInstanceOf(UnsupportedIntentError);
      await expect(session.createLobby({ name: 'Room' })).rejects.toBeInstanceOf(UnsupportedIntentError);
    });
  });
});
