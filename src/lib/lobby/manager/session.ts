/**
 * Session
 * Connection lifecycle, world model updates and intents for one monitored server
 *
 * Every mutation runs as a task on one serial queue: decoded frames, heartbeat ticks,
 * reconnect timers, transport notifications and intents are all posted into it, so the
 * world model and session fields have a single writer. Connecting and receiving happen
 * outside the queue and post their results back in.
 */

import { randomBytes } from 'node:crypto';
import { v7 as uuidv7 } from 'uuid';
import { createCodec } from '../codec';
import { createConnector } from '../client';
import { WEBSOCKET_CONSTANTS } from '../constants';
import {
  ClosedError,
  ConnectError,
  DecodeError,
  IntentRejectedError,
  LobbyMonitorError,
  NotConnectedError,
  NotSubscribedError,
  ProtocolViolationError,
  SessionClosedError,
  TimeoutError,
  UnsupportedIntentError,
  toError,
} from '../errors';
import { EventBus } from '../events/event-bus';
import { WorldModel } from '../world/world-model';
import { HandlerRegistry } from './handler-registry';
import { ReconnectSupervisor } from './reconnect-supervisor';
import { RequestTracker } from './request-tracker';
import { logger } from '../../utils/logger';
import type { FrameChannel, TransportConnector } from '../client/types';
import type { ProtocolCodec } from '../codec/types';
import type { MonitorConfig } from '../config/monitor-config';
import type {
  ChatDirection,
  ConnectionState,
  CreateLobbyParams,
  DomainEvent,
  IntentKind,
  LobbyLeftReason,
  Message,
  MessageOf,
  OutgoingIntent,
} from '../types';

export interface SessionOptions {
  config: MonitorConfig;
  /** Defaults to the transport matching `config.variant` */
  connector?: TransportConnector;
  /** Defaults to the codec matching `config.variant` */
  codec?: ProtocolCodec;
  /** Defaults to a bus sized by `config.eventQueueCapacity` */
  bus?: EventBus;
  /** How long join and create wait for the server's answer */
  requestTimeoutMs?: number;
  now?: () => number;
}

/**
 * Read-only queries over the session's world model
 */
export type WorldView = Pick<
  WorldModel,
  'getLobbies' | 'getLobby' | 'hasLobby' | 'getPlayers' | 'getPlayer' | 'getChatHistory'
>;

interface Subscription {
  lobbyId: string;
  password: string;
}

interface StateChange {
  attempt?: number;
  error?: LobbyMonitorError;
}

const JOIN_REQUEST = 'join';
const CREATE_REQUEST = 'create';

export class Session {
  readonly sessionId = uuidv7();
  private readonly log = logger.child({ sessionId: this.sessionId });
  readonly events: EventBus;
  readonly world: WorldView;

  private readonly config: MonitorConfig;
  private readonly connector: TransportConnector;
  private readonly codec: ProtocolCodec;
  private readonly model: WorldModel;
  private readonly supervisor: ReconnectSupervisor;
  private readonly handlerRegistry = new HandlerRegistry();
  private readonly requestTracker: RequestTracker<string>;
  private readonly now: () => number;

  private state: ConnectionState = 'disconnected';
  private channel: FrameChannel | null = null;
  private channelListeners: Array<() => void> = [];
  private connectGeneration = 0;
  private tasks: Promise<void> = Promise.resolve();
  private closing: Promise<void> | null = null;

  private subscription: Subscription | null = null;
  private pendingJoin: Subscription | null = null;
  private pendingCreateName: string | null = null;
  private selfId: string | null = null;
  private serverInfo: string | null = null;
  private lastError: LobbyMonitorError | null = null;
  private outbox: OutgoingIntent[] = [];

  // Heartbeat
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private lastFrameAt = 0;
  private degradedAt: number | null = null;

  private stateChangeCallbacks = new Set<(state: ConnectionState) => void>();

  constructor(options: SessionOptions) {
    this.config = options.config;
    this.connector = options.connector ?? createConnector(options.config);
    this.codec =
      options.codec ??
      createCodec(options.config.variant, { clientGuid: randomBytes(8).readBigUInt64BE(), now: options.now });
    if (this.codec.variant !== this.connector.variant) {
      throw new RangeError(`Codec ${this.codec.variant} cannot run over a ${this.connector.variant} transport`);
    }

    this.events = options.bus ?? new EventBus(options.config.eventQueueCapacity);
    this.model = new WorldModel({
      variant: this.codec.variant,
      staleThreshold: options.config.world.staleThreshold,
      chatCapacity: options.config.world.chatCapacity,
    });
    this.world = this.model;
    this.supervisor = new ReconnectSupervisor(options.config.reconnect);
    this.requestTracker = new RequestTracker<string>(options.requestTimeoutMs ?? options.config.connectTimeoutMs);
    this.now = options.now ?? Date.now;

    this.registerHandlers();
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Start connecting; progress is reported through ConnectionStateChanged events
   */
  connect(): Promise<void> {
    return this.post(() => {
      this.assertNotClosed();
      if (this.state !== 'disconnected') {
        this.log.warn('Session already connecting or connected', this.logContext());
        return;
      }
      this.supervisor.reset();
      this.beginConnect();
    });
  }

  /**
   * Drop the connection and any scheduled retry; the subscription is kept for the next connect()
   */
  disconnect(): Promise<void> {
    return this.post(() => {
      this.assertNotClosed();
      this.supervisor.reset();
      this.connectGeneration++;
      this.dropChannel(new NotConnectedError('disconnected'));
      this.setState('disconnected');
    });
  }

  /**
   * Terminal: cancels timers, closes the transport and rejects every later intent
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.post(() => {
        this.supervisor.cancel();
        this.connectGeneration++;
        this.dropChannel(new SessionClosedError());
        this.setState('closed', { error: this.lastError ?? undefined });
        this.stateChangeCallbacks.clear();
      });
    }
    return this.closing;
  }

  // ==========================================================================
  // Intents
  // ==========================================================================

  /**
   * Subscribe to a lobby; resolves with the joined lobby id
   */
  async joinLobby(lobbyId: string, password = ''): Promise<string> {
    const pending = await this.post(async () => {
      this.assertNotClosed();
      if (this.subscription) {
        throw new IntentRejectedError(`Already in lobby ${this.subscription.lobbyId}; leave it first`);
      }
      this.assertNoPendingLobbyRequest();

      if (!this.supports('join')) {
        // Monitoring-only protocol: subscriptions are local
        if (!this.model.hasLobby(lobbyId)) {
          throw new ProtocolViolationError(`Unknown lobby ${lobbyId}`);
        }
        this.subscribe({ lobbyId, password }, false);
        return { ack: Promise.resolve(lobbyId) };
      }

      this.assertConnected();
      await this.send({ kind: 'join', lobbyId, password });
      this.pendingJoin = { lobbyId, password };
      return { ack: this.requestTracker.trackRequest(JOIN_REQUEST, 'join') };
    });
    return pending.ack;
  }

  /**
   * Leave the subscribed lobby
   */
  leaveLobby(): Promise<void> {
    return this.post(async () => {
      this.assertNotClosed();
      const subscription = this.subscription;
      if (!subscription) {
        throw new NotSubscribedError();
      }

      if (this.supports('leave') && this.channel) {
        await this.send({ kind: 'leave', lobbyId: subscription.lobbyId });
      }
      this.unsubscribe('requested');
    });
  }

  sendChat(text: string): Promise<void> {
    return this.post(async () => {
      this.assertNotClosed();
      if (!text.trim()) {
        throw new IntentRejectedError('Chat text is empty');
      }
      if (!this.supports('chat')) {
        throw new UnsupportedIntentError('chat', this.codec.variant);
      }
      if (!this.subscription) {
        throw new NotSubscribedError();
      }
      this.assertConnected();
      await this.send({ kind: 'chat', text });
    });
  }

  /**
   * Create a lobby and join it; resolves with the new lobby id
   */
  async createLobby(params: CreateLobbyParams): Promise<string> {
    const pending = await this.post(async () => {
      this.assertNotClosed();
      if (!this.supports('create')) {
        throw new UnsupportedIntentError('create', this.codec.variant);
      }
      if (!params.name.trim()) {
        throw new IntentRejectedError('Lobby name is empty');
      }
      if (this.subscription) {
        throw new IntentRejectedError(`Already in lobby ${this.subscription.lobbyId}; leave it first`);
      }
      this.assertNoPendingLobbyRequest();
      this.assertConnected();

      const name = params.chatLobby === false ? params.name : `${WEBSOCKET_CONSTANTS.CHAT_LOBBY_PREFIX}${params.name}`;
      await this.send({
        kind: 'create',
        name,
        isPrivate: params.isPrivate ?? false,
        memberLimit: params.memberLimit ?? WEBSOCKET_CONSTANTS.DEFAULT_MEMBER_LIMIT,
        password: params.password ?? '',
      });
      this.pendingCreateName = name;
      return { ack: this.requestTracker.trackRequest(CREATE_REQUEST, 'create') };
    });
    return pending.ack;
  }

  /**
   * Ask the server for a fresh lobby list
   */
  refreshLounge(): Promise<void> {
    return this.post(async () => {
      this.assertNotClosed();
      this.assertConnected();
      if (this.supports('getLobbyList')) {
        await this.send({ kind: 'enterLounge' });
        await this.send({ kind: 'getLobbyList' });
        return;
      }
      await this.send({ kind: 'ping', sentAt: this.now() });
    });
  }

  ping(): Promise<void> {
    return this.post(async () => {
      this.assertNotClosed();
      this.assertConnected();
      await this.send({ kind: 'ping', sentAt: this.now() });
    });
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === 'connected' || this.state === 'degraded';
  }

  getSubscribedLobbyId(): string | null {
    return this.subscription?.lobbyId ?? null;
  }

  /**
   * Player id the server assigned on authorization
   */
  getSelfId(): string | null {
    return this.selfId;
  }

  /**
   * Server description from the latest pong, on variants that report one
   */
  getServerInfo(): string | null {
    return this.serverInfo;
  }

  getLastError(): LobbyMonitorError | null {
    return this.lastError;
  }

  getReconnectAttempts(): number {
    return this.supervisor.getAttempts();
  }

  supports(intent: IntentKind): boolean {
    return this.codec.supportedIntents.has(intent);
  }

  /**
   * Subscribe to state changes
   */
  onStateChange(callback: (state: ConnectionState) => void): () => void {
    this.stateChangeCallbacks.add(callback);
    return () => {
      this.stateChangeCallbacks.delete(callback);
    };
  }

  /**
   * Resolve once every task posted so far has run
   */
  idle(): Promise<void> {
    return this.tasks;
  }

  // ==========================================================================
  // Serial task queue
  // ==========================================================================

  private post<T>(task: () => T | Promise<T>): Promise<T> {
    const run = this.tasks.then(task);
    // The queue only orders tasks; each caller sees its own task's outcome
    this.tasks = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Post from a timer or transport callback, where nobody awaits the result
   */
  private postDetached(label: string, task: () => void | Promise<void>): void {
    this.post(task).catch((error: unknown) => {
      this.log.error(`Session task failed: ${label}`, error, this.logContext());
    });
  }

  // ==========================================================================
  // Connecting
  // ==========================================================================

  private beginConnect(): void {
    const generation = ++this.connectGeneration;
    this.setState('connecting');

    Promise.resolve()
      .then(() => this.connector.connect(this.config.address, this.config.proxy))
      .then(
        (channel) => this.post(() => this.onChannelOpen(channel, generation)),
        (error: unknown) => this.post(() => this.onConnectFailed(error, generation))
      )
      .catch((error: unknown) => {
        this.log.error('Failed to settle connection attempt', error, this.logContext());
      });
  }

  private async onChannelOpen(channel: FrameChannel, generation: number): Promise<void> {
    if (generation !== this.connectGeneration || this.state !== 'connecting') {
      channel.close();
      return;
    }

    this.attachChannel(channel);
    const attempt = this.supervisor.getAttempts();
    this.supervisor.reset();
    this.lastError = null;
    this.setState('connected', { attempt });

    if (this.codec.requiresAuthorization) {
      this.outbox.push({
        kind: 'authorize',
        key: this.config.auth.key,
        name: this.config.auth.playerName,
        clientVersion: this.config.auth.clientVersion,
      });
    } else {
      this.queueReadyIntents();
    }
    await this.flushOutbox();
  }

  private onConnectFailed(error: unknown, generation: number): void {
    if (generation !== this.connectGeneration || this.state !== 'connecting') {
      return;
    }

    const failure =
      error instanceof LobbyMonitorError
        ? error
        : new ConnectError(`Could not connect to ${this.config.address}: ${toError(error).message}`, {
            cause: error,
          });
    this.log.warn('Connection attempt failed', { ...this.logContext(), error: failure.message });
    this.handleConnectionLoss(failure);
  }

  private attachChannel(channel: FrameChannel): void {
    this.channel = channel;
    this.lastFrameAt = this.now();
    this.degradedAt = null;

    this.channelListeners = [
      channel.on('error', (error) => {
        this.postDetached('transport error', () => this.onTransportError(channel, error));
      }),
    ];

    this.startHeartbeat();
    this.receiveLoop(channel).catch((error: unknown) => {
      this.log.error('Receive loop failed', error, this.logContext());
    });
  }

  /**
   * Close the transport and forget everything tied to it
   */
  private dropChannel(reason: Error): void {
    this.stopHeartbeat();
    this.channelListeners.forEach((unsubscribe) => unsubscribe());
    this.channelListeners = [];

    const channel = this.channel;
    this.channel = null;
    channel?.close();

    this.degradedAt = null;
    this.outbox = [];
    this.pendingJoin = null;
    this.pendingCreateName = null;
    this.requestTracker.clear(reason);
  }

  /**
   * Transport is gone: schedule a retry, or settle in Disconnected when the policy says stop
   */
  private handleConnectionLoss(error: LobbyMonitorError): void {
    this.lastError = error;
    this.dropChannel(error);

    const scheduled = this.supervisor.schedule(() => {
      this.postDetached('reconnect', () => {
        if (this.state === 'reconnecting') {
          this.beginConnect();
        }
      });
    });

    if (!scheduled) {
      this.setState('disconnected', { error });
      return;
    }
    this.setState('reconnecting', { attempt: scheduled.attempt, error });
  }

  // ==========================================================================
  // Receiving
  // ==========================================================================

  private async receiveLoop(channel: FrameChannel): Promise<void> {
    for (;;) {
      let frame: Uint8Array;
      try {
        frame = await channel.receiveFrame();
      } catch (error) {
        await this.post(() => this.onChannelClosed(channel, error));
        return;
      }
      await this.post(() => this.handleFrame(channel, frame));
    }
  }

  private onChannelClosed(channel: FrameChannel, error: unknown): void {
    if (channel !== this.channel) {
      return;
    }

    const closed = error instanceof LobbyMonitorError ? error : new ClosedError(toError(error).message);
    this.log.warn('Transport closed', { ...this.logContext(), error: closed.message });
    this.handleConnectionLoss(closed);
  }

  private onTransportError(channel: FrameChannel, error: Error): void {
    if (channel !== this.channel) {
      return;
    }

    if (error instanceof DecodeError) {
      this.reportProtocolError(error);
      return;
    }

    this.log.warn('Transport error', { ...this.logContext(), error: error.message });
    if (this.state === 'connected') {
      const degraded = new ClosedError(`Transport error: ${error.message}`);
      this.lastError = degraded;
      this.degradedAt = this.now();
      this.setState('degraded', { error: degraded });
    }
  }

  private async handleFrame(channel: FrameChannel, frame: Uint8Array): Promise<void> {
    if (channel !== this.channel) {
      return;
    }

    this.lastFrameAt = this.now();
    if (this.state === 'degraded') {
      this.degradedAt = null;
      this.setState('connected');
    }

    let message: Message;
    try {
      message = this.codec.decode(frame);
    } catch (error) {
      this.reportProtocolError(error);
      return;
    }

    try {
      if (!this.handlerRegistry.routeMessage(message)) {
        this.log.warn('Unhandled message kind', { ...this.logContext(), kind: message.kind });
      }
    } catch (error) {
      this.reportProtocolError(error);
    }

    await this.flushOutbox();
  }

  private reportProtocolError(error: unknown): void {
    if (!(error instanceof LobbyMonitorError)) {
      this.log.error('Failed to apply message', error, this.logContext());
      return;
    }

    this.log.warn('Dropped frame', { ...this.logContext(), code: error.code, error: error.message });
    this.publish({ type: 'ProtocolError', error });
  }

  // ==========================================================================
  // Message handlers
  // ==========================================================================

  private registerHandlers(): void {
    this.handlerRegistry.registerHandler('authorized', (message) => this.onAuthorized(message));
    this.handlerRegistry.registerHandler('lobbyList', (message) => this.onLobbyList(message));
    this.handlerRegistry.registerHandler('lobbyRemoved', (message) => this.onLobbyRemoved(message));
    this.handlerRegistry.registerHandler('lobbyJoined', (message) => this.onLobbyJoined(message));
    this.handlerRegistry.registerHandler('chat', (message) => this.onChat(message));
    this.handlerRegistry.registerHandler('playerJoined', (message) => this.onPlayerJoined(message));
    this.handlerRegistry.registerHandler('playerLeft', (message) => this.onPlayerLeft(message));
    this.handlerRegistry.registerHandler('playerUpdated', (message) => {
      this.model.applyPlayerUpdate(message.player);
    });
    this.handlerRegistry.registerHandler('heartbeat', (message) => this.onHeartbeat(message));
    this.handlerRegistry.registerHandler('notice', (message) => {
      this.log.debug('Server notice', { ...this.logContext(), type: message.type, detail: message.detail });
    });
    this.handlerRegistry.registerHandler('error', (message) => this.onServerError(message));
  }

  private onAuthorized(message: MessageOf<'authorized'>): void {
    if (!message.success) {
      const error = new ConnectError('Server rejected the authorization');
      this.log.error('Authorization rejected', error, this.logContext());
      this.lastError = error;
      this.supervisor.reset();
      this.dropChannel(error);
      this.setState('disconnected', { error });
      return;
    }

    this.selfId = message.selfId;
    this.log.info('Authorized', { ...this.logContext(), playerId: message.selfId ?? undefined });
    this.queueReadyIntents();
  }

  /**
   * Lounge entry and the preserved subscription, once the server accepts intents
   */
  private queueReadyIntents(): void {
    if (this.supports('enterLounge')) {
      const name = this.config.auth.playerName || `User_${this.selfId ?? '0'}`;
      this.outbox.push(
        { kind: 'enterLounge' },
        { kind: 'setPlayerData', key: 'name', value: name },
        { kind: 'setPlayerData', key: 'playerName', value: name },
        { kind: 'setPlayerData', key: 'clientVersion', value: this.config.auth.clientVersion },
        { kind: 'setPlayerData', key: 'authType', value: WEBSOCKET_CONSTANTS.AUTH_TYPE },
        { kind: 'getLobbyList' }
      );
    } else {
      this.outbox.push({ kind: 'ping', sentAt: this.now() });
    }

    const subscription = this.subscription;
    if (subscription && this.supports('join')) {
      this.log.info('Re-joining lobby after reconnect', { ...this.logContext(), lobbyId: subscription.lobbyId });
      this.outbox.push({ kind: 'join', lobbyId: subscription.lobbyId, password: subscription.password });
    }
  }

  private onLobbyList(message: MessageOf<'lobbyList'>): void {
    const result = this.model.applyLobbyListUpdate(message.lobbies, { full: message.full });

    for (const { lobbyId, playerId } of result.left) {
      this.publish({ type: 'PlayerLeft', lobbyId, playerId });
    }
    for (const { lobbyId, player } of result.joined) {
      this.publish({ type: 'PlayerJoined', lobbyId, player });
    }

    this.publish({
      type: 'LobbyListChanged',
      lobbies: this.model.getLobbies(),
      added: result.added,
      removed: result.removed,
    });

    const subscribed = this.subscription?.lobbyId;
    if (subscribed === undefined) {
      return;
    }
    if (result.removed.includes(subscribed)) {
      this.unsubscribe('removed');
    } else if (result.left.some((move) => move.lobbyId === subscribed && move.playerId === this.selfId)) {
      // The member list no longer has us
      this.unsubscribe('kicked');
    }
  }

  private onLobbyRemoved(message: MessageOf<'lobbyRemoved'>): void {
    if (!this.model.removeLobby(message.lobbyId)) {
      this.log.debug('Removal of unknown lobby', { ...this.logContext(), lobbyId: message.lobbyId });
      return;
    }

    this.publish({
      type: 'LobbyListChanged',
      lobbies: this.model.getLobbies(),
      added: [],
      removed: [message.lobbyId],
    });

    if (this.subscription?.lobbyId === message.lobbyId) {
      this.unsubscribe('removed');
    }
  }

  private onLobbyJoined(message: MessageOf<'lobbyJoined'>): void {
    const requestKey = message.created ? CREATE_REQUEST : JOIN_REQUEST;

    if (!message.success) {
      const error = new IntentRejectedError(message.reason ?? 'Server refused the lobby request');
      if (!this.requestTracker.rejectRequest(requestKey, error) && this.subscription) {
        // The re-join after a reconnect was refused
        this.log.warn('Re-join refused', { ...this.logContext(), error: error.message });
        this.unsubscribe('kicked');
      }
      this.pendingJoin = null;
      this.pendingCreateName = null;
      return;
    }

    const lobbyId = message.lobbyId ?? this.pendingJoin?.lobbyId ?? this.subscription?.lobbyId;
    if (!lobbyId) {
      throw new ProtocolViolationError('Lobby joined without a lobby id');
    }

    const password = this.pendingJoin?.password ?? this.subscription?.password ?? '';
    const createdName = this.pendingCreateName;
    this.pendingJoin = null;
    this.pendingCreateName = null;

    this.subscribe({ lobbyId, password }, message.created);
    this.requestTracker.matchAck(requestKey, lobbyId);

    if (message.created && createdName !== null) {
      const version = this.config.auth.clientVersion;
      this.outbox.push(
        { kind: 'setLobbyData', key: 'clientVersion', value: version },
        { kind: 'setLobbyData', key: 'GameVersion', value: version },
        { kind: 'setLobbyData', key: 'gameType', value: '1' },
        { kind: 'setLobbyData', key: 'gameSettings', value: '*' },
        { kind: 'setLobbyData', key: 'name', value: createdName }
      );
    }
  }

  private onChat(message: MessageOf<'chat'>): void {
    const lobbyId = message.lobbyId ?? this.subscription?.lobbyId;
    if (!lobbyId) {
      throw new ProtocolViolationError('Chat without a lobby while not subscribed');
    }

    let direction: ChatDirection = 'incoming';
    if (message.senderId === null) {
      direction = 'system';
    } else if (this.selfId !== null && message.senderId === this.selfId) {
      direction = 'outgoing';
    }

    const chat = this.model.applyChat(lobbyId, {
      senderId: message.senderId,
      body: message.body,
      timestamp: message.timestamp,
      direction,
    });
    this.publish({ type: 'ChatReceived', message: chat });
  }

  private onPlayerJoined(message: MessageOf<'playerJoined'>): void {
    const player = this.model.applyPlayerJoin(message.lobbyId, message.player);
    if (player) {
      this.publish({ type: 'PlayerJoined', lobbyId: message.lobbyId, player });
    }
  }

  private onPlayerLeft(message: MessageOf<'playerLeft'>): void {
    const kicked = message.playerId === this.selfId && this.subscription?.lobbyId === message.lobbyId;
    try {
      this.model.applyPlayerLeave(message.lobbyId, message.playerId);
      this.publish({ type: 'PlayerLeft', lobbyId: message.lobbyId, playerId: message.playerId });
    } finally {
      // Our own removal ends the subscription even when the member list never listed us
      if (kicked) {
        this.unsubscribe('kicked');
      }
    }
  }

  private onHeartbeat(message: MessageOf<'heartbeat'>): void {
    if (message.serverInfo === undefined) {
      this.log.debug('Heartbeat', { ...this.logContext(), latencyMs: message.latencyMs });
      return;
    }
    this.serverInfo = message.serverInfo;
    this.log.info('Server info', { ...this.logContext(), latencyMs: message.latencyMs, serverInfo: message.serverInfo });
  }

  private onServerError(message: MessageOf<'error'>): void {
    if (message.fatal) {
      this.handleConnectionLoss(new ClosedError(`Server error ${message.code}: ${message.message}`));
      return;
    }

    // Non-fatal errors answer the request in flight, when there is one
    const pendingKey = this.requestTracker.oldestKey();
    if (pendingKey) {
      this.pendingJoin = null;
      this.pendingCreateName = null;
      this.requestTracker.rejectRequest(pendingKey, new IntentRejectedError(message.message));
      return;
    }
    this.log.warn('Server error', { ...this.logContext(), code: message.code, error: message.message });
  }

  // ==========================================================================
  // Heartbeat
  // ==========================================================================

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => {
      this.postDetached('heartbeat', () => this.heartbeatTick());
    }, this.config.heartbeat.pingIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private async heartbeatTick(): Promise<void> {
    if (!this.channel || !this.isConnected()) {
      return;
    }

    const now = this.now();
    const { timeoutMs, gracePeriodMs } = this.config.heartbeat;

    if (this.state === 'degraded' && this.degradedAt !== null && now - this.degradedAt >= gracePeriodMs) {
      this.log.warn('Grace period elapsed without traffic', this.logContext());
      this.handleConnectionLoss(new TimeoutError(`No recovery within ${gracePeriodMs}ms`));
      return;
    }

    const silentFor = now - this.lastFrameAt;
    if (this.state === 'connected' && silentFor > timeoutMs) {
      const error = new TimeoutError(`No frame received for ${silentFor}ms`);
      this.lastError = error;
      this.degradedAt = now;
      this.setState('degraded', { error });
    }

    try {
      await this.send({ kind: 'ping', sentAt: now });
    } catch (error) {
      this.log.warn('Ping failed', { ...this.logContext(), error: toError(error).message });
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async send(intent: OutgoingIntent): Promise<void> {
    const channel = this.channel;
    if (!channel) {
      throw new NotConnectedError(this.state);
    }

    for (const frame of this.codec.encode(intent)) {
      await channel.sendFrame(frame);
    }
    this.log.debug('Sent intent', { ...this.logContext(), intent: intent.kind });
  }

  private async flushOutbox(): Promise<void> {
    const intents = this.outbox;
    this.outbox = [];
    for (const intent of intents) {
      try {
        await this.send(intent);
      } catch (error) {
        // A dead transport shows up in the receive loop; the rest of the batch is moot
        this.log.warn('Dropping queued intent', {
          ...this.logContext(),
          intent: intent.kind,
          error: toError(error).message,
        });
        return;
      }
    }
  }

  private subscribe(subscription: Subscription, created: boolean): void {
    const rejoin = this.subscription?.lobbyId === subscription.lobbyId;
    this.subscription = subscription;
    if (!rejoin) {
      this.log.info('Joined lobby', { ...this.logContext(), lobbyId: subscription.lobbyId });
    }
    this.publish({ type: 'LobbyJoined', lobbyId: subscription.lobbyId, created });
  }

  private unsubscribe(reason: LobbyLeftReason): void {
    const subscription = this.subscription;
    if (!subscription) {
      return;
    }
    this.subscription = null;
    this.log.info('Left lobby', { ...this.logContext(), lobbyId: subscription.lobbyId, reason });
    this.publish({ type: 'LobbyLeft', lobbyId: subscription.lobbyId, reason });
  }

  private setState(next: ConnectionState, change: StateChange = {}): void {
    const previous = this.state;
    if (previous === next && !change.error) {
      return;
    }
    this.state = next;

    const attempt = change.attempt ?? this.supervisor.getAttempts();
    this.log.info('Connection state changed', {
      ...this.logContext(),
      previous,
      attempt,
      error: change.error?.message,
    });

    this.publish({ type: 'ConnectionStateChanged', previous, state: next, attempt, error: change.error });
    this.stateChangeCallbacks.forEach((callback) => callback(next));
  }

  private publish(event: DomainEvent): void {
    this.events.publish(event);
  }

  private assertNotClosed(): void {
    if (this.state === 'closed' || this.closing) {
      throw new SessionClosedError();
    }
  }

  private assertConnected(): void {
    if (!this.channel || !this.isConnected()) {
      throw new NotConnectedError(this.state);
    }
  }

  private assertNoPendingLobbyRequest(): void {
    if (this.requestTracker.has(JOIN_REQUEST) || this.requestTracker.has(CREATE_REQUEST)) {
      throw new IntentRejectedError('Another join or create is waiting for the server');
    }
  }

  private logContext(): { state: ConnectionState; connectionId?: string } {
    return { state: this.state, connectionId: this.channel?.connectionId };
  }
}
