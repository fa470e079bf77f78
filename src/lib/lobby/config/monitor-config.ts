/**
 * Lobby Monitor Configuration
 * Centralized configuration for monitor sessions
 */

import type { ProtocolVariant } from '../types';

export type GameId = 'bz98r' | 'bzcc';

export interface GameProfile {
  id: GameId;
  title: string;
  variant: ProtocolVariant;
  defaultAddress: string;
}

export const GAME_PROFILES: Record<GameId, GameProfile> = {
  bz98r: {
    id: 'bz98r',
    title: 'Battlezone 98 Redux',
    variant: 'websocket',
    defaultAddress: 'battlezone98mp.webdev.rebellion.co.uk:1337',
  },
  bzcc: {
    id: 'bzcc',
    title: 'Battlezone Combat Commander',
    variant: 'raknet',
    defaultAddress: 'battlezone99mp.webdev.rebellion.co.uk:61111',
  },
};

export interface ProxyConfig {
  /** socks4://, socks5:// or socks5h:// URL */
  url: string;
  /** Refuse to connect unless the pre-flight probe proves traffic leaves through the proxy */
  safetySwitch: boolean;
  /** Endpoint that answers with the caller's public address as plain text */
  verifyUrl: string;
}

export interface ReconnectPolicy {
  enabled: boolean;
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
  /** null means unlimited */
  maxAttempts: number | null;
}

export interface MonitorConfig {
  game: GameId;
  variant: ProtocolVariant;
  address: string;
  proxy: ProxyConfig | null;
  connectTimeoutMs: number;

  reconnect: ReconnectPolicy;

  heartbeat: {
    pingIntervalMs: number;
    timeoutMs: number;
    gracePeriodMs: number;
  };

  world: {
    staleThreshold: number;
    chatCapacity: number;
  };

  auth: {
    key: string;
    playerName: string | null;
    clientVersion: string;
  };

  eventQueueCapacity: number;
}

const DEFAULT_GAME: GameId = 'bz98r';

const defaultConfig: MonitorConfig = {
  game: DEFAULT_GAME,
  variant: GAME_PROFILES[DEFAULT_GAME].variant,
  address: GAME_PROFILES[DEFAULT_GAME].defaultAddress,
  proxy: null,
  connectTimeoutMs: 10000, // 10 seconds

  reconnect: {
    enabled: true,
    baseDelayMs: 1000, // 1 second
    maxDelayMs: 30000, // 30 seconds
    factor: 2,
    maxAttempts: 10,
  },

  heartbeat: {
    pingIntervalMs: 5000, // 5 seconds
    timeoutMs: 15000, // 15 seconds
    gracePeriodMs: 10000, // 10 seconds
  },

  world: {
    staleThreshold: 2,
    chatCapacity: 500,
  },

  auth: {
    key: '',
    playerName: null,
    clientVersion: '2.2.301',
  },

  eventQueueCapacity: 1000,
};

function isGameId(value: string | undefined): value is GameId {
  return value === 'bz98r' || value === 'bzcc';
}

function readFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') {
    return fallback;
  }
  return value === 'true' || value === '1';
}

type NestedSection = 'reconnect' | 'heartbeat' | 'world' | 'auth';

export type MonitorConfigOverrides = Partial<Omit<MonitorConfig, NestedSection>> & {
  [K in NestedSection]?: Partial<MonitorConfig[K]>;
};

/**
 * Build a config with every section filled in
 * Nested sections of `overrides` are merged over the defaults one level deep
 */
export function createMonitorConfig(overrides: MonitorConfigOverrides = {}): MonitorConfig {
  const game = overrides.game ?? defaultConfig.game;
  const profile = GAME_PROFILES[game];

  return {
    ...defaultConfig,
    ...overrides,
    game,
    variant: overrides.variant ?? profile.variant,
    address: overrides.address ?? profile.defaultAddress,
    reconnect: { ...defaultConfig.reconnect, ...overrides.reconnect },
    heartbeat: { ...defaultConfig.heartbeat, ...overrides.heartbeat },
    world: { ...defaultConfig.world, ...overrides.world },
    auth: { ...defaultConfig.auth, ...overrides.auth },
  };
}

/**
 * Get monitor configuration
 * Can be overridden via environment variables
 */
export function getMonitorConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  const game = isGameId(env.LOBBY_MONITOR_GAME) ? env.LOBBY_MONITOR_GAME : DEFAULT_GAME;
  const profile = GAME_PROFILES[game];
  const maxAttempts = Number(env.LOBBY_MONITOR_RECONNECT_MAX_ATTEMPTS);

  return {
    game,
    variant: profile.variant,
    address: env.LOBBY_MONITOR_ADDRESS || profile.defaultAddress,
    proxy: env.LOBBY_MONITOR_PROXY_URL
      ? {
          url: env.LOBBY_MONITOR_PROXY_URL,
          safetySwitch: readFlag(env.LOBBY_MONITOR_PROXY_SAFETY_SWITCH, true),
          verifyUrl: env.LOBBY_MONITOR_PROXY_VERIFY_URL || 'https://api.ipify.org',
        }
      : null,
    connectTimeoutMs: Number(env.LOBBY_MONITOR_CONNECT_TIMEOUT_MS) || defaultConfig.connectTimeoutMs,

    reconnect: {
      enabled: readFlag(env.LOBBY_MONITOR_RECONNECT, defaultConfig.reconnect.enabled),
      baseDelayMs: Number(env.LOBBY_MONITOR_RECONNECT_BASE_MS) || defaultConfig.reconnect.baseDelayMs,
      maxDelayMs: Number(env.LOBBY_MONITOR_RECONNECT_MAX_MS) || defaultConfig.reconnect.maxDelayMs,
      factor: Number(env.LOBBY_MONITOR_RECONNECT_FACTOR) || defaultConfig.reconnect.factor,
      // 0 = unlimited
      maxAttempts: env.LOBBY_MONITOR_RECONNECT_MAX_ATTEMPTS === '0'
        ? null
        : maxAttempts || defaultConfig.reconnect.maxAttempts,
    },

    heartbeat: {
      pingIntervalMs: Number(env.LOBBY_MONITOR_PING_INTERVAL_MS) || defaultConfig.heartbeat.pingIntervalMs,
      timeoutMs: Number(env.LOBBY_MONITOR_HEARTBEAT_TIMEOUT_MS) || defaultConfig.heartbeat.timeoutMs,
      gracePeriodMs: Number(env.LOBBY_MONITOR_GRACE_PERIOD_MS) || defaultConfig.heartbeat.gracePeriodMs,
    },

    world: {
      staleThreshold: Number(env.LOBBY_MONITOR_STALE_THRESHOLD) || defaultConfig.world.staleThreshold,
      chatCapacity: Number(env.LOBBY_MONITOR_CHAT_CAPACITY) || defaultConfig.world.chatCapacity,
    },

    auth: {
      key: env.LOBBY_MONITOR_AUTH_KEY || defaultConfig.auth.key,
      playerName: env.LOBBY_MONITOR_PLAYER_NAME || defaultConfig.auth.playerName,
      clientVersion: env.LOBBY_MONITOR_CLIENT_VERSION || defaultConfig.auth.clientVersion,
    },

    eventQueueCapacity: Number(env.LOBBY_MONITOR_EVENT_QUEUE_CAPACITY) || defaultConfig.eventQueueCapacity,
  };
}

// Re-export constants for convenience
export { WEBSOCKET_CONSTANTS, RAKNET_CONSTANTS } from '../constants';
