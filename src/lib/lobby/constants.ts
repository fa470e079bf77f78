/**
 * Lobby Monitor Constants
 * Centralized protocol constants
 */

export const WEBSOCKET_CONSTANTS = {
  // Connection close codes
  CLOSE_CODES: {
    NORMAL: 1000,
    ABNORMAL: 1006,
  },

  // Prefix the official client puts in front of chat lobby names
  CHAT_LOBBY_PREFIX: '~chat~pub~~',
  NAME_SEPARATOR: '~~',
  DEFAULT_MEMBER_LIMIT: 20000,
  AUTH_TYPE: 'web',
  API_VERSION: '0.0',
} as const;

export const RAKNET_CONSTANTS = {
  // Message ids; 0x01 and 0x1C travel unconnected, the rest inside frame sets
  IDS: {
    UNCONNECTED_PING: 0x01,
    DISCONNECTION_NOTIFICATION: 0x15,
    UNCONNECTED_PONG: 0x1c,
    LOBBY_LIST: 0x86,
    PLAYER_JOIN: 0x87,
    PLAYER_LEAVE: 0x88,
    CHAT: 0x89,
  },

  // Frame-set datagrams use ids 0x80..0x8F
  FRAME_SET_MIN: 0x80,
  FRAME_SET_MAX: 0x8f,
  SPLIT_FLAG: 0x10,

  OFFLINE_MAGIC: Uint8Array.from([
    0x00, 0xff, 0xff, 0x00, 0xfe, 0xfe, 0xfe, 0xfe,
    0xfd, 0xfd, 0xfd, 0xfd, 0x12, 0x34, 0x56, 0x78,
  ]),

  DEFAULT_PORT: 61111,
  MAX_DATAGRAM_SIZE: 4096,
} as const;
