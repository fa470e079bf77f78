/**
 * Codec selection by protocol variant
 */

import { RakNetCodec, type RakNetCodecOptions } from './raknet-codec';
import { WebSocketCodec } from './websocket-codec';
import type { ProtocolCodec } from './types';
import type { ProtocolVariant } from '../types';

export function createCodec(variant: ProtocolVariant, options: RakNetCodecOptions = {}): ProtocolCodec {
  switch (variant) {
    case 'websocket':
      return new WebSocketCodec();
    case 'raknet':
      return new RakNetCodec(options);
  }
}

export { WebSocketCodec, parseLobby, parsePlayer, parsePlayerUpdate } from './websocket-codec';
export { RakNetCodec } from './raknet-codec';
export { ByteReader, ByteWriter } from './byte-buffer';
export type { ProtocolCodec } from './types';
export type { RakNetCodecOptions } from './raknet-codec';
