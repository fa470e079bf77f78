/**
 * Codec Types
 * Each protocol variant implements the same capability set
 */

import type { IntentKind, Message, OutgoingIntent, ProtocolVariant } from '../types';

export interface ProtocolCodec {
  readonly variant: ProtocolVariant;

  /** Intents `encode` accepts; anything else throws UnsupportedIntentError */
  readonly supportedIntents: ReadonlySet<IntentKind>;

  /** The server expects an `authorize` intent before anything else */
  readonly requiresAuthorization: boolean;

  /**
   * Decode one raw frame
   * @throws DecodeError for malformed, truncated or unrecognised frames
   */
  decode(frame: Uint8Array): Message;

  /**
   * Encode an intent into the frames to send, in order
   * @throws UnsupportedIntentError
   */
  encode(intent: OutgoingIntent): Uint8Array[];
}
