/**
 * What the shipped consumers need from a session
 */

import type { Session } from '../lobby';

export type ConsumerSession = Pick<
  Session,
  'events' | 'world' | 'sendChat' | 'getSubscribedLobbyId' | 'getSelfId'
>;
