/**
 * In-memory session for consumer tests
 */

import { vi, type Mock } from 'vitest';
import { EventBus, WorldModel } from '../lobby';
import type { ChatDirection, ChatMessage, PlayerEntry } from '../lobby';
import type { ConsumerSession } from './types';

export interface TestSession extends ConsumerSession {
  world: WorldModel;
  sendChat: Mock<(text: string) => Promise<void>>;
  subscribedLobbyId: string | null;
  selfId: string | null;
}

export function createTestSession(): TestSession {
  const session: TestSession = {
    events: new EventBus(),
    world: new WorldModel({ variant: 'websocket', staleThreshold: 2, chatCapacity: 50 }),
    sendChat: vi.fn<(text: string) => Promise<void>>().mockResolvedValue(undefined),
    subscribedLobbyId: 'L1',
    selfId: 'S100',
    getSubscribedLobbyId: () => session.subscribedLobbyId,
    getSelfId: () => session.selfId,
  };
  return session;
}

export function addLobby(session: TestSession, lobbyId: string, members: PlayerEntry[] = []): void {
  session.world.applyLobbyListUpdate(
    [
      {
        id: lobbyId,
        name: `Lobby ${lobbyId}`,
        rawName: `Lobby ${lobbyId}`,
        mapId: null,
        modIds: [],
        playerCount: members.length,
        capacity: 8,
        locked: false,
        isPrivate: false,
        hostId: null,
        gameType: null,
        clientVersion: null,
        launched: false,
        members,
      },
    ],
    { full: false }
  );
}

export function chatMessage(
  body: string,
  senderId: string | null,
  direction: ChatDirection = 'incoming',
  lobbyId = 'L1'
): ChatMessage {
  return { id: `chat-${body}`, timestamp: 1000, senderId, lobbyId, body, direction };
}
