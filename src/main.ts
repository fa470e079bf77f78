#!/usr/bin/env node
/**
 * Headless lobby monitor
 * Connects with the configuration from the environment and logs every event until interrupted
 */

import { Session, getMonitorConfig, GAME_PROFILES } from './lib/lobby';
import { Announcer, AutoGreeter, EventLogger } from './lib/consumers';
import { logger } from './lib/utils/logger';

function main(env: NodeJS.ProcessEnv = process.env): void {
  const config = getMonitorConfig(env);
  const session = new Session({ config });

  logger.info('Starting lobby monitor', {
    sessionId: session.sessionId,
    game: GAME_PROFILES[config.game].title,
    address: config.address,
    proxied: config.proxy !== null,
  });

  const eventLogger = new EventLogger(session.events);
  eventLogger.start();

  const greeter = env.LOBBY_MONITOR_GREETING
    ? new AutoGreeter(session, { template: env.LOBBY_MONITOR_GREETING })
    : null;
  greeter?.start();

  const announcements = (env.LOBBY_MONITOR_ANNOUNCEMENTS ?? '')
    .split('|')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  const announcer = announcements.length > 0
    ? new Announcer(session, {
        messages: announcements,
        intervalMs: Number(env.LOBBY_MONITOR_ANNOUNCE_INTERVAL_MS) || 10 * 60 * 1000,
      })
    : null;
  announcer?.start();

  // Join the requested lobby once the first lobby list shows up
  const lobbyToJoin = env.LOBBY_MONITOR_JOIN_LOBBY;
  if (lobbyToJoin) {
    const unsubscribe = session.events.on('LobbyListChanged', async (event) => {
      if (session.getSubscribedLobbyId() || !event.lobbies.some((lobby) => lobby.id === lobbyToJoin)) {
        return;
      }
      unsubscribe();
      try {
        await session.joinLobby(lobbyToJoin);
      } catch (error) {
        logger.error('Could not join lobby', error, { lobbyId: lobbyToJoin });
      }
    });
  }

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info('Shutting down', { signal });

    announcer?.stop();
    greeter?.stop();
    session
      .close()
      .then(() => session.events.flush())
      .then(() => {
        eventLogger.stop();
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('Shutdown failed', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  session.connect().catch((error: unknown) => {
    logger.error('Could not start session', error);
    process.exit(1);
  });
}

main();
