import { describe, it, expect, beforeEach } from 'vitest';
import { AutoGreeter, renderGreeting } from './auto-greeter';
import { createTestSession, type TestSession } from './test-session';
import { NotConnectedError, type Player } from '../lobby';

function player(id: string, displayName: string, lobbyId = 'L1'): Player {
  return { id, displayName, authKind: 'steam', metadata: {}, lobbyId };
}

describe('renderGreeting', () => {
  it('replaces every name placeholder', () => {
    expect(renderGreeting('Welcome {name}! Good luck, {name}.', 'Pilot')).toBe('Welcome Pilot! Good luck, Pilot.');
  });
});

describe('AutoGreeter', () => {
  let session: TestSession;
  let clock: number;
  let greeter: AutoGreeter;

  beforeEach(() => {
    session = createTestSession();
    clock = 0;
    greeter = new AutoGreeter(session, { template: 'Hi {name}', cooldownMs: 1000, now: () => clock });
    greeter.start();
  });

  async function join(joined: Player): Promise<void> {
    session.events.publish({ type: 'PlayerJoined', lobbyId: joined.lobbyId ?? 'L1', player: joined });
    await session.events.flush();
  }

  it('greets players joining the subscribed lobby', async () => {
    await join(player('S2', 'Pilot'));
    expect(session.sendChat).toHaveBeenCalledWith('Hi Pilot');
  });

  it('ignores itself and other lobbies', async () => {
    await join(player('S100', 'Monitor'));
    await join(player('S3', 'Elsewhere', 'L2'));

    expect(session.sendChat).not.toHaveBeenCalled();
  });

  it('waits out the cooldown before greeting the same player again', async () => {
    await join(player('S2', 'Pilot'));
    clock = 999;
    await join(player('S2', 'Pilot'));
    clock = 1000;
    await join(player('S2', 'Pilot'));

    expect(session.sendChat).toHaveBeenCalledTimes(2);
  });

  it('forgets players whose cooldown has passed', async () => {
    await join(player('S2', 'Pilot'));
    await join(player('S3', 'Wingman'));
    expect(greeter.getCoolingDownCount()).toBe(2);

    clock = 1000;
    expect(greeter.getCoolingDownCount()).toBe(0);
  });

  it('keeps going when a greeting cannot be sent', async () => {
    session.sendChat.mockRejectedValueOnce(new NotConnectedError('reconnecting'));

    await join(player('S2', 'Pilot'));
    await join(player('S3', 'Wingman'));

    expect(session.sendChat).toHaveBeenLastCalledWith('Hi Wingman');
  });

  it('stops greeting once stopped', async () => {
    greeter.stop();
    await join(player('S2', 'Pilot'));

    expect(session.sendChat).not.toHaveBeenCalled();
  });
});
