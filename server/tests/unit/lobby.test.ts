/**
 * Lobby Tests
 *
 * Pairing, waiting-peer cleanup, the session cap and drain.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { Lobby } from '../../src/session/lobby.js';
import type { SessionOutcome } from '../../src/session/game-session.js';
import { SeededRandom } from '../../src/game/random.js';
import { metrics } from '../../src/metrics/index.js';
import { MemoryPeer } from '../helpers/memory-peer.js';
import { ScriptedPlayer } from '../helpers/scripted-player.js';

describe('Lobby', () => {
  let lobby: Lobby;
  let outcomes: SessionOutcome[];

  beforeEach(() => {
    metrics.reset();
    outcomes = [];
    lobby = new Lobby({
      rng: new SeededRandom(3),
      readTimeoutMs: 20,
      maxActiveSessions: 1,
      onSessionEnd: (outcome) => outcomes.push(outcome),
    });
  });

  it('keeps the first peer waiting', () => {
    const peer = new MemoryPeer();
    expect(lobby.admit(peer)).toBe('waiting');
    expect(lobby.waitingPeer).toBe(peer);
    expect(lobby.activeSessions).toBe(0);
  });

  it('pairs the second peer with the waiting one and plays a game', async () => {
    const one = new ScriptedPlayer().join();
    const two = new ScriptedPlayer().join();

    expect(lobby.admit(one.peer)).toBe('waiting');
    expect(lobby.admit(two.peer)).toBe('paired');
    expect(lobby.waitingPeer).toBeNull();
    expect(lobby.activeSessions).toBe(1);

    await lobby.drain();

    expect(lobby.activeSessions).toBe(0);
    expect(outcomes).toHaveLength(1);
    expect(outcomes[0].status).toBe('finished');
    expect(metrics.get('sessions_started')).toBe(1);
    expect(metrics.get('sessions_finished')).toBe(1);
    expect(metrics.get('rounds_played')).toBe(26);
    expect(metrics.get('sessions_active')).toBe(0);
  });

  it('seats the waiting peer as player one', async () => {
    const one = new ScriptedPlayer().join();
    const two = new MemoryPeer();
    two.pushBytes([0, 7]);

    lobby.admit(one.peer);
    lobby.admit(two);
    await lobby.drain();

    expect(outcomes[0].error?.seat).toBe('playerTwo');
    expect(metrics.get('sessions_aborted')).toBe(1);
    expect(metrics.get('session_abort_protocol_violation')).toBe(1);
  });

  it('forgets a waiting peer that disconnects', () => {
    const first = new MemoryPeer();
    lobby.admit(first);
    first.disconnect();
    expect(lobby.waitingPeer).toBeNull();

    const second = new MemoryPeer();
    expect(lobby.admit(second)).toBe('waiting');
    expect(lobby.activeSessions).toBe(0);
  });

  it('drops a waiting peer that overflows its read buffer', () => {
    const first = new MemoryPeer('127.0.0.1', { maxBufferedBytes: 4 });
    lobby.admit(first);
    first.pushBytes([0, 0, 0, 0, 0]);

    expect(first.terminated).toBe(true);
    expect(lobby.waitingPeer).toBeNull();
  });

  it('rejects a peer that is already closed', () => {
    const peer = new MemoryPeer();
    peer.close();
    expect(lobby.admit(peer)).toBe('rejected');
    expect(lobby.waitingPeer).toBeNull();
  });

  it('turns peers away while at the session cap', async () => {
    lobby.admit(new MemoryPeer());
    lobby.admit(new MemoryPeer());
    expect(lobby.activeSessions).toBe(1);

    const extra = new MemoryPeer();
    expect(lobby.admit(extra)).toBe('rejected');
    expect(extra.terminated).toBe(true);

    // The silent pair times out
    await lobby.drain();
    expect(outcomes[0].error?.code).toBe('PEER_TIMEOUT');
    expect(lobby.admit(new MemoryPeer())).toBe('waiting');
  });

  it('closes the waiting peer on drain', async () => {
    const peer = new MemoryPeer();
    lobby.admit(peer);

    await lobby.drain();

    expect(peer.terminated).toBe(true);
    expect(lobby.waitingPeer).toBeNull();
  });
});
