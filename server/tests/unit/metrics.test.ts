import { describe, it, expect, beforeEach } from 'vitest';
import { metrics, trackConnection, trackSessionEnded, trackSessionStarted } from '../../src/metrics/index.js';
import { SessionError } from '../../src/types/errors.js';

describe('metrics', () => {
  beforeEach(() => {
    metrics.reset();
  });

  it('counts accepted and rejected connections', () => {
    trackConnection(true);
    trackConnection(true);
    trackConnection(false);

    expect(metrics.get('connections_accepted')).toBe(2);
    expect(metrics.get('connections_rejected')).toBe(1);
  });

  it('tracks session starts and the active gauge', () => {
    trackSessionStarted(1);
    trackSessionStarted(2);

    expect(metrics.get('sessions_started')).toBe(2);
    expect(metrics.get('sessions_active')).toBe(2);
  });

  it('counts finished sessions and their rounds', () => {
    trackSessionEnded(
      { sessionId: 's1', status: 'finished', roundsPlayed: 26, score: { playerOne: 12, playerTwo: 11, draws: 3 } },
      0
    );

    expect(metrics.get('sessions_finished')).toBe(1);
    expect(metrics.get('sessions_aborted')).toBeUndefined();
    expect(metrics.get('rounds_played')).toBe(26);
    expect(metrics.get('sessions_active')).toBe(0);
  });

  it('counts aborted sessions by error code', () => {
    trackSessionEnded(
      {
        sessionId: 's2',
        status: 'aborted',
        roundsPlayed: 4,
        score: { playerOne: 2, playerTwo: 2, draws: 0 },
        error: new SessionError('PEER_TIMEOUT', 'No message within 20ms'),
      },
      3
    );

    expect(metrics.get('sessions_aborted')).toBe(1);
    expect(metrics.get('session_abort_peer_timeout')).toBe(1);
    expect(metrics.get('rounds_played')).toBe(4);
    expect(metrics.get('sessions_active')).toBe(3);
  });

  it('reports everything with uptime in getAll()', () => {
    trackConnection(true);
    trackSessionStarted(1);

    expect(metrics.getAll()).toEqual({
      connections_accepted: 1,
      sessions_started: 1,
      sessions_active: 1,
      uptime_seconds: 0,
    });
  });
});
