/**
 * In-process operational metrics
 *
 * Counters only ever increase; gauges are set. Sessions touch the store
 * through the track* helpers so the metric names stay in one place.
 */

import type { SessionOutcome } from '../session/game-session.js';

class MetricsStore {
  private counters = new Map<string, number>();
  private gauges = new Map<string, number>();
  private startedAt = Date.now();

  increment(name: string, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  set(name: string, value: number): void {
    this.gauges.set(name, value);
  }

  get(name: string): number | undefined {
    return this.counters.get(name) ?? this.gauges.get(name);
  }

  getAll(): Record<string, number> {
    return {
      ...Object.fromEntries(this.counters),
      ...Object.fromEntries(this.gauges),
      uptime_seconds: Math.floor((Date.now() - this.startedAt) / 1000),
    };
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.startedAt = Date.now();
  }
}

export const metrics = new MetricsStore();

export function trackConnection(accepted: boolean): void {
  metrics.increment(accepted ? 'connections_accepted' : 'connections_rejected');
}

export function trackSessionStarted(activeSessions: number): void {
  metrics.increment('sessions_started');
  metrics.set('sessions_active', activeSessions);
}

export function trackSessionEnded(outcome: SessionOutcome, activeSessions: number): void {
  metrics.increment(outcome.status === 'finished' ? 'sessions_finished' : 'sessions_aborted');
  metrics.increment('rounds_played', outcome.roundsPlayed);
  if (outcome.error) {
    metrics.increment(`session_abort_${outcome.error.code.toLowerCase()}`);
  }
  metrics.set('sessions_active', activeSessions);
}
