/**
 * Lobby: pairs admitted peers two at a time and runs a GameSession per pair.
 *
 * At most one peer waits at any moment. Sessions run independently; the
 * lobby only tracks how many are active and waits for them on drain().
 */
import type { PeerConnection } from '../transport/index.js';
import type { RandomSource } from '../game/random.js';
import { GameSession, type SessionOutcome } from './game-session.js';
import { trackSessionEnded, trackSessionStarted } from '../metrics/index.js';
import { logDebug, logError, logInfo, logWarn } from '../logger.js';

export interface LobbyOptions {
  rng: RandomSource;
  readTimeoutMs: number;
  maxActiveSessions: number;
  onSessionEnd?: (outcome: SessionOutcome) => void;
}

export type AdmitResult = 'waiting' | 'paired' | 'rejected';

export class Lobby {
  private waiting: PeerConnection | null = null;
  private readonly active = new Map<string, Promise<void>>();
  private readonly options: LobbyOptions;

  constructor(options: LobbyOptions) {
    this.options = options;
  }

  get activeSessions(): number {
    return this.active.size;
  }

  get waitingPeer(): PeerConnection | null {
    return this.waiting;
  }

  admit(peer: PeerConnection): AdmitResult {
    if (!peer.isOpen) {
      return 'rejected';
    }

    if (this.active.size >= this.options.maxActiveSessions) {
      logWarn(
        `[Lobby] Rejecting ${peer.remoteAddress}: ${this.active.size} sessions already running`,
        { peerId: peer.id }
      );
      peer.close();
      return 'rejected';
    }

    const opponent = this.waiting;
    if (!opponent || !opponent.isOpen) {
      this.waiting = peer;
      peer.onClose(() => {
        if (this.waiting === peer) {
          this.waiting = null;
          logDebug('[Lobby] Waiting peer left before being paired', { peerId: peer.id });
        }
      });
      logDebug(`[Lobby] ${peer.remoteAddress} is waiting for an opponent`, { peerId: peer.id });
      return 'waiting';
    }

    this.waiting = null;
    this.start(opponent, peer);
    return 'paired';
  }

  /**
   * Close the waiting peer (if any) and wait for running sessions to end.
   */
  async drain(): Promise<void> {
    this.waiting?.close();
    this.waiting = null;
    await Promise.all(this.active.values());
  }

  private start(playerOne: PeerConnection, playerTwo: PeerConnection): void {
    const session = new GameSession(playerOne, playerTwo, {
      rng: this.options.rng,
      readTimeoutMs: this.options.readTimeoutMs,
    });

    const running = session
      .run()
      .then((outcome) => {
        this.active.delete(session.id);
        trackSessionEnded(outcome, this.active.size);
        this.options.onSessionEnd?.(outcome);
      })
      .catch((err: unknown) => {
        this.active.delete(session.id);
        logError('[Lobby] Session crashed', err, { sessionId: session.id });
      });

    this.active.set(session.id, running);
    trackSessionStarted(this.active.size);
    logInfo(`[Lobby] Paired ${playerOne.remoteAddress} with ${playerTwo.remoteAddress}`, { sessionId: session.id });
  }
}
