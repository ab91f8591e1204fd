/**
 * One game of War between two connected peers.
 *
 * awaiting_ready -> dealing -> (round_in_progress -> resolving) x 26 -> finished
 *
 * Any decode error, unexpected message, card mismatch, disconnect or timeout
 * moves the session straight to `aborted`. Both connections are closed in
 * either terminal state and nothing is written after a failure.
 */
import {
  HAND_SIZE,
  PLAYER_SEATS,
  RoundResult,
  type Card,
  type GameScore,
  type Hand,
  type PlayerSeat,
} from '@war/types';
import { gameStart, playResult, type Message, type MessageType } from '@war/protocol';
import { Deck } from '../game/deck.js';
import type { RandomSource } from '../game/random.js';
import { resolveRound } from '../game/rules.js';
import { readMessage, writeMessage, type PeerConnection } from '../transport/index.js';
import {
  ErrorCodes,
  PeerTimeoutError,
  SessionError,
  UnexpectedMessageError,
  toSessionError,
} from '../types/errors.js';
import { logDebug, logInfo, logWarn } from '../logger.js';
import { addSpanAttributes, withSpan } from '../telemetry.js';
import { newId } from '../utils/ids.js';

/** Default per-step read deadline (ms) */
export const DEFAULT_READ_TIMEOUT_MS = 30_000;

export type SessionState =
  | 'awaiting_ready'
  | 'dealing'
  | 'round_in_progress'
  | 'resolving'
  | 'finished'
  | 'aborted';

export type SessionStatus = 'finished' | 'aborted';

export interface SessionOutcome {
  sessionId: string;
  status: SessionStatus;
  roundsPlayed: number;
  score: GameScore;
  error?: SessionError;
}

export interface GameSessionOptions {
  rng: RandomSource;
  readTimeoutMs?: number;
  sessionId?: string;
  onStateChange?: (state: SessionState) => void;
}

type Seats<T> = Record<PlayerSeat, T>;

export class GameSession {
  readonly id: string;

  private readonly peers: Seats<PeerConnection>;
  private readonly rng: RandomSource;
  private readonly readTimeoutMs: number;
  private readonly onStateChange?: (state: SessionState) => void;

  private hands: Seats<Card[]> = { playerOne: [], playerTwo: [] };
  private score: GameScore = { playerOne: 0, playerTwo: 0, draws: 0 };
  private roundsPlayed = 0;
  private currentState: SessionState = 'awaiting_ready';
  private started = false;

  constructor(playerOne: PeerConnection, playerTwo: PeerConnection, options: GameSessionOptions) {
    this.id = options.sessionId ?? newId('game');
    this.peers = { playerOne, playerTwo };
    this.rng = options.rng;
    this.readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
    this.onStateChange = options.onStateChange;
  }

  get state(): SessionState {
    return this.currentState;
  }

  /** Cards still to be played, per seat */
  remaining(seat: PlayerSeat): Hand {
    return this.hands[seat];
  }

  /**
   * Play the game to completion. Never rejects: failures become an
   * `aborted` outcome.
   */
  async run(): Promise<SessionOutcome> {
    if (this.started) {
      throw new Error(`Session ${this.id} has already been run`);
    }
    this.started = true;

    return withSpan('war.session', async (span) => {
      const outcome = await this.play();
      addSpanAttributes(span, {
        'war.status': outcome.status,
        'war.rounds_played': outcome.roundsPlayed,
        'war.error_code': outcome.error?.code,
      });
      return outcome;
    }, { 'war.session_id': this.id });
  }

  private async play(): Promise<SessionOutcome> {
    const context = { sessionId: this.id };
    logInfo(
      `[Session] Starting game between ${this.peers.playerOne.remoteAddress} and ${this.peers.playerTwo.remoteAddress}`,
      context
    );

    try {
      await this.handshake();
      await this.deal();
      while (this.roundsPlayed < HAND_SIZE) {
        await this.playRound();
      }
      this.transition('finished');
      logInfo(
        `[Session] Finished after ${this.roundsPlayed} rounds ` +
        `(playerOne ${this.score.playerOne}, playerTwo ${this.score.playerTwo}, draws ${this.score.draws})`,
        context
      );
      return this.outcome('finished');
    } catch (err) {
      const error = toSessionError(err, { step: this.currentState });
      this.transition('aborted');
      logWarn(
        `[Session] Aborted during ${error.step ?? 'unknown step'}: ${error.code} ${error.message}`,
        { ...context, seat: error.seat }
      );
      return this.outcome('aborted', error);
    } finally {
      this.closeAll();
    }
  }

  private async handshake(): Promise<void> {
    await this.readFromBoth('awaiting_ready', 'want_game', (_seat, message) => {
      if (message.type !== 'want_game') {
        throw new UnexpectedMessageError('want_game', message.type);
      }
    });
    logDebug('[Session] Both players want a game', { sessionId: this.id });
  }

  private async deal(): Promise<void> {
    this.transition('dealing');
    const [playerOne, playerTwo] = Deck.freshShuffled(this.rng).dealTwo();
    this.hands = { playerOne: playerOne.slice(), playerTwo: playerTwo.slice() };

    await this.writeToBoth('dealing', {
      playerOne: gameStart(playerOne),
      playerTwo: gameStart(playerTwo),
    });
  }

  private async playRound(): Promise<void> {
    this.transition('round_in_progress');
    const step = `round ${this.roundsPlayed + 1}`;

    const played = await this.readFromBoth(step, 'play_card', (seat, message) => {
      if (message.type !== 'play_card') {
        throw new UnexpectedMessageError('play_card', message.type);
      }
      const expected = this.hands[seat][0];
      if (!expected || !message.card.isSameCard(expected)) {
        throw new SessionError(
          ErrorCodes.CARD_MISMATCH,
          `${seat} played ${message.card.toString()} but the next card in hand is ` +
            `${expected ? expected.toString() : 'nothing'}`,
          { seat, step }
        );
      }
      this.hands[seat].shift();
      return message.card;
    });

    this.transition('resolving');
    const results = resolveRound(played.playerOne, played.playerTwo);
    await this.writeToBoth(step, {
      playerOne: playResult(results.playerOne),
      playerTwo: playResult(results.playerTwo),
    });

    this.roundsPlayed += 1;
    if (results.playerOne === RoundResult.Win) {
      this.score.playerOne += 1;
    } else if (results.playerTwo === RoundResult.Win) {
      this.score.playerTwo += 1;
    } else {
      this.score.draws += 1;
    }
    logDebug(
      `[Session] ${step}: ${played.playerOne.label} vs ${played.playerTwo.label} -> ${RoundResult[results.playerOne]}`,
      { sessionId: this.id }
    );
  }

  /**
   * Read one message from each peer concurrently under a shared deadline.
   * The first failure (read error, timeout, or a throw from `accept`)
   * aborts the other read and rejects.
   */
  private async readFromBoth<T>(
    step: string,
    expected: MessageType,
    accept: (seat: PlayerSeat, message: Message) => T
  ): Promise<Seats<T>> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new PeerTimeoutError(this.readTimeoutMs)), this.readTimeoutMs);

    const readSeat = async (seat: PlayerSeat): Promise<T> => {
      try {
        const message = await readMessage(this.peers[seat], controller.signal, expected);
        return accept(seat, message);
      } catch (err) {
        // Another seat already failed; keep its error as the cause
        if (err instanceof SessionError && err.seat !== seat) {
          throw err;
        }
        const error = toSessionError(err, { seat, step });
        controller.abort(error);
        throw error;
      }
    };

    try {
      const [playerOne, playerTwo] = await Promise.all(PLAYER_SEATS.map(readSeat));
      return { playerOne, playerTwo };
    } finally {
      clearTimeout(timer);
    }
  }

  private async writeToBoth(step: string, messages: Seats<Message>): Promise<void> {
    await Promise.all(
      PLAYER_SEATS.map(async (seat) => {
        try {
          await writeMessage(this.peers[seat], messages[seat]);
        } catch (err) {
          throw toSessionError(err, { seat, step });
        }
      })
    );
  }

  private transition(next: SessionState): void {
    this.currentState = next;
    this.onStateChange?.(next);
  }

  private closeAll(): void {
    for (const seat of PLAYER_SEATS) {
      this.peers[seat].close();
    }
  }

  private outcome(status: SessionStatus, error?: SessionError): SessionOutcome {
    return {
      sessionId: this.id,
      status,
      roundsPlayed: this.roundsPlayed,
      score: { ...this.score },
      ...(error && { error }),
    };
  }
}
