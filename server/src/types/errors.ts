/**
 * Error taxonomy for game sessions
 *
 * Every failure inside a session is one of two kinds, and both are fatal to
 * that session only:
 *   protocol_violation - the peer sent bytes or a message it must not send
 *   io_failure         - the peer went away, errored, or timed out
 */
import type { PlayerSeat } from '@war/types';
import { ProtocolError, type MessageType } from '@war/protocol';

export const ErrorCodes = {
  // Protocol violations
  PROTOCOL_VIOLATION: 'PROTOCOL_VIOLATION', // Undecodable bytes (unknown tag, bad value, bad padding)
  UNEXPECTED_MESSAGE: 'UNEXPECTED_MESSAGE', // Valid message, wrong step
  CARD_MISMATCH: 'CARD_MISMATCH',           // Played card is not the front of the hand

  // I/O failures
  PEER_TIMEOUT: 'PEER_TIMEOUT',             // No message within the step timeout
  PEER_DISCONNECTED: 'PEER_DISCONNECTED',   // Stream ended or was closed
  IO_ERROR: 'IO_ERROR',                     // Read or write error on the stream
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export type SessionErrorKind = 'protocol_violation' | 'io_failure';

const KIND_BY_CODE = {
  PROTOCOL_VIOLATION: 'protocol_violation',
  UNEXPECTED_MESSAGE: 'protocol_violation',
  CARD_MISMATCH: 'protocol_violation',
  PEER_TIMEOUT: 'io_failure',
  PEER_DISCONNECTED: 'io_failure',
  IO_ERROR: 'io_failure',
} as const satisfies Record<ErrorCode, SessionErrorKind>;

export interface SessionErrorDetails {
  seat?: PlayerSeat;
  step?: string;
  cause?: unknown;
}

export class SessionError extends Error {
  readonly code: ErrorCode;
  readonly kind: SessionErrorKind;
  readonly seat?: PlayerSeat;
  readonly step?: string;

  constructor(code: ErrorCode, message: string, details: SessionErrorDetails = {}) {
    super(message, { cause: details.cause });
    this.name = 'SessionError';
    this.code = code;
    this.kind = KIND_BY_CODE[code];
    this.seat = details.seat;
    this.step = details.step;
  }
}

/**
 * Raised by a PeerConnection when a read cannot complete because the stream
 * ended or the connection was closed.
 */
export class PeerClosedError extends Error {
  constructor(message = 'Peer connection closed') {
    super(message);
    this.name = 'PeerClosedError';
  }
}

/**
 * Abort reason used when a step's read deadline passes.
 */
export class PeerTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`No message within ${timeoutMs}ms`);
    this.name = 'PeerTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A well-formed message (or its tag) arrived where another type was required.
 */
export class UnexpectedMessageError extends Error {
  readonly expected: MessageType;
  readonly actual: MessageType;

  constructor(expected: MessageType, actual: MessageType) {
    super(`Expected ${expected}, got ${actual}`);
    this.name = 'UnexpectedMessageError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Classify any error raised while talking to a peer.
 */
export function toSessionError(err: unknown, details: Omit<SessionErrorDetails, 'cause'> = {}): SessionError {
  if (err instanceof SessionError) {
    return err;
  }
  if (err instanceof UnexpectedMessageError) {
    return new SessionError(ErrorCodes.UNEXPECTED_MESSAGE, err.message, { ...details, cause: err });
  }
  if (err instanceof ProtocolError) {
    return new SessionError(ErrorCodes.PROTOCOL_VIOLATION, err.message, { ...details, cause: err });
  }
  if (err instanceof PeerTimeoutError) {
    return new SessionError(ErrorCodes.PEER_TIMEOUT, err.message, { ...details, cause: err });
  }
  if (err instanceof PeerClosedError) {
    return new SessionError(ErrorCodes.PEER_DISCONNECTED, err.message, { ...details, cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new SessionError(ErrorCodes.IO_ERROR, message, { ...details, cause: err });
}
