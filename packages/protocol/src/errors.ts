/**
 * Protocol-specific error types.
 * Thrown when encoding an invalid message or decoding invalid bytes from a peer.
 */

export type ProtocolErrorCode =
  | 'UNKNOWN_TAG'
  | 'TRUNCATED_INPUT'
  | 'VALUE_OUT_OF_RANGE'
  | 'MALFORMED_WANT_GAME'
  | 'TRAILING_BYTES'
  | 'INVALID_HAND'
  | 'BUFFER_LIMIT_EXCEEDED';

export class ProtocolError extends Error {
  readonly code: ProtocolErrorCode;

  constructor(code: ProtocolErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProtocolError';
    this.code = code;
  }
}

export class UnknownTagError extends ProtocolError {
  readonly tag: number;

  constructor(tag: number) {
    super('UNKNOWN_TAG', `Unknown message tag: ${tag}`);
    this.name = 'UnknownTagError';
    this.tag = tag;
  }
}

export class TruncatedInputError extends ProtocolError {
  /** null when even the tag byte is missing */
  readonly tag: number | null;
  readonly expected: number;
  readonly actual: number;

  constructor(tag: number | null, expected: number, actual: number) {
    super(
      'TRUNCATED_INPUT',
      tag === null
        ? 'Empty frame: missing tag byte'
        : `Truncated message with tag ${tag}: expected ${expected} payload bytes, got ${actual}`
    );
    this.name = 'TruncatedInputError';
    this.tag = tag;
    this.expected = expected;
    this.actual = actual;
  }
}

export class ValueOutOfRangeError extends ProtocolError {
  readonly field: string;
  readonly value: number;

  constructor(field: string, value: number, options?: { cause?: unknown }) {
    super('VALUE_OUT_OF_RANGE', `Invalid ${field} byte: ${value}`, options);
    this.name = 'ValueOutOfRangeError';
    this.field = field;
    this.value = value;
  }
}

export class MalformedWantGameError extends ProtocolError {
  readonly padding: number;

  constructor(padding: number) {
    super('MALFORMED_WANT_GAME', `Malformed WantGame: padding byte was ${padding}, expected 0`);
    this.name = 'MalformedWantGameError';
    this.padding = padding;
  }
}

/**
 * A peer sent more unread bytes than the receiver is willing to hold.
 */
export class BufferLimitExceededError extends ProtocolError {
  readonly limit: number;

  constructor(limit: number) {
    super('BUFFER_LIMIT_EXCEEDED', `More than ${limit} unread bytes buffered`);
    this.name = 'BufferLimitExceededError';
    this.limit = limit;
  }
}
