/**
 * Decodes wire frames back into typed messages.
 *
 * The tag byte is read separately from the rest of the frame so stream readers
 * can learn how many more bytes to wait for (messageLength) before decoding.
 */

import { Card, CardValueError, HAND_SIZE, isRoundResult } from '@war/types';
import {
  MalformedWantGameError,
  ProtocolError,
  TruncatedInputError,
  UnknownTagError,
  ValueOutOfRangeError,
} from './errors.js';
import {
  MESSAGE_LENGTHS,
  MessageTag,
  isMessageTag,
  type Message,
} from './messages.js';

/**
 * Total wire length (tag byte included) of a message with this tag.
 * @throws UnknownTagError
 */
export function messageLength(tag: number): number {
  if (!isMessageTag(tag)) {
    throw new UnknownTagError(tag);
  }
  return MESSAGE_LENGTHS[tag];
}

function decodeCard(byte: number): Card {
  try {
    return Card.fromValue(byte);
  } catch (err) {
    if (err instanceof CardValueError) {
      throw new ValueOutOfRangeError('card', byte, { cause: err });
    }
    throw err;
  }
}

/**
 * Decode one message from its tag and the bytes that follow it.
 *
 * `remaining` must hold at least the payload the tag requires; anything past
 * that is ignored here (see decodeFrame for strict whole-frame decoding).
 */
export function decodeMessage(tag: number, remaining: Uint8Array): Message {
  const payloadLength = messageLength(tag) - 1;
  if (remaining.length < payloadLength) {
    throw new TruncatedInputError(tag, payloadLength, remaining.length);
  }

  switch (tag) {
    case MessageTag.WantGame: {
      const padding = remaining[0];
      if (padding !== 0) {
        throw new MalformedWantGameError(padding);
      }
      return { type: 'want_game' };
    }
    case MessageTag.GameStart: {
      const hand: Card[] = [];
      for (let i = 0; i < HAND_SIZE; i++) {
        hand.push(decodeCard(remaining[i]));
      }
      return { type: 'game_start', hand };
    }
    case MessageTag.PlayCard:
      return { type: 'play_card', card: decodeCard(remaining[0]) };
    case MessageTag.PlayResult: {
      const code = remaining[0];
      if (!isRoundResult(code)) {
        throw new ValueOutOfRangeError('round result', code);
      }
      return { type: 'play_result', result: code };
    }
    default:
      throw new UnknownTagError(tag);
  }
}

/**
 * Decode a complete frame (tag byte first). Trailing bytes are rejected.
 */
export function decodeFrame(frame: Uint8Array): Message {
  if (frame.length < 1) {
    throw new TruncatedInputError(null, 1, 0);
  }
  const tag = frame[0];
  const expected = messageLength(tag);
  if (frame.length > expected) {
    throw new ProtocolError(
      'TRAILING_BYTES',
      `Frame with tag ${tag} has ${frame.length - expected} trailing bytes`
    );
  }
  return decodeMessage(tag, frame.subarray(1));
}
