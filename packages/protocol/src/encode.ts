/**
 * Encodes messages into fixed-length Uint8Array frames.
 *
 * Each field is written byte by byte into a buffer sized from MESSAGE_LENGTHS;
 * no in-memory layout is ever reinterpreted as wire data.
 */

import { HAND_SIZE } from '@war/types';
import { ProtocolError } from './errors.js';
import { MESSAGE_LENGTHS, MESSAGE_TAGS, type Message } from './messages.js';

/** Encode a message into its wire frame */
export function encodeMessage(message: Message): Uint8Array {
  const tag = MESSAGE_TAGS[message.type];
  const frame = new Uint8Array(MESSAGE_LENGTHS[tag]);
  frame[0] = tag;

  switch (message.type) {
    case 'want_game':
      // Padding byte is always 0
      frame[1] = 0;
      break;
    case 'game_start':
      if (message.hand.length !== HAND_SIZE) {
        throw new ProtocolError(
          'INVALID_HAND',
          `GameStart requires exactly ${HAND_SIZE} cards, got ${message.hand.length}`
        );
      }
      message.hand.forEach((card, i) => {
        frame[1 + i] = card.value;
      });
      break;
    case 'play_card':
      frame[1] = message.card.value;
      break;
    case 'play_result':
      frame[1] = message.result;
      break;
  }

  return frame;
}
