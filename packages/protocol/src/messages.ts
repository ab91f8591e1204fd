/**
 * Wire message definitions.
 *
 * Every message starts with a one-byte tag, and the tag alone decides the
 * total length. There is no length field, so both ends must already agree on
 * the protocol version.
 */

import type { Card, Hand, RoundResult } from '@war/types';
import { HAND_SIZE } from '@war/types';

export const MessageTag = {
  WantGame: 0,
  GameStart: 1,
  PlayCard: 2,
  PlayResult: 3,
} as const;

export type MessageTag = typeof MessageTag[keyof typeof MessageTag];

/** Total wire length per tag, tag byte included */
export const MESSAGE_LENGTHS = {
  [MessageTag.WantGame]: 2,
  [MessageTag.GameStart]: 1 + HAND_SIZE,
  [MessageTag.PlayCard]: 2,
  [MessageTag.PlayResult]: 2,
} as const satisfies Record<MessageTag, number>;

/** Longest message on the wire (GameStart) */
export const MAX_MESSAGE_LENGTH = MESSAGE_LENGTHS[MessageTag.GameStart];

export interface WantGameMessage {
  type: 'want_game';
}

export interface GameStartMessage {
  type: 'game_start';
  hand: Hand;
}

export interface PlayCardMessage {
  type: 'play_card';
  card: Card;
}

export interface PlayResultMessage {
  type: 'play_result';
  result: RoundResult;
}

export type Message = WantGameMessage | GameStartMessage | PlayCardMessage | PlayResultMessage;

export type MessageType = Message['type'];

export const MESSAGE_TAGS = {
  want_game: MessageTag.WantGame,
  game_start: MessageTag.GameStart,
  play_card: MessageTag.PlayCard,
  play_result: MessageTag.PlayResult,
} as const satisfies Record<MessageType, MessageTag>;

export const MESSAGE_TYPES = {
  [MessageTag.WantGame]: 'want_game',
  [MessageTag.GameStart]: 'game_start',
  [MessageTag.PlayCard]: 'play_card',
  [MessageTag.PlayResult]: 'play_result',
} as const satisfies Record<MessageTag, MessageType>;

export function isMessageTag(tag: number): tag is MessageTag {
  return Object.values(MessageTag).some((known) => known === tag);
}

export const wantGame = (): WantGameMessage => ({ type: 'want_game' });

export const gameStart = (hand: Hand): GameStartMessage => ({ type: 'game_start', hand });

export const playCard = (card: Card): PlayCardMessage => ({ type: 'play_card', card });

export const playResult = (result: RoundResult): PlayResultMessage => ({ type: 'play_result', result });
