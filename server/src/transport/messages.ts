/**
 * Message framing over a PeerConnection.
 *
 * Reads the tag byte first, then exactly as many bytes as that tag requires.
 */
import {
  MESSAGE_LENGTHS,
  MESSAGE_TYPES,
  UnknownTagError,
  decodeMessage,
  encodeMessage,
  isMessageTag,
  type Message,
  type MessageType,
} from '@war/protocol';
import { UnexpectedMessageError } from '../types/errors.js';
import type { PeerConnection } from './peer.js';

/**
 * Read one message.
 *
 * With `expected`, a message of another type is rejected as soon as its tag
 * byte arrives, without waiting for the payload.
 */
export async function readMessage(
  peer: PeerConnection,
  signal?: AbortSignal,
  expected?: MessageType
): Promise<Message> {
  const [tag] = await peer.readExact(1, signal);
  if (!isMessageTag(tag)) {
    throw new UnknownTagError(tag);
  }
  if (expected !== undefined && MESSAGE_TYPES[tag] !== expected) {
    throw new UnexpectedMessageError(expected, MESSAGE_TYPES[tag]);
  }
  const remaining = await peer.readExact(MESSAGE_LENGTHS[tag] - 1, signal);
  return decodeMessage(tag, remaining);
}

export async function writeMessage(peer: PeerConnection, message: Message): Promise<void> {
  await peer.write(encodeMessage(message));
}
