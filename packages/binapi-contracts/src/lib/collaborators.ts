/**
 * Collaborator Contracts
 *
 * A channel does not know how payloads are encoded or which numeric IDs the
 * peer assigned to message definitions. Both are supplied by collaborators
 * that may be shared between channels.
 */

import { Effect } from 'effect';
import type { Message } from './message';
import type {
  DecodeError,
  EncodeError,
  IncompatibleMessageError,
  UnknownMessageIdError,
} from './errors';

/**
 * Decodes raw payload bytes into a message of the shape of `into`.
 * Returns a populated copy; `into` is left untouched.
 */
export interface MessageDecoder {
  readonly decode: <M extends Message>(
    data: Uint8Array,
    into: M
  ) => Effect.Effect<M, DecodeError, never>;
}

export interface MessageEncoder {
  readonly encode: (message: Message) => Effect.Effect<Uint8Array, EncodeError, never>;
}

export interface MessageCodec extends MessageDecoder, MessageEncoder {}

/**
 * Resolves message definitions to the numeric IDs of the connected peer.
 * Fails when the peer does not know the name and CRC pair.
 */
export interface MessageIdentifier {
  readonly getMessageId: (
    message: Message
  ) => Effect.Effect<number, IncompatibleMessageError, never>;
  readonly lookupById: (messageId: number) => Effect.Effect<Message, UnknownMessageIdError, never>;
}
