import { Effect, HashMap, Option, pipe } from 'effect';
import {
  UnknownMessageIdError,
  incompatibleMessageError,
  messageKey,
  type Message,
  type MessageIdentifier,
} from '@binapi/contracts';

/**
 * Message table of an in-memory peer. IDs are assigned from 1 in the order
 * the definitions are listed.
 */
export const makeMessageTable = (messages: ReadonlyArray<Message>): MessageIdentifier => {
  const idsByKey = HashMap.fromIterable(
    messages.map((message, index) => [messageKey(message), index + 1] as const)
  );
  const messagesById = HashMap.fromIterable(
    messages.map((message, index) => [index + 1, message] as const)
  );

  return {
    getMessageId: (message) =>
      pipe(
        HashMap.get(idsByKey, messageKey(message)),
        Option.match({
          onNone: () => Effect.fail(incompatibleMessageError(message.messageName, message.crc)),
          onSome: (messageId) => Effect.succeed(messageId),
        })
      ),
    lookupById: (messageId) =>
      pipe(
        HashMap.get(messagesById, messageId),
        Option.match({
          onNone: () =>
            Effect.fail(
              new UnknownMessageIdError({
                messageId,
                message: `message ID ${messageId} is not in the message table`,
              })
            ),
          onSome: (message) => Effect.succeed(message),
        })
      ),
  };
};
