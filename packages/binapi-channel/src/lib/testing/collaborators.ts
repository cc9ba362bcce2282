/**
 * Minimal decoder and identifier used by the channel tests. Payloads are JSON
 * objects; message IDs come from a fixed table.
 */

import { Effect, Option, Schema, pipe } from 'effect';
import {
  DecodeError,
  UnknownMessageIdError,
  defineMessage,
  incompatibleMessageError,
  messageKey,
  payloadOf,
  type Message,
  type MessageDecoder,
  type MessageIdentifier,
} from '@binapi/contracts';

export const EchoRequest = defineMessage<{ readonly value: number }>({
  messageName: 'echo',
  crc: '0x1a2b3c4d',
  messageType: 'request',
});

export const EchoReply = defineMessage<{ readonly value: number }>({
  messageName: 'echo_reply',
  crc: '0x5e6f7a8b',
  messageType: 'reply',
});

export const DumpRequest = defineMessage<{ readonly filter: string }>({
  messageName: 'interface_dump',
  crc: '0x00000001',
  messageType: 'request',
});

export const Details = defineMessage<{ readonly index: number }>({
  messageName: 'interface_details',
  crc: '0x00000002',
  messageType: 'reply',
});

export const Unknown = defineMessage<{ readonly value: number }>({
  messageName: 'not_on_peer',
  crc: '0xdeadbeef',
  messageType: 'request',
});

const table: ReadonlyArray<Message> = [
  EchoRequest({ value: 0 }),
  EchoReply({ value: 0 }),
  DumpRequest({ filter: '' }),
  Details({ index: 0 }),
];

export const ECHO_REQUEST_ID = 1;
export const ECHO_REPLY_ID = 2;
export const DETAILS_ID = 4;

export const testIdentifier: MessageIdentifier = {
  getMessageId: (message) =>
    pipe(
      table.findIndex((entry) => messageKey(entry) === messageKey(message)),
      Option.liftPredicate((index: number) => index >= 0),
      Option.match({
        onNone: () => Effect.fail(incompatibleMessageError(message.messageName, message.crc)),
        onSome: (index) => Effect.succeed(index + 1),
      })
    ),
  lookupById: (messageId) =>
    pipe(
      Option.fromNullable(table[messageId - 1]),
      Option.match({
        onNone: () =>
          Effect.fail(
            new UnknownMessageIdError({ messageId, message: `unknown message ID ${messageId}` })
          ),
        onSome: (message) => Effect.succeed(message),
      })
    ),
};

const decodeJsonObject = Schema.decodeUnknown(
  Schema.parseJson(Schema.Record({ key: Schema.String, value: Schema.Unknown }))
);

// Only keys the target declares as payload are copied; the descriptor stays.
const payloadFields = (into: Message, fields: Readonly<Record<string, unknown>>) =>
  Object.fromEntries(
    Object.keys(payloadOf(into))
      .filter((key) => key in fields)
      .map((key) => [key, fields[key]] as const)
  );

export const testDecoder: MessageDecoder = {
  decode: (data, into) =>
    pipe(
      decodeJsonObject(new TextDecoder().decode(data)),
      Effect.map((fields) => ({ ...into, ...payloadFields(into, fields) })),
      Effect.mapError(
        (cause) =>
          new DecodeError({
            messageName: into.messageName,
            message: `cannot decode ${into.messageName}`,
            cause,
          })
      )
    ),
};

export const encodeFields = (fields: object): Uint8Array =>
  new TextEncoder().encode(JSON.stringify(fields));
