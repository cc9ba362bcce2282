/**
 * JSON Message Codec
 *
 * Encodes the payload fields of a message as UTF-8 JSON. Decoding is checked
 * against the target message: every payload field it declares must be present
 * with the same runtime type.
 */

import { Effect, Option, Schema, pipe } from 'effect';
import {
  DecodeError,
  EncodeError,
  payloadOf,
  type Message,
  type MessageCodec,
} from '@binapi/contracts';

const decodeJsonObject = Schema.decodeUnknown(
  Schema.parseJson(Schema.Record({ key: Schema.String, value: Schema.Unknown }))
);

const encodeMessage = (message: Message) =>
  Effect.try({
    try: () => new TextEncoder().encode(JSON.stringify(payloadOf(message))),
    catch: (cause) =>
      new EncodeError({
        messageName: message.messageName,
        message: `cannot encode ${message.messageName}`,
        cause,
      }),
  });

const parsePayload = <M extends Message>(data: Uint8Array, into: M) =>
  pipe(
    decodeJsonObject(new TextDecoder().decode(data)),
    Effect.mapError(
      (cause) =>
        new DecodeError({
          messageName: into.messageName,
          message: `payload of ${into.messageName} is not a JSON object`,
          cause,
        })
    )
  );

const mismatchedField = (
  expected: Readonly<Record<string, unknown>>,
  fields: Readonly<Record<string, unknown>>
): Option.Option<string> =>
  Option.fromNullable(
    Object.keys(expected).find((key) => typeof fields[key] !== typeof expected[key])
  );

const populate =
  <M extends Message>(into: M) =>
  (fields: Readonly<Record<string, unknown>>): Effect.Effect<M, DecodeError> => {
    const expected = payloadOf(into);
    return pipe(
      mismatchedField(expected, fields),
      Option.match({
        onNone: () =>
          Effect.succeed({
            ...into,
            ...Object.fromEntries(Object.keys(expected).map((key) => [key, fields[key]] as const)),
          }),
        onSome: (field) =>
          Effect.fail(
            new DecodeError({
              messageName: into.messageName,
              message: `field ${field} of ${into.messageName} is missing or has the wrong type`,
            })
          ),
      })
    );
  };

export const JsonMessageCodec: MessageCodec = {
  encode: encodeMessage,
  decode: (data, into) => pipe(parsePayload(data, into), Effect.flatMap(populate(into))),
};
