import { Effect, Option, Queue, Ref, pipe } from 'effect';
import {
  ChannelInUseError,
  NilMessageError,
  replyTimeoutError,
  unexpectedMessageIdError,
  type DecodeError,
  type IncompatibleMessageError,
  type Message,
  type ReplyEnvelope,
  type ReplyTimeoutError,
  type TransportError,
  type UnexpectedMessageIdError,
} from '@binapi/contracts';
import type { ChannelCore } from './channel-core';

export type MultipartReply<M extends Message> =
  | { readonly isLast: true }
  | { readonly isLast: false; readonly message: M };

export type ReceiveReplyError =
  | NilMessageError
  | ChannelInUseError
  | ReplyTimeoutError
  | TransportError
  | IncompatibleMessageError
  | UnexpectedMessageIdError
  | DecodeError;

const lastReply: MultipartReply<never> = { isLast: true };

const dataReply = <M extends Message>(message: M): MultipartReply<M> => ({
  isLast: false,
  message,
});

export const requireMessage = <M extends Message>(
  msg: M | null | undefined
): Effect.Effect<M, NilMessageError> =>
  pipe(
    msg,
    Option.fromNullable,
    Option.match({
      onNone: () => Effect.fail(new NilMessageError({ message: 'nil message passed in' })),
      onSome: (message) => Effect.succeed(message),
    })
  );

// ============================================================================
// Single Receiver Guard
// ============================================================================

const acquireReceiver = (core: ChannelCore) =>
  pipe(
    core.receiving,
    Ref.modify((busy): [boolean, boolean] => [busy, true]),
    Effect.flatMap((busy) =>
      Effect.if(busy, {
        onTrue: () =>
          Effect.fail(
            new ChannelInUseError({
              message: 'another receive is already waiting on this channel',
            })
          ),
        onFalse: () => Effect.void,
      })
    )
  );

const releaseReceiver = (core: ChannelCore) => Ref.set(core.receiving, false);

// ============================================================================
// Correlation
// ============================================================================

const takeReplyWithTimeout = (core: ChannelCore) =>
  pipe(
    core.replyTimeout,
    Ref.get,
    Effect.flatMap((timeout) =>
      pipe(
        Queue.take(core.queues.replies),
        Effect.timeoutFail({
          duration: timeout,
          onTimeout: () => replyTimeoutError(timeout),
        })
      )
    )
  );

const verifyMessageId =
  <M extends Message>(msg: M, received: number) =>
  (expected: number) =>
    Effect.if(expected === received, {
      onTrue: () => Effect.void,
      onFalse: () => Effect.fail(unexpectedMessageIdError(expected, received, msg.messageName)),
    });

const decodeDataReply = <M extends Message>(
  core: ChannelCore,
  msg: M,
  messageId: number,
  data: Uint8Array
) =>
  pipe(
    core.identifier.getMessageId(msg),
    Effect.flatMap(verifyMessageId(msg, messageId)),
    Effect.andThen(core.decoder.decode(data, msg)),
    Effect.map((decoded) => dataReply(decoded))
  );

const correlate =
  <M extends Message>(core: ChannelCore, msg: M) =>
  (
    envelope: ReplyEnvelope
  ): Effect.Effect<
    MultipartReply<M>,
    TransportError | IncompatibleMessageError | UnexpectedMessageIdError | DecodeError
  > => {
    switch (envelope._tag) {
      case 'Failed':
        return Effect.fail(envelope.error);
      case 'Terminator':
        return Effect.succeed(lastReply);
      case 'Data':
        return decodeDataReply(core, msg, envelope.messageId, envelope.data);
    }
  };

/**
 * Waits for the next reply on the channel and correlates it with `msg`.
 *
 * Carried transport errors are passed through unchanged. A terminator is
 * reported as the last reply without decoding. A data reply must carry the
 * ID the peer assigned to `msg`; only then is it decoded.
 */
export const receiveReplyInternal = <M extends Message>(
  core: ChannelCore,
  msg: M | null | undefined
): Effect.Effect<MultipartReply<M>, ReceiveReplyError> =>
  pipe(
    requireMessage(msg),
    Effect.flatMap((message) =>
      pipe(
        Effect.acquireUseRelease(
          acquireReceiver(core),
          () => pipe(takeReplyWithTimeout(core), Effect.flatMap(correlate(core, message))),
          () => releaseReceiver(core)
        ),
        Effect.tap((reply) =>
          Effect.logDebug(reply.isLast ? 'last multipart reply received' : 'reply received')
        ),
        Effect.annotateLogs({ messageName: message.messageName }),
        Effect.withSpan(`binapi.Channel/ReceiveReply/${message.messageName}`, {
          kind: 'client',
          attributes: {
            'rpc.system': 'binapi',
            'rpc.method': message.messageName,
          },
        })
      )
    )
  );
