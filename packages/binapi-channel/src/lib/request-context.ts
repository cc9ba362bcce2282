import { Effect, Option, Ref, Stream, pipe } from 'effect';
import {
  InvalidContextError,
  UnexpectedTerminatorError,
  type Message,
} from '@binapi/contracts';
import type { ChannelCore } from './channel-core';
import { receiveReplyInternal, type MultipartReply, type ReceiveReplyError } from './correlation';

/**
 * Context of an ongoing simple request: exactly one reply is expected.
 */
export interface RequestCtx {
  readonly receiveReply: <M extends Message>(
    msg: M | null | undefined
  ) => Effect.Effect<M, ReceiveReplyError | InvalidContextError | UnexpectedTerminatorError>;
}

/**
 * Context of an ongoing multipart request: zero or more replies followed by
 * a terminator are expected.
 */
export interface MultiRequestCtx {
  readonly receiveReply: <M extends Message>(
    msg: M | null | undefined
  ) => Effect.Effect<MultipartReply<M>, ReceiveReplyError | InvalidContextError>;
  /**
   * Every data reply of the exchange, decoded into copies of `msg`. The
   * stream ends at the terminator.
   */
  readonly replies: <M extends Message>(
    msg: M
  ) => Stream.Stream<M, ReceiveReplyError | InvalidContextError>;
}

type ContextBinding = Ref.Ref<Option.Option<ChannelCore>>;

const boundChannel = (binding: ContextBinding) =>
  pipe(
    binding,
    Ref.get,
    Effect.flatMap(
      Option.match({
        onNone: () => Effect.fail(new InvalidContextError({ message: 'invalid request context' })),
        onSome: (core) => Effect.succeed(core),
      })
    )
  );

const release = (binding: ContextBinding) => Ref.set(binding, Option.none());

const expectSingleReply = <M extends Message>(
  reply: MultipartReply<M>
): Effect.Effect<M, UnexpectedTerminatorError> =>
  reply.isLast
    ? Effect.fail(
        new UnexpectedTerminatorError({
          message: 'multipart reply received while a simple reply expected',
        })
      )
    : Effect.succeed(reply.message);

export const makeRequestCtx = (core: ChannelCore): Effect.Effect<RequestCtx> =>
  pipe(
    Ref.make(Option.some(core)),
    Effect.map(
      (binding): RequestCtx => ({
        receiveReply: (msg) =>
          pipe(
            boundChannel(binding),
            Effect.flatMap((bound) =>
              pipe(receiveReplyInternal(bound, msg), Effect.ensuring(release(binding)))
            ),
            Effect.flatMap((reply) => expectSingleReply(reply))
          ),
      })
    )
  );

const receiveMultipart =
  (binding: ContextBinding) =>
  <M extends Message>(
    msg: M | null | undefined
  ): Effect.Effect<MultipartReply<M>, ReceiveReplyError | InvalidContextError> =>
    pipe(
      boundChannel(binding),
      Effect.flatMap((bound) => receiveReplyInternal(bound, msg)),
      Effect.tap((reply) => Effect.when(release(binding), () => reply.isLast)),
      Effect.tapError(() => release(binding))
    );

const untilLastReply = <M extends Message>(
  reply: MultipartReply<M>
): Effect.Effect<M, Option.Option<never>> =>
  reply.isLast ? Effect.fail(Option.none()) : Effect.succeed(reply.message);

const streamReplies =
  (binding: ContextBinding) =>
  <M extends Message>(msg: M): Stream.Stream<M, ReceiveReplyError | InvalidContextError> =>
    Stream.repeatEffectOption(
      pipe(
        receiveMultipart(binding)(msg),
        Effect.mapError((error) => Option.some(error)),
        Effect.flatMap((reply) => untilLastReply(reply))
      )
    );

export const makeMultiRequestCtx = (core: ChannelCore): Effect.Effect<MultiRequestCtx> =>
  pipe(
    Ref.make(Option.some(core)),
    Effect.map(
      (binding): MultiRequestCtx => ({
        receiveReply: receiveMultipart(binding),
        replies: streamReplies(binding),
      })
    )
  );
