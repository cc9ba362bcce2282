/**
 * In-Memory Engine (Pure Functional)
 *
 * An in-process peer that serves channels without any transport. Requests are
 * answered by handlers registered per request message name; notifications
 * are published explicitly and dispatched to matching subscriptions.
 *
 * Each engine is isolated: its own message table, its own channels and its own
 * subscriptions. Channel loops run in the scope the channel was opened in.
 */

import { Effect, Layer, Option, Queue, Ref, Scope, pipe } from 'effect';
import {
  ChannelConfiguration,
  ChannelProviderService,
  makeChannel,
  type Channel,
  type ChannelBufferSizes,
  type ChannelConfigurationService,
  type ChannelProvider,
} from '@binapi/channel';
import {
  ReplyEnvelope,
  SubscriptionError,
  TransportError,
  isSameDefinition,
  subscriptionAccepted,
  subscriptionRejected,
  type EncodeError,
  type IncompatibleMessageError,
  type Message,
  type MessageCodec,
  type MessageIdentifier,
  type NotificationSink,
  type RequestEnvelope,
  type SubscriptionAck,
  type SubscriptionRequest,
} from '@binapi/contracts';
import type { ReadonlyDeep } from 'type-fest';
import { JsonMessageCodec } from './json-codec';
import { makeMessageTable } from './message-table';

// =============================================================================
// Core Types
// =============================================================================

/**
 * Answers one request with its replies, in order. A multipart request gets a
 * terminator after the last of them.
 */
export type RequestHandler = (
  request: ReadonlyDeep<Message>
) => Effect.Effect<ReadonlyArray<Message>, TransportError, never>;

export interface InMemoryEngineOptions {
  /** Every message definition the engine knows, in message table order. */
  readonly messages: ReadonlyArray<Message>;
  /** Handlers keyed by request message name. */
  readonly handlers: Readonly<Record<string, RequestHandler>>;
  readonly codec?: MessageCodec;
}

export interface InMemoryChannelMetadata {
  readonly channelId: number;
}

export type InMemoryChannel = Channel<InMemoryChannelMetadata>;

export interface InMemoryEngine {
  readonly provider: ChannelProvider<InMemoryChannelMetadata>;
  readonly identifier: MessageIdentifier;
  /**
   * Dispatches a notification to every subscription for its message type.
   * Succeeds with the number of subscriptions that accepted it.
   */
  readonly publishEvent: (
    event: Message
  ) => Effect.Effect<number, EncodeError | IncompatibleMessageError, never>;
  readonly layer: Layer.Layer<ChannelProviderService>;
}

interface RegisteredSubscription {
  readonly channelId: number;
  readonly sink: NotificationSink;
}

interface EngineState {
  readonly codec: MessageCodec;
  readonly identifier: MessageIdentifier;
  readonly handlers: Readonly<Record<string, RequestHandler>>;
  readonly nextChannelId: Ref.Ref<number>;
  readonly subscriptions: Ref.Ref<ReadonlyArray<RegisteredSubscription>>;
}

// =============================================================================
// Request Handling
// =============================================================================

const findHandler = (state: EngineState, request: Message) =>
  pipe(
    Option.fromNullable(state.handlers[request.messageName]),
    Option.match({
      onNone: () =>
        Effect.fail(
          new TransportError({ message: `no handler registered for ${request.messageName}` })
        ),
      onSome: (handler) => Effect.succeed(handler),
    })
  );

const asTransportError = (error: EncodeError | IncompatibleMessageError) =>
  new TransportError({ message: error.message, cause: error });

const encodeReply = (state: EngineState) => (reply: Message) =>
  pipe(
    Effect.all([state.identifier.getMessageId(reply), state.codec.encode(reply)]),
    Effect.map(([messageId, data]): ReplyEnvelope => ReplyEnvelope.Data({ messageId, data })),
    Effect.mapError(asTransportError)
  );

const withTerminator =
  (multipart: boolean) =>
  (replies: ReadonlyArray<ReplyEnvelope>): ReadonlyArray<ReplyEnvelope> =>
    multipart ? [...replies, ReplyEnvelope.Terminator()] : replies;

const answerRequest =
  (state: EngineState) =>
  (envelope: RequestEnvelope): Effect.Effect<ReadonlyArray<ReplyEnvelope>> =>
    pipe(
      state.identifier.getMessageId(envelope.message),
      Effect.mapError(asTransportError),
      Effect.andThen(findHandler(state, envelope.message)),
      Effect.flatMap((handler) => handler(envelope.message)),
      Effect.flatMap((replies) => Effect.forEach(replies, encodeReply(state))),
      Effect.map(withTerminator(envelope.multipart)),
      Effect.tap((replies) => Effect.logDebug(`request answered with ${replies.length} replies`)),
      Effect.catchAll((error) =>
        pipe(
          Effect.logError(`request failed: ${error.message}`),
          Effect.as([ReplyEnvelope.Failed({ error })])
        )
      ),
      Effect.annotateLogs({ messageName: envelope.message.messageName })
    );

const serveRequests = (state: EngineState, channel: InMemoryChannel) =>
  pipe(
    Queue.take(channel.queues.requests),
    Effect.flatMap(answerRequest(state)),
    Effect.flatMap((replies) => Queue.offerAll(channel.queues.replies, replies)),
    Effect.forever
  );

// =============================================================================
// Subscription Handling
// =============================================================================

const addSubscription = (
  state: EngineState,
  channelId: number,
  sink: NotificationSink
): Effect.Effect<SubscriptionAck> =>
  pipe(
    state.identifier.getMessageId(sink.template()),
    Effect.andThen(
      Ref.update(state.subscriptions, (registered) => [...registered, { channelId, sink }])
    ),
    Effect.as(subscriptionAccepted),
    Effect.catchAll((error) =>
      Effect.succeed(
        subscriptionRejected(
          new SubscriptionError({ messageName: error.messageName, message: error.message })
        )
      )
    )
  );

const removeSubscription = (
  state: EngineState,
  sink: NotificationSink
): Effect.Effect<SubscriptionAck> =>
  pipe(
    state.subscriptions,
    Ref.modify((registered): [boolean, ReadonlyArray<RegisteredSubscription>] => {
      const remaining = registered.filter((entry) => entry.sink !== sink);
      return [remaining.length !== registered.length, remaining];
    }),
    Effect.map((removed) =>
      removed
        ? subscriptionAccepted
        : subscriptionRejected(
            new SubscriptionError({
              messageName: sink.template().messageName,
              message: 'subscription is not registered',
            })
          )
    )
  );

const changeSubscription =
  (state: EngineState, channelId: number) => (request: SubscriptionRequest) =>
    request.subscribe
      ? addSubscription(state, channelId, request.subscription)
      : removeSubscription(state, request.subscription);

// A closed channel has already dropped its subscriptions; it takes no new ones.
const closedChannelAck = (sink: NotificationSink): SubscriptionAck =>
  subscriptionRejected(
    new SubscriptionError({
      messageName: sink.template().messageName,
      message: 'channel is closed',
    })
  );

const handleSubscriptionRequest =
  (state: EngineState, channel: InMemoryChannel) => (request: SubscriptionRequest) =>
    pipe(
      Queue.isShutdown(channel.queues.requests),
      Effect.flatMap((closed) =>
        Effect.if(closed && request.subscribe, {
          onTrue: () => Effect.succeed(closedChannelAck(request.subscription)),
          onFalse: () => changeSubscription(state, channel.metadata().channelId)(request),
        })
      )
    );

const serveSubscriptionRequests = (state: EngineState, channel: InMemoryChannel) =>
  pipe(
    Queue.take(channel.queues.subscriptionRequests),
    Effect.flatMap(handleSubscriptionRequest(state, channel)),
    Effect.flatMap((ack) => Queue.offer(channel.queues.subscriptionReplies, ack)),
    Effect.forever
  );

const dropChannelSubscriptions = (state: EngineState, channelId: number) =>
  Ref.update(state.subscriptions, (registered) =>
    registered.filter((entry) => entry.channelId !== channelId)
  );

// =============================================================================
// Notification Dispatch
// =============================================================================

const deliverTo =
  (state: EngineState, data: Uint8Array) =>
  ({ sink, channelId }: RegisteredSubscription) =>
    pipe(
      sink.deliver(data, state.codec),
      Effect.tap((delivered) =>
        Effect.when(
          Effect.logWarning('notification dropped: queue is full or shut down'),
          () => !delivered
        )
      ),
      Effect.catchAll((error) =>
        pipe(Effect.logError(`failed to deliver notification: ${error.message}`), Effect.as(false))
      ),
      Effect.annotateLogs({ channelId })
    );

const publishEvent = (state: EngineState) => (event: Message) =>
  pipe(
    state.identifier.getMessageId(event),
    Effect.andThen(state.codec.encode(event)),
    Effect.flatMap((data) =>
      pipe(
        Ref.get(state.subscriptions),
        Effect.map((registered) =>
          registered.filter((entry) => isSameDefinition(entry.sink.template(), event))
        ),
        Effect.flatMap((matching) => Effect.forEach(matching, deliverTo(state, data)))
      )
    ),
    Effect.map((results) => results.filter((delivered) => delivered).length),
    Effect.annotateLogs({ messageName: event.messageName })
  );

// =============================================================================
// Channel Provider
// =============================================================================

const startChannelLoops = (state: EngineState) => (channel: InMemoryChannel) =>
  pipe(
    serveRequests(state, channel),
    Effect.ensuring(dropChannelSubscriptions(state, channel.metadata().channelId)),
    Effect.forkScoped,
    Effect.andThen(Effect.forkScoped(serveSubscriptionRequests(state, channel))),
    Effect.andThen(Effect.addFinalizer(() => channel.close()))
  );

const openChannel =
  (state: EngineState, config: ChannelConfigurationService) =>
  (sizes: ChannelBufferSizes): Effect.Effect<InMemoryChannel, never, Scope.Scope> =>
    pipe(
      Ref.getAndUpdate(state.nextChannelId, (id) => id + 1),
      Effect.flatMap((channelId) =>
        makeChannel({
          metadata: { channelId },
          decoder: state.codec,
          identifier: state.identifier,
          requestBufferSize: sizes.requestBufferSize,
          replyBufferSize: sizes.replyBufferSize,
          notificationBufferSize: config.notificationBufferSize,
          replyTimeout: config.replyTimeout,
        })
      ),
      Effect.tap(startChannelLoops(state)),
      Effect.tap((channel) =>
        Effect.logDebug(`channel ${channel.metadata().channelId} opened`)
      )
    );

const makeProvider = (state: EngineState) =>
  pipe(
    ChannelConfiguration,
    Effect.map((config): ChannelProvider<InMemoryChannelMetadata> => {
      const open = openChannel(state, config);
      return {
        newChannel: () =>
          open({
            requestBufferSize: config.requestBufferSize,
            replyBufferSize: config.replyBufferSize,
          }),
        newChannelBuffered: open,
      };
    })
  );

const makeEngineState = (options: InMemoryEngineOptions) =>
  pipe(
    Effect.all({
      nextChannelId: Ref.make(1),
      subscriptions: Ref.make<ReadonlyArray<RegisteredSubscription>>([]),
    }),
    Effect.map(
      (refs): EngineState => ({
        codec: options.codec ?? JsonMessageCodec,
        identifier: makeMessageTable(options.messages),
        handlers: options.handlers,
        ...refs,
      })
    )
  );

const buildEngine = (state: EngineState) =>
  pipe(
    makeProvider(state),
    Effect.map(
      (provider): InMemoryEngine => ({
        provider,
        identifier: state.identifier,
        publishEvent: publishEvent(state),
        layer: Layer.succeed(ChannelProviderService, provider),
      })
    )
  );

export const InMemoryEngine = {
  make: (
    options: InMemoryEngineOptions
  ): Effect.Effect<InMemoryEngine, never, ChannelConfiguration> =>
    pipe(makeEngineState(options), Effect.flatMap(buildEngine)),
};
