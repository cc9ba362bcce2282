import { Cause, Duration, Effect, Either, Queue, Ref, pipe } from 'effect';
import {
  ChannelClosedError,
  makeRequestEnvelope,
  makeSubscription,
  type IncompatibleMessageError,
  type Message,
  type MessageDecoder,
  type MessageIdentifier,
  type NotificationSink,
  type Subscription,
  type SubscriptionError,
} from '@binapi/contracts';
import { makeChannelCore, makeChannelQueues, type ChannelCore, type ChannelQueues } from './channel-core';
import { defaultChannelConfiguration } from './configuration';
import {
  makeMultiRequestCtx,
  makeRequestCtx,
  type MultiRequestCtx,
  type RequestCtx,
} from './request-context';

/**
 * One logical conversation with the peer.
 *
 * A channel correlates replies by the order they arrive in, so it must be
 * driven by one caller at a time. Use one channel per concurrent caller.
 */
export interface Channel<Meta = unknown> {
  /** Queues shared with the provider that wired this channel. */
  readonly queues: ChannelQueues;
  readonly decoder: MessageDecoder;
  readonly identifier: MessageIdentifier;

  readonly metadata: () => Meta;
  readonly replyTimeout: () => Effect.Effect<Duration.Duration>;
  /** Applies to receives started after the call. */
  readonly setReplyTimeout: (timeout: Duration.DurationInput) => Effect.Effect<void>;

  readonly sendRequest: (message: Message) => Effect.Effect<RequestCtx, ChannelClosedError>;
  readonly sendMultiRequest: (
    message: Message
  ) => Effect.Effect<MultiRequestCtx, ChannelClosedError>;

  /**
   * Subscribes `notificationQueue` to notifications of the message type
   * `messageFactory` produces. The caller owns the queue and picks its
   * capacity; notifications arriving while it is full are dropped.
   */
  readonly subscribeNotification: <M extends Message>(
    notificationQueue: Queue.Enqueue<M>,
    messageFactory: () => M
  ) => Effect.Effect<Subscription<M>, SubscriptionError>;
  readonly unsubscribeNotification: (
    subscription: NotificationSink
  ) => Effect.Effect<void, SubscriptionError>;

  /**
   * Checks that every message is known to the connected peer, failing on
   * the first one that is not.
   */
  readonly checkMessageCompatibility: (
    ...messages: ReadonlyArray<Message>
  ) => Effect.Effect<void, IncompatibleMessageError>;

  /** Releases the request queue, signalling the provider to tear the channel down. */
  readonly close: () => Effect.Effect<void>;
}

export interface ChannelOptions<Meta> {
  readonly metadata: Meta;
  readonly decoder: MessageDecoder;
  readonly identifier: MessageIdentifier;
  readonly requestBufferSize?: number;
  readonly replyBufferSize?: number;
  /** Capacity of the subscription control queues. */
  readonly notificationBufferSize?: number;
  readonly replyTimeout?: Duration.DurationInput;
}

// ============================================================================
// Requests
// ============================================================================

const channelClosed = (message: Message) =>
  new ChannelClosedError({
    message: `cannot send ${message.messageName}: channel is closed`,
  });

/**
 * A send waiting on a full request queue is released with the same error when
 * the channel is closed under it.
 */
const offerRequest = (queues: ChannelQueues, message: Message, multipart: boolean) =>
  pipe(
    queues.requests,
    Queue.isShutdown,
    Effect.flatMap((closed) =>
      Effect.if(closed, {
        onTrue: () => Effect.fail(channelClosed(message)),
        onFalse: () =>
          pipe(
            Queue.offer(queues.requests, makeRequestEnvelope(message, multipart)),
            Effect.catchAllCause((cause) =>
              Cause.isInterruptedOnly(cause)
                ? Effect.fail(channelClosed(message))
                : Effect.failCause(cause)
            )
          ),
      })
    ),
    Effect.tap(() => Effect.logDebug(multipart ? 'multipart request sent' : 'request sent')),
    Effect.annotateLogs({ messageName: message.messageName }),
    Effect.withSpan(`binapi.Channel/SendRequest/${message.messageName}`, {
      kind: 'client',
      attributes: {
        'rpc.system': 'binapi',
        'rpc.method': message.messageName,
        'binapi.multipart': multipart,
      },
    })
  );

const sendRequest = (core: ChannelCore) => (message: Message) =>
  pipe(offerRequest(core.queues, message, false), Effect.andThen(makeRequestCtx(core)));

const sendMultiRequest = (core: ChannelCore) => (message: Message) =>
  pipe(offerRequest(core.queues, message, true), Effect.andThen(makeMultiRequestCtx(core)));

// ============================================================================
// Notification Subscriptions
// ============================================================================

const awaitSubscriptionAck = (queues: ChannelQueues) =>
  pipe(
    Queue.take(queues.subscriptionReplies),
    Effect.flatMap((ack) =>
      Either.match(ack, {
        onLeft: (error) => Effect.fail(error),
        onRight: () => Effect.void,
      })
    )
  );

const requestSubscriptionChange = (
  queues: ChannelQueues,
  subscription: NotificationSink,
  subscribe: boolean
) =>
  pipe(
    Queue.offer(queues.subscriptionRequests, { subscription, subscribe }),
    Effect.andThen(awaitSubscriptionAck(queues))
  );

const subscribeNotification =
  (queues: ChannelQueues) =>
  <M extends Message>(
    notificationQueue: Queue.Enqueue<M>,
    messageFactory: () => M
  ): Effect.Effect<Subscription<M>, SubscriptionError> =>
    pipe(
      Effect.sync(() => makeSubscription(notificationQueue, messageFactory)),
      Effect.tap((subscription) => requestSubscriptionChange(queues, subscription, true))
    );

const unsubscribeNotification = (queues: ChannelQueues) => (subscription: NotificationSink) =>
  requestSubscriptionChange(queues, subscription, false);

// ============================================================================
// Compatibility
// ============================================================================

const checkMessageCompatibility =
  (identifier: MessageIdentifier) =>
  (...messages: ReadonlyArray<Message>) =>
    Effect.forEach(messages, (message) => identifier.getMessageId(message), { discard: true });

// ============================================================================
// Construction
// ============================================================================

const buildChannel = <Meta>(metadata: Meta, core: ChannelCore): Channel<Meta> => ({
  queues: core.queues,
  decoder: core.decoder,
  identifier: core.identifier,
  metadata: () => metadata,
  replyTimeout: () => Ref.get(core.replyTimeout),
  setReplyTimeout: (timeout) => Ref.set(core.replyTimeout, Duration.decode(timeout)),
  sendRequest: sendRequest(core),
  sendMultiRequest: sendMultiRequest(core),
  subscribeNotification: subscribeNotification(core.queues),
  unsubscribeNotification: unsubscribeNotification(core.queues),
  checkMessageCompatibility: checkMessageCompatibility(core.identifier),
  close: () => Queue.shutdown(core.queues.requests),
});

/**
 * Creates a channel that is not yet wired to any peer. Providers call this
 * and then serve the channel's queues.
 */
export const makeChannel = <Meta>(options: ChannelOptions<Meta>): Effect.Effect<Channel<Meta>> =>
  pipe(
    makeChannelQueues(
      options.requestBufferSize ?? defaultChannelConfiguration.requestBufferSize,
      options.replyBufferSize ?? defaultChannelConfiguration.replyBufferSize,
      options.notificationBufferSize ?? defaultChannelConfiguration.notificationBufferSize
    ),
    Effect.flatMap((queues) =>
      makeChannelCore(
        queues,
        options.decoder,
        options.identifier,
        options.replyTimeout === undefined
          ? defaultChannelConfiguration.replyTimeout
          : Duration.decode(options.replyTimeout)
      )
    ),
    Effect.map((core) => buildChannel(options.metadata, core))
  );
