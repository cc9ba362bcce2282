import { Duration, Effect, Queue, Ref, pipe } from 'effect';
import type {
  MessageDecoder,
  MessageIdentifier,
  ReplyEnvelope,
  RequestEnvelope,
  SubscriptionAck,
  SubscriptionRequest,
} from '@binapi/contracts';

/**
 * The four queues a channel shares with its provider. The caller side offers
 * to `requests` and `subscriptionRequests` and takes from the other two; the
 * provider does the opposite.
 */
export interface ChannelQueues {
  readonly requests: Queue.Queue<RequestEnvelope>;
  readonly replies: Queue.Queue<ReplyEnvelope>;
  readonly subscriptionRequests: Queue.Queue<SubscriptionRequest>;
  readonly subscriptionReplies: Queue.Queue<SubscriptionAck>;
}

export interface ChannelCore {
  readonly queues: ChannelQueues;
  readonly decoder: MessageDecoder;
  readonly identifier: MessageIdentifier;
  readonly replyTimeout: Ref.Ref<Duration.Duration>;
  /** held while a receive is waiting on `replies` */
  readonly receiving: Ref.Ref<boolean>;
}

export const makeChannelQueues = (
  requestBufferSize: number,
  replyBufferSize: number,
  notificationBufferSize: number
): Effect.Effect<ChannelQueues> =>
  Effect.all({
    requests: Queue.bounded<RequestEnvelope>(requestBufferSize),
    replies: Queue.bounded<ReplyEnvelope>(replyBufferSize),
    subscriptionRequests: Queue.bounded<SubscriptionRequest>(notificationBufferSize),
    subscriptionReplies: Queue.bounded<SubscriptionAck>(notificationBufferSize),
  });

export const makeChannelCore = (
  queues: ChannelQueues,
  decoder: MessageDecoder,
  identifier: MessageIdentifier,
  replyTimeout: Duration.Duration
): Effect.Effect<ChannelCore> =>
  pipe(
    Effect.all({
      replyTimeout: Ref.make(replyTimeout),
      receiving: Ref.make(false),
    }),
    Effect.map((refs) => ({ queues, decoder, identifier, ...refs }))
  );
