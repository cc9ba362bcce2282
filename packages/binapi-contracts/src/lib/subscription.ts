/**
 * Notification Subscriptions
 *
 * A subscription pairs a caller-owned queue with a factory for fresh message
 * instances. Delivery is best-effort: a full queue drops the notification
 * instead of holding up the dispatcher.
 */

import { Effect, Queue, pipe } from 'effect';
import type { Message } from './message';
import type { MessageDecoder } from './collaborators';
import type { DecodeError } from './errors';

/**
 * What a provider needs to dispatch notifications to a subscription, whatever
 * message type it was created for.
 */
export interface NotificationSink {
  readonly template: () => Message;
  /**
   * Decodes `data` into a fresh message and offers it to the caller's queue.
   * Succeeds with false when the notification was dropped.
   */
  readonly deliver: (
    data: Uint8Array,
    decoder: MessageDecoder
  ) => Effect.Effect<boolean, DecodeError, never>;
}

export interface Subscription<M extends Message> extends NotificationSink {
  readonly notificationQueue: Queue.Enqueue<M>;
  readonly messageFactory: () => M;
}

const dropped = Effect.succeed(false);

const offerUnlessFull =
  <M>(queue: Queue.Enqueue<M>) =>
  (message: M): Effect.Effect<boolean> =>
    pipe(
      Queue.isShutdown(queue),
      Effect.flatMap((shutdown) =>
        Effect.if(shutdown, {
          onTrue: () => dropped,
          onFalse: () =>
            pipe(
              Queue.isFull(queue),
              Effect.flatMap((full) =>
                Effect.if(full, {
                  onTrue: () => dropped,
                  onFalse: () => Queue.offer(queue, message),
                })
              )
            ),
        })
      )
    );

export const makeSubscription = <M extends Message>(
  notificationQueue: Queue.Enqueue<M>,
  messageFactory: () => M
): Subscription<M> => ({
  notificationQueue,
  messageFactory,
  template: messageFactory,
  deliver: (data, decoder) =>
    pipe(
      Effect.sync(messageFactory),
      Effect.flatMap((into) => decoder.decode(data, into)),
      Effect.flatMap(offerUnlessFull(notificationQueue))
    ),
});
