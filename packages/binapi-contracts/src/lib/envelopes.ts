/**
 * Channel Envelopes
 *
 * Records that move through a channel's queues between the caller and the
 * provider. The caller never builds reply envelopes; the provider never
 * interprets request payloads beyond handing them to the peer.
 */

import { Data, Either } from 'effect';
import type { Message } from './message';
import type { SubscriptionError, TransportError } from './errors';
import type { NotificationSink } from './subscription';

// ============================================================================
// Requests
// ============================================================================

export interface RequestEnvelope {
  readonly message: Message;
  /** Set when the peer answers with zero or more replies and a terminator. */
  readonly multipart: boolean;
}

export const makeRequestEnvelope = (message: Message, multipart: boolean): RequestEnvelope => ({
  message,
  multipart,
});

// ============================================================================
// Replies
// ============================================================================

export type ReplyEnvelope = Data.TaggedEnum<{
  Data: { readonly messageId: number; readonly data: Uint8Array };
  Terminator: {};
  Failed: { readonly error: TransportError };
}>;

export const ReplyEnvelope = Data.taggedEnum<ReplyEnvelope>();

// ============================================================================
// Notification Subscription Control
// ============================================================================

export interface SubscriptionRequest {
  readonly subscription: NotificationSink;
  /** true to add the subscription, false to remove it */
  readonly subscribe: boolean;
}

export type SubscriptionAck = Either.Either<void, SubscriptionError>;

export const subscriptionAccepted: SubscriptionAck = Either.right(undefined);

export const subscriptionRejected = (error: SubscriptionError): SubscriptionAck =>
  Either.left(error);
