/**
 * @binapi/contracts
 *
 * Message descriptors, envelopes and collaborator contracts shared by channel
 * implementations and channel providers.
 *
 * This package contains ONLY types, errors and small constructors - no queues
 * are created and no provider is implemented here.
 */

// Message descriptors
export type { Message, MessageType, DataType, MessageFields } from './lib/message';
export { messageKey, isSameDefinition, payloadOf, defineMessage } from './lib/message';

// Collaborator contracts
export type {
  MessageDecoder,
  MessageEncoder,
  MessageCodec,
  MessageIdentifier,
} from './lib/collaborators';

// Envelopes
export type { RequestEnvelope, SubscriptionRequest, SubscriptionAck } from './lib/envelopes';
export {
  ReplyEnvelope,
  makeRequestEnvelope,
  subscriptionAccepted,
  subscriptionRejected,
} from './lib/envelopes';

// Subscriptions
export type { NotificationSink, Subscription } from './lib/subscription';
export { makeSubscription } from './lib/subscription';

// Errors
export {
  InvalidContextError,
  NilMessageError,
  ReplyTimeoutError,
  IncompatibleMessageError,
  UnexpectedMessageIdError,
  UnexpectedTerminatorError,
  DecodeError,
  EncodeError,
  UnknownMessageIdError,
  TransportError,
  ChannelClosedError,
  ChannelInUseError,
  SubscriptionError,
  replyTimeoutError,
  incompatibleMessageError,
  unexpectedMessageIdError,
} from './lib/errors';
