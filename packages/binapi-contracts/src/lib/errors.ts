/**
 * Channel Error Types
 *
 * Every failure a channel operation can report. Each error is returned in the
 * typed error channel of the operation that detected it.
 */

import { Data, Duration } from 'effect';

// ============================================================================
// Context and Argument Errors
// ============================================================================

export class InvalidContextError extends Data.TaggedError('InvalidContextError')<{
  readonly message: string;
}> {}

export class NilMessageError extends Data.TaggedError('NilMessageError')<{
  readonly message: string;
}> {}

// ============================================================================
// Correlation Errors
// ============================================================================

export class ReplyTimeoutError extends Data.TaggedError('ReplyTimeoutError')<{
  readonly timeout: Duration.Duration;
  readonly message: string;
}> {}

export class IncompatibleMessageError extends Data.TaggedError('IncompatibleMessageError')<{
  readonly messageName: string;
  readonly crc: string;
  readonly message: string;
}> {}

export class UnexpectedMessageIdError extends Data.TaggedError('UnexpectedMessageIdError')<{
  readonly expected: number;
  readonly received: number;
  readonly messageName: string;
  readonly message: string;
}> {}

export class UnexpectedTerminatorError extends Data.TaggedError('UnexpectedTerminatorError')<{
  readonly message: string;
}> {}

export class DecodeError extends Data.TaggedError('DecodeError')<{
  readonly messageName: string;
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class EncodeError extends Data.TaggedError('EncodeError')<{
  readonly messageName: string;
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class UnknownMessageIdError extends Data.TaggedError('UnknownMessageIdError')<{
  readonly messageId: number;
  readonly message: string;
}> {}

// ============================================================================
// Transport and Lifecycle Errors
// ============================================================================

/**
 * Failure reported by the provider for a single exchange. Carried inside a
 * reply envelope and surfaced by the receiving call unchanged.
 */
export class TransportError extends Data.TaggedError('TransportError')<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ChannelClosedError extends Data.TaggedError('ChannelClosedError')<{
  readonly message: string;
}> {}

export class ChannelInUseError extends Data.TaggedError('ChannelInUseError')<{
  readonly message: string;
}> {}

export class SubscriptionError extends Data.TaggedError('SubscriptionError')<{
  readonly messageName: string;
  readonly message: string;
}> {}

// ============================================================================
// Constructors
// ============================================================================

export const replyTimeoutError = (timeout: Duration.Duration) =>
  new ReplyTimeoutError({
    timeout,
    message: `no reply received within the timeout period ${Duration.toMillis(timeout)}ms`,
  });

export const incompatibleMessageError = (messageName: string, crc: string) =>
  new IncompatibleMessageError({
    messageName,
    crc,
    message: `message ${messageName} with CRC ${crc} is not compatible with the connected peer`,
  });

export const unexpectedMessageIdError = (expected: number, received: number, messageName: string) =>
  new UnexpectedMessageIdError({
    expected,
    received,
    messageName,
    message: `received invalid message ID, expected ${expected} (${messageName}), but got ${received} (check that the channel is not shared between concurrent callers)`,
  });
