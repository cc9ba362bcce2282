import { Effect, Scope, pipe } from 'effect';
import type { Channel } from './channel';

export interface ChannelBufferSizes {
  readonly requestBufferSize: number;
  readonly replyBufferSize: number;
}

/**
 * Constructs channels wired to a live peer.
 *
 * A channel lives until its scope closes or until it is closed explicitly,
 * whichever comes first.
 */
export interface ChannelProvider<Meta = unknown> {
  /** Uses the configured buffer sizes. */
  readonly newChannel: () => Effect.Effect<Channel<Meta>, never, Scope.Scope>;
  readonly newChannelBuffered: (
    sizes: ChannelBufferSizes
  ) => Effect.Effect<Channel<Meta>, never, Scope.Scope>;
}

export class ChannelProviderService extends Effect.Tag('@binapi/ChannelProvider')<
  ChannelProviderService,
  ChannelProvider
>() {}

// Convenience functions for using the service
export const newChannel = () =>
  pipe(
    ChannelProviderService,
    Effect.flatMap((provider) => provider.newChannel())
  );

export const newChannelBuffered = (sizes: ChannelBufferSizes) =>
  pipe(
    ChannelProviderService,
    Effect.flatMap((provider) => provider.newChannelBuffered(sizes))
  );
