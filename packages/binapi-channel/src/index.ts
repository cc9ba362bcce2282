/**
 * @binapi/channel
 *
 * Request/reply correlation over a binary message channel: send a typed
 * request, receive exactly the matching typed reply, consume multipart
 * replies up to their terminator, and subscribe to notifications.
 */

export type { Channel, ChannelOptions } from './lib/channel';
export { makeChannel } from './lib/channel';

export type { ChannelQueues } from './lib/channel-core';

export type { RequestCtx, MultiRequestCtx } from './lib/request-context';
export type { MultipartReply, ReceiveReplyError } from './lib/correlation';

export type { ChannelProvider, ChannelBufferSizes } from './lib/provider';
export { ChannelProviderService, newChannel, newChannelBuffered } from './lib/provider';

export type { ChannelConfigurationService } from './lib/configuration';
export {
  ChannelConfiguration,
  ChannelConfigurationDefault,
  ChannelConfigurationLive,
  makeChannelConfigurationLive,
  defaultChannelConfiguration,
} from './lib/configuration';

// Re-export contracts for convenience
export * from '@binapi/contracts';
