import { Config, Duration, Effect, Layer, pipe } from 'effect';

export type ChannelConfigurationService = {
  readonly replyTimeout: Duration.Duration;
  readonly requestBufferSize: number;
  readonly replyBufferSize: number;
  readonly notificationBufferSize: number;
};

export class ChannelConfiguration extends Effect.Tag('ChannelConfiguration')<
  ChannelConfiguration,
  ChannelConfigurationService
>() {}

export const defaultChannelConfiguration: ChannelConfigurationService = {
  replyTimeout: Duration.seconds(1),
  requestBufferSize: 100,
  replyBufferSize: 100,
  notificationBufferSize: 100,
};

export const ChannelConfigurationDefault = Layer.succeed(
  ChannelConfiguration,
  defaultChannelConfiguration
);

export const makeChannelConfigurationLive = (prefix: string) =>
  Layer.effect(
    ChannelConfiguration,
    pipe(
      Config.nested(
        Config.all([
          Config.withDefault(
            Config.duration('REPLY_TIMEOUT'),
            defaultChannelConfiguration.replyTimeout
          ),
          Config.withDefault(
            Config.integer('REQUEST_BUFFER_SIZE'),
            defaultChannelConfiguration.requestBufferSize
          ),
          Config.withDefault(
            Config.integer('REPLY_BUFFER_SIZE'),
            defaultChannelConfiguration.replyBufferSize
          ),
          Config.withDefault(
            Config.integer('NOTIFICATION_BUFFER_SIZE'),
            defaultChannelConfiguration.notificationBufferSize
          ),
        ]),
        prefix
      ),
      Effect.map(([replyTimeout, requestBufferSize, replyBufferSize, notificationBufferSize]) => ({
        replyTimeout,
        requestBufferSize,
        replyBufferSize,
        notificationBufferSize,
      }))
    )
  );

export const ChannelConfigurationLive = makeChannelConfigurationLive('BINAPI');
