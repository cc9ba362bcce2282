/**
 * @binapi/channel-inmemory
 *
 * In-process channel provider. An engine owns a message table, a codec and a
 * set of request handlers, and serves every channel opened through its
 * provider without any transport.
 *
 * Useful for tests and for running channel clients against a simulated peer.
 */

import {
  InMemoryEngine,
  type InMemoryEngineOptions,
  type InMemoryChannel,
  type InMemoryChannelMetadata,
  type RequestHandler,
} from './lib/inmemory-engine';

// Main engine implementation
export { InMemoryEngine };

export type { InMemoryEngineOptions, InMemoryChannel, InMemoryChannelMetadata, RequestHandler };

// Collaborators the engine is built from
export { JsonMessageCodec } from './lib/json-codec';
export { makeMessageTable } from './lib/message-table';
