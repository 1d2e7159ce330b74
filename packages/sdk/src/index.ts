/**
 * @ciris-stream/sdk
 *
 * Self-healing client for an agent's real-time event stream.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { StreamClient } from '@ciris-stream/sdk';
 *
 * const client = new StreamClient({ baseUrl: 'https://agent.example.com', token: 'my-token' });
 * await client.connect();
 * client.subscribeAll({
 *   telemetry: { services: ['memory', 'llm'] },
 *   logs: { level: 'ERROR' },
 * });
 *
 * for await (const message of client) {
 *   console.log(message.channel, message.eventType, message.data);
 * }
 * ```
 *
 * ## From the Environment
 *
 * ```typescript
 * import { connectStream, streamConfigFromEnv } from '@ciris-stream/sdk';
 *
 * const client = await connectStream({ baseUrl: 'http://localhost:8080', ...streamConfigFromEnv() });
 * ```
 */

// Client
export { StreamClient, connectStream, type StreamState, type StreamStats } from './client.js';

// Configuration
export {
  DEFAULT_STREAM_CONFIG,
  resolveStreamConfig,
  streamConfigFromEnv,
  type StreamClientConfig,
  type StreamClientOptions,
} from './config.js';

// Filters
export {
  EventChannel,
  channelFilterSchema,
  freezeFilter,
  serializeFilter,
  filtersEqual,
  isUnrestricted,
  type ChannelFilter,
  type ChannelSubscriptions,
  type JsonValue,
  type KnownChannelFilter,
} from './filters.js';

// Wire protocol
export {
  decodeFrame,
  encodePing,
  encodeSubscribe,
  encodeUnsubscribe,
  toStreamMessage,
  type DecodeResult,
  type InboundFrame,
  type StreamMessage,
} from './protocol.js';

// Building blocks
export { Sequencer, type SequenceObservation } from './sequencer.js';
export { DeliveryQueue, type CloseMode, type DeliveryQueueOptions, type DropPolicy } from './delivery-queue.js';
export { Backoff, computeBackoffDelay, type BackoffPolicy } from './backoff.js';
export { SubscriptionManager, type SubscriptionSink } from './subscriptions.js';
export { MessagePump, type MessagePumpOptions, type PumpCounters, type SequenceGap } from './pump.js';

// Transports
export * from './transports/index.js';

// Errors (re-exported so consumers need a single import)
export {
  StreamError,
  ConnectionError,
  AuthenticationError,
  TimeoutError,
  NotConnectedError,
  ClientClosedError,
  ConfigError,
  ValidationError,
  ReconnectExhaustedError,
  type StreamErrorCode,
} from '@ciris-stream/utils';
