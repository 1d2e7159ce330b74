/**
 * Stream client configuration.
 *
 * Options are merged over {@link DEFAULT_STREAM_CONFIG} and validated once at
 * construction; an invalid value throws `ConfigError` listing every issue.
 */

import { z } from 'zod';
import { ConfigError, isLogLevel, type LogLevel } from '@ciris-stream/utils';
import type { DropPolicy } from './delivery-queue.js';
import { channelFilterSchema, type ChannelSubscriptions } from './filters.js';
import type { TransportFactory } from './transports/types.js';

export interface StreamClientConfig {
  /** API base address (http(s)://) or the stream endpoint itself (ws(s)://) */
  baseUrl: string;
  /** Bearer credential for the handshake */
  token?: string;
  /** Auto-reconnect on connection loss */
  reconnect: boolean;
  /** First reconnect delay (ms) */
  reconnectDelayMs: number;
  /** Reconnect delay cap (ms) */
  reconnectMaxDelayMs: number;
  /** Give up after this many consecutive failed reconnects; unset retries forever */
  maxReconnectAttempts?: number;
  /** Proportional backoff jitter in [0, 1); 0 disables */
  reconnectJitter: number;
  /** Delivery queue capacity */
  bufferSize: number;
  /** Message discarded when the queue is full */
  dropPolicy: DropPolicy;
  /** Occupancy ratio that triggers the backpressure warning */
  highWaterMark: number;
  /** Keepalive interval (ms) */
  heartbeatIntervalMs: number;
  /** Fail the connection after this many silent heartbeat intervals; 0 disables */
  heartbeatTimeoutMultiplier: number;
  /** Handshake timeout (ms) */
  connectTimeoutMs: number;
  /** Channels to subscribe from the first connect on */
  subscriptions?: ChannelSubscriptions;
  /** Transport override, mainly for tests */
  transportFactory?: TransportFactory;
  /** Log level for the client's own loggers */
  logLevel?: LogLevel;
}

export type StreamClientOptions = Partial<StreamClientConfig> & Pick<StreamClientConfig, 'baseUrl'>;

export const DEFAULT_STREAM_CONFIG: Omit<StreamClientConfig, 'baseUrl'> = {
  reconnect: true,
  reconnectDelayMs: 1_000,
  reconnectMaxDelayMs: 60_000,
  reconnectJitter: 0,
  bufferSize: 1_000,
  dropPolicy: 'oldest',
  highWaterMark: 0.8,
  heartbeatIntervalMs: 30_000,
  heartbeatTimeoutMultiplier: 0,
  connectTimeoutMs: 10_000,
};

const STREAM_PROTOCOLS = ['http:', 'https:', 'ws:', 'wss:'];

function hasStreamProtocol(value: string): boolean {
  return URL.canParse(value) && STREAM_PROTOCOLS.includes(new URL(value).protocol);
}

const configSchema = z
  .object({
    baseUrl: z
      .string()
      .url()
      .refine(hasStreamProtocol, {
        message: 'Expected an http(s):// or ws(s):// URL',
      }),
    token: z.string().min(1).optional(),
    reconnect: z.boolean(),
    reconnectDelayMs: z.number().positive(),
    reconnectMaxDelayMs: z.number().positive(),
    maxReconnectAttempts: z.number().int().nonnegative().optional(),
    reconnectJitter: z.number().min(0).lt(1),
    bufferSize: z.number().int().positive(),
    dropPolicy: z.enum(['oldest', 'newest']),
    highWaterMark: z.number().gt(0).max(1),
    heartbeatIntervalMs: z.number().positive(),
    heartbeatTimeoutMultiplier: z.number().nonnegative(),
    connectTimeoutMs: z.number().positive(),
    logLevel: z.string().refine(isLogLevel, { message: 'Unknown log level' }).optional(),
    subscriptions: z
      .record(z.string().min(1, 'Channel name must not be empty'), channelFilterSchema.nullable().optional())
      .optional(),
  })
  .refine((config) => config.reconnectMaxDelayMs >= config.reconnectDelayMs, {
    message: 'reconnectMaxDelayMs must be >= reconnectDelayMs',
    path: ['reconnectMaxDelayMs'],
  });

/**
 * Merge options over the defaults and validate the result.
 * @throws ConfigError
 */
export function resolveStreamConfig(options: StreamClientOptions): StreamClientConfig {
  const merged: StreamClientConfig = {
    ...DEFAULT_STREAM_CONFIG,
    ...stripUndefined(options),
    baseUrl: options.baseUrl,
  };
  const result = configSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }
  return merged;
}

function stripUndefined<T extends object>(value: T): Partial<T> {
  return Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== undefined));
}

function parseBoolean(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === '') return undefined;
  return !['0', 'false', 'no', 'off'].includes(raw.trim().toLowerCase());
}

function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Read options from the environment:
 * `CIRIS_API_URL`, `CIRIS_API_KEY`, `CIRIS_STREAM_RECONNECT`,
 * `CIRIS_STREAM_BUFFER_SIZE`, `CIRIS_STREAM_HEARTBEAT_MS`.
 */
export function streamConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<StreamClientConfig> {
  const config: Partial<StreamClientConfig> = {
    baseUrl: env.CIRIS_API_URL || undefined,
    token: env.CIRIS_API_KEY || undefined,
    reconnect: parseBoolean(env.CIRIS_STREAM_RECONNECT),
    bufferSize: parseNumber(env.CIRIS_STREAM_BUFFER_SIZE),
    heartbeatIntervalMs: parseNumber(env.CIRIS_STREAM_HEARTBEAT_MS),
  };
  return stripUndefined(config);
}
