/**
 * Wire protocol for the `/v1/stream` endpoint.
 *
 * Outbound control frames:
 *   {"action":"subscribe","channels":{"telemetry":{"services":["memory"]}}}
 *   {"action":"unsubscribe","channels":["telemetry"]}
 *   {"type":"ping","timestamp":"2026-01-01T00:00:00.000Z"}
 *
 * Inbound frames are either data messages
 *   {"channel","event_type","timestamp","data","sequence"}
 * or control notices (`{"type":"error","message"}`, `{"type":"pong"}`).
 */

import { z } from 'zod';
import type { ChannelFilter } from './filters.js';

export interface SubscribeFrame {
  action: 'subscribe';
  channels: Record<string, ChannelFilter>;
}

export interface UnsubscribeFrame {
  action: 'unsubscribe';
  channels: string[];
}

export interface PingFrame {
  type: 'ping';
  timestamp: string;
}

export type ControlFrame = SubscribeFrame | UnsubscribeFrame | PingFrame;

/** A data message as delivered to the consumer. */
export interface StreamMessage {
  readonly channel: string;
  readonly eventType: string;
  readonly timestamp: Date;
  readonly data: Readonly<Record<string, unknown>>;
  readonly sequence: number;
  /** Connection epoch the message arrived in. */
  readonly epoch: number;
}

export type InboundFrame =
  | { kind: 'data'; channel: string; eventType: string; timestamp: Date; data: Record<string, unknown>; sequence: number }
  | { kind: 'error'; message: string }
  | { kind: 'pong' };

export type DecodeResult =
  | { ok: true; frame: InboundFrame }
  | { ok: false; reason: string };

const dataFrameSchema = z.object({
  channel: z.string().min(1),
  event_type: z.string(),
  timestamp: z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
    message: 'Invalid timestamp',
  }),
  data: z.record(z.unknown()),
  sequence: z.number().int(),
});

const errorFrameSchema = z.object({
  type: z.literal('error'),
  message: z.string().optional(),
});

export function encodeSubscribe(channels: Record<string, ChannelFilter>): string {
  const frame: SubscribeFrame = { action: 'subscribe', channels };
  return JSON.stringify(frame);
}

export function encodeUnsubscribe(channels: readonly string[]): string {
  const frame: UnsubscribeFrame = { action: 'unsubscribe', channels: [...channels] };
  return JSON.stringify(frame);
}

export function encodePing(now: Date = new Date()): string {
  const frame: PingFrame = { type: 'ping', timestamp: now.toISOString() };
  return JSON.stringify(frame);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Decode one inbound text frame. Never throws: malformed input yields
 * `{ ok: false }` with a reason suitable for logging.
 */
export function decodeFrame(raw: string): DecodeResult {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return { ok: false, reason: 'Invalid JSON' };
  }

  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return { ok: false, reason: 'Frame is not a JSON object' };
  }

  if ('type' in value) {
    const type = value.type;
    if (type === 'pong') {
      return { ok: true, frame: { kind: 'pong' } };
    }
    if (type === 'error') {
      const parsed = errorFrameSchema.safeParse(value);
      if (!parsed.success) {
        return { ok: false, reason: `Malformed error notice: ${describeIssues(parsed.error)}` };
      }
      return { ok: true, frame: { kind: 'error', message: parsed.data.message ?? 'Unknown server error' } };
    }
    if (!('channel' in value)) {
      return { ok: false, reason: `Unexpected control message: ${String(type)}` };
    }
  }

  const parsed = dataFrameSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, reason: `Malformed data message: ${describeIssues(parsed.error)}` };
  }

  return {
    ok: true,
    frame: {
      kind: 'data',
      channel: parsed.data.channel,
      eventType: parsed.data.event_type,
      timestamp: new Date(parsed.data.timestamp),
      data: parsed.data.data,
      sequence: parsed.data.sequence,
    },
  };
}

/** Freeze a decoded data frame into a consumer-facing message. */
export function toStreamMessage(
  frame: Extract<InboundFrame, { kind: 'data' }>,
  epoch: number
): StreamMessage {
  return Object.freeze({
    channel: frame.channel,
    eventType: frame.eventType,
    timestamp: frame.timestamp,
    data: Object.freeze({ ...frame.data }),
    sequence: frame.sequence,
    epoch,
  });
}
