/**
 * Channel filters.
 *
 * A filter is an opaque record of JSON values sent verbatim in the subscribe
 * frame. The client never interprets it; it only freezes a normalized copy so
 * a replay after reconnect serializes to the same bytes as the original call.
 */

import { z } from 'zod';
import { ValidationError } from '@ciris-stream/utils';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** Opaque per-channel criteria. */
export type ChannelFilter = Readonly<Record<string, JsonValue>>;

/** Criteria understood by the server's built-in channels. */
export interface KnownChannelFilter {
  /** Telemetry: service names */
  services?: string[];
  /** Telemetry: metric names */
  metrics?: string[];
  /** Logs: minimum level (DEBUG, INFO, WARNING, ERROR) */
  level?: string;
  /** Logs: originating service */
  service?: string;
  /** Messages: author */
  author?: string;
  /** Reasoning: task identifier */
  task_id?: string;
  /** Reasoning: minimum depth */
  min_depth?: number;
}

/** Channel name to filter; `null`/`undefined` means unrestricted. */
export type ChannelSubscriptions = Record<string, ChannelFilter | KnownChannelFilter | null | undefined>;

export const EventChannel = {
  Telemetry: 'telemetry',
  Logs: 'logs',
  Messages: 'messages',
  Reasoning: 'reasoning',
} as const;

export type EventChannelName = (typeof EventChannel)[keyof typeof EventChannel];

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

/** Accepts what `freezeFilter` accepts: JSON fields, plus `null`/`undefined` ones it drops. */
export const channelFilterSchema = z.record(jsonValueSchema.optional());

function deepFreeze(value: JsonValue): void {
  if (Array.isArray(value)) {
    value.forEach(deepFreeze);
    Object.freeze(value);
  } else if (value !== null && typeof value === 'object') {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
}

/**
 * Validate a filter, drop `null`/`undefined` fields and return a deep-frozen
 * copy.
 * @throws ValidationError when a field is not JSON
 */
export function freezeFilter(filter: ChannelFilter | KnownChannelFilter | null | undefined): ChannelFilter {
  if (filter === null || filter === undefined) {
    return Object.freeze({});
  }
  const result = channelFilterSchema.safeParse(filter);
  if (!result.success) {
    throw new ValidationError(
      'Invalid channel filter',
      result.error.issues.map((issue) => `${issue.path.join('.') || 'filter'}: ${issue.message}`)
    );
  }
  const parsed = result.data;
  const copy: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (value === null || value === undefined) continue;
    copy[key] = structuredClone(value);
  }
  deepFreeze(copy);
  return copy;
}

/** Wire form of a frozen filter, fields in the order they were given. */
export function serializeFilter(filter: ChannelFilter): string {
  return JSON.stringify(filter);
}

function sortKeys(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, JsonValue> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}

/** Structural equality; field order does not matter. */
export function filtersEqual(a: ChannelFilter, b: ChannelFilter): boolean {
  return JSON.stringify(sortKeys(a)) === JSON.stringify(sortKeys(b));
}

export function isUnrestricted(filter: ChannelFilter): boolean {
  return Object.keys(filter).length === 0;
}
