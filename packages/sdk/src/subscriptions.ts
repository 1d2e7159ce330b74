/**
 * Desired subscription state.
 *
 * The server forgets subscriptions when the socket goes away, so the full set
 * is replayed as one subscribe frame on every (re)connect. Live changes are
 * sent immediately only while connected; otherwise they wait for the replay.
 */

import { ValidationError, createLogger, type Logger } from '@ciris-stream/utils';
import { freezeFilter, type ChannelFilter, type ChannelSubscriptions, type KnownChannelFilter } from './filters.js';
import { encodeSubscribe, encodeUnsubscribe } from './protocol.js';

export interface SubscriptionSink {
  /** True while frames can be sent. */
  isConnected(): boolean;
  /** Send a text frame; false when the transport refused it. */
  send(frame: string): boolean;
}

export class SubscriptionManager {
  private readonly entries = new Map<string, ChannelFilter>();

  private readonly log: Logger;

  constructor(private readonly sink: SubscriptionSink, logger?: Logger) {
    this.log = logger ?? createLogger('subscriptions');
  }

  get size(): number {
    return this.entries.size;
  }

  has(channel: string): boolean {
    return this.entries.has(channel);
  }

  get(channel: string): ChannelFilter | undefined {
    return this.entries.get(channel);
  }

  /**
   * Insert or replace one channel's filter. Returns whether a frame went out
   * (false when it was only recorded for the next replay).
   */
  subscribe(channel: string, filter?: ChannelFilter | KnownChannelFilter | null): boolean {
    return this.subscribeAll({ [channel]: filter });
  }

  /** Insert or replace several channels and send them as one frame. */
  subscribeAll(channels: ChannelSubscriptions): boolean {
    const names = Object.keys(channels);
    if (names.length === 0) return false;

    const frozen: Record<string, ChannelFilter> = {};
    for (const name of names) {
      if (name.length === 0) {
        throw new ValidationError('Channel name must not be empty');
      }
      frozen[name] = freezeFilter(channels[name]);
    }
    for (const [name, filter] of Object.entries(frozen)) {
      this.entries.set(name, filter);
    }

    return this.sendIfConnected(encodeSubscribe(frozen), 'subscribe', names);
  }

  /**
   * Remove channels. Returns the channels that were actually subscribed; the
   * unsubscribe frame is sent for all requested names while connected.
   */
  unsubscribe(channels: readonly string[]): string[] {
    if (channels.length === 0) return [];

    const removed = channels.filter((channel) => this.entries.delete(channel));
    this.sendIfConnected(encodeUnsubscribe(channels), 'unsubscribe', [...channels]);
    return removed;
  }

  /** Consistent copy of the current set, safe to hold across mutations. */
  snapshot(): Readonly<Record<string, ChannelFilter>> {
    return Object.freeze(Object.fromEntries(this.entries));
  }

  /**
   * Resend the whole set as one frame. Called on every entry into the
   * connected state. Returns false only when the frame could not be sent.
   */
  replay(): boolean {
    const snapshot = this.snapshot();
    const channels = Object.keys(snapshot);
    if (channels.length === 0) {
      this.log.debug('Nothing to replay');
      return true;
    }
    const sent = this.sink.send(encodeSubscribe(snapshot));
    if (sent) {
      this.log.info('Replayed subscriptions', { channels });
    } else {
      this.log.warn('Failed to replay subscriptions', { channels });
    }
    return sent;
  }

  clear(): void {
    this.entries.clear();
  }

  private sendIfConnected(frame: string, action: string, channels: string[]): boolean {
    if (!this.sink.isConnected()) {
      this.log.debug(`Deferred ${action} until next connect`, { channels });
      return false;
    }
    const sent = this.sink.send(frame);
    if (sent) {
      this.log.info(action === 'subscribe' ? 'Subscribed to channels' : 'Unsubscribed from channels', { channels });
    } else {
      this.log.warn(`Failed to send ${action}; will apply on reconnect`, { channels });
    }
    return sent;
  }
}
