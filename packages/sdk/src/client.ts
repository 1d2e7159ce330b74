/**
 * Stream Client
 * Holds one self-healing connection to the agent's `/v1/stream` endpoint.
 *
 * - Reconnects with exponential backoff and replays subscriptions on every
 *   new connection before any message of that connection is delivered
 * - Tracks sequence numbers per connection epoch and reports gaps
 * - Buffers messages in a bounded queue so a slow consumer never stalls the
 *   socket
 *
 * States:
 *   disconnected -> connecting -> connected
 *                       |            |
 *                       v            v
 *                    reconnecting <---   (auto-reconnect)
 *                       |
 *                       v
 *                     failed          (auto-reconnect off, or attempts exhausted)
 */

import {
  ClientClosedError,
  ConnectionError,
  NotConnectedError,
  ReconnectExhaustedError,
  createLogger,
  toError,
  type Logger,
} from '@ciris-stream/utils';
import { Backoff } from './backoff.js';
import { resolveStreamConfig, type StreamClientConfig, type StreamClientOptions } from './config.js';
import { DeliveryQueue } from './delivery-queue.js';
import type { ChannelFilter, ChannelSubscriptions, KnownChannelFilter } from './filters.js';
import type { StreamMessage } from './protocol.js';
import { MessagePump, type PumpCounters, type SequenceGap } from './pump.js';
import { Sequencer } from './sequencer.js';
import { SubscriptionManager } from './subscriptions.js';
import { defaultTransportFactory, toStreamUrl } from './transports/index.js';
import type { StreamTransport, TransportFactory } from './transports/types.js';

export type StreamState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting' | 'failed';

export interface StreamStats {
  state: StreamState;
  epoch: number;
  /** Consecutive failed attempts since the last successful connect */
  reconnectAttempts: number;
  /** Data messages received, across all connections */
  received: number;
  /** Messages discarded by the drop policy */
  dropped: number;
  /** Messages waiting for the consumer */
  buffered: number;
  gaps: number;
  malformed: number;
  serverErrors: number;
  heartbeatsSent: number;
  subscriptions: number;
}

interface ConnectWaiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

export class StreamClient implements AsyncIterable<StreamMessage> {
  /** Resolved streaming endpoint */
  readonly url: string;

  private readonly config: StreamClientConfig;
  private readonly log: Logger;
  private readonly transportFactory: TransportFactory;
  private readonly subscriptionManager: SubscriptionManager;
  private readonly sequencer = new Sequencer();
  private readonly queue: DeliveryQueue<StreamMessage>;
  private readonly backoff: Backoff;

  private _state: StreamState = 'disconnected';
  private _epoch = 0;
  private started = false;
  private closed = false;
  private transport?: StreamTransport;
  private pump?: MessagePump;
  /** Frames that arrived before the connected state was fully entered */
  private earlyFrames: string[] = [];
  private reconnectTimer?: ReturnType<typeof setTimeout>;
  private connectWaiters: ConnectWaiter[] = [];
  private terminalError?: Error;
  private terminalErrorReported = false;
  private _lastError?: Error;
  private retired: PumpCounters = { received: 0, malformed: 0, serverErrors: 0, heartbeatsSent: 0 };

  // Event handlers
  onStateChange?: (state: StreamState, previous: StreamState) => void;
  onGap?: (gap: SequenceGap) => void;
  onBackpressure?: (size: number, capacity: number) => void;
  onServerError?: (message: string) => void;
  /** Connection-level errors, including ones recovered by reconnecting */
  onError?: (error: Error) => void;

  /**
   * @throws ConfigError when an option is invalid
   */
  constructor(options: StreamClientOptions) {
    this.config = resolveStreamConfig(options);
    this.url = toStreamUrl(this.config.baseUrl);
    this.log = createLogger('stream', { level: this.config.logLevel });
    this.transportFactory = this.config.transportFactory ?? defaultTransportFactory;
    this.backoff = new Backoff({
      baseDelayMs: this.config.reconnectDelayMs,
      maxDelayMs: this.config.reconnectMaxDelayMs,
      jitter: this.config.reconnectJitter,
    });

    this.queue = new DeliveryQueue<StreamMessage>({
      capacity: this.config.bufferSize,
      dropPolicy: this.config.dropPolicy,
      highWaterMark: this.config.highWaterMark,
      onDrop: (message, policy) => {
        this.log.debug('Message buffer full, dropped message', {
          policy,
          channel: message.channel,
          sequence: message.sequence,
        });
      },
      onHighWater: (size, capacity) => {
        this.log.warn('Message buffer above high-water mark', { size, capacity });
        this.onBackpressure?.(size, capacity);
      },
    });

    this.subscriptionManager = new SubscriptionManager(
      {
        isConnected: () => this._state === 'connected' && this.transport !== undefined,
        send: (frame) => this.transport?.send(frame) ?? false,
      },
      this.log.child('subscriptions')
    );
    if (this.config.subscriptions) {
      this.subscriptionManager.subscribeAll(this.config.subscriptions);
    }
  }

  get state(): StreamState {
    return this._state;
  }

  /** Number of successful connections so far */
  get epoch(): number {
    return this._epoch;
  }

  /** Most recent connection error, recovered or not */
  get lastError(): Error | undefined {
    return this._lastError;
  }

  /** Snapshot of the desired subscription set */
  get subscriptions(): Readonly<Record<string, ChannelFilter>> {
    return this.subscriptionManager.snapshot();
  }

  /**
   * Start the connection. Resolves once connected; rejects with the terminal
   * error if the client fails before that, or with `ClientClosedError` if
   * `disconnect()` comes first.
   */
  connect(): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ClientClosedError('connect'));
    }
    if (this._state === 'connected') {
      return Promise.resolve();
    }
    const promise = new Promise<void>((resolve, reject) => {
      this.connectWaiters.push({ resolve, reject });
    });

    if (!this.started) {
      this.started = true;
      this.log.info('Connecting', { url: this.url });
      this.attemptConnect().catch((err: unknown) => {
        this.log.error('Connect attempt crashed', { error: toError(err).message });
      });
    }
    return promise;
  }

  /**
   * Stop for good: no further reconnects, the transport is closed, buffered
   * messages are discarded and any consumer waiting on `messages()` is
   * released.
   */
  disconnect(): void {
    if (this.closed && this._state === 'disconnected') {
      this.queue.close('discard');
      return;
    }
    this.closed = true;

    this.setState('disconnected');
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
    this.retirePump();
    this.dropTransport();
    this.queue.close('discard');
    this.subscriptionManager.clear();
    this.settleConnectWaiter(new ClientClosedError('connect'));
    this.log.info('Disconnected', { epoch: this._epoch });
  }

  /**
   * Subscribe to one channel, replacing its previous filter. Sent at once when
   * connected, otherwise applied by the replay on the next connect.
   * @returns true if a frame was sent now
   */
  subscribe(channel: string, filter?: ChannelFilter | KnownChannelFilter | null): boolean {
    this.assertUsable('subscribe');
    return this.subscriptionManager.subscribe(channel, filter);
  }

  /**
   * Subscribe to several channels in one frame.
   *
   * @example
   * client.subscribeAll({
   *   telemetry: { services: ['memory', 'llm'] },
   *   logs: { level: 'ERROR' },
   *   messages: null,
   * });
   */
  subscribeAll(channels: ChannelSubscriptions): boolean {
    this.assertUsable('subscribe');
    return this.subscriptionManager.subscribeAll(channels);
  }

  /**
   * Unsubscribe from channels. They are not replayed on later connections.
   * @returns the channels that were subscribed
   */
  unsubscribe(channels: string | readonly string[]): string[] {
    this.assertUsable('unsubscribe');
    return this.subscriptionManager.unsubscribe(typeof channels === 'string' ? [channels] : channels);
  }

  /**
   * Send an arbitrary JSON frame on the current connection.
   * @returns false if the socket refused it; the connection is then recycled
   */
  send(data: Record<string, unknown>): boolean {
    if (this.closed) {
      throw new ClientClosedError('send');
    }
    const transport = this.transport;
    if (this._state !== 'connected' || !transport) {
      throw new NotConnectedError('send', this._state);
    }
    const sent = transport.send(JSON.stringify(data));
    if (!sent) {
      this.handleTransportFailure(transport, new ConnectionError('Send failed'));
    }
    return sent;
  }

  /**
   * Iterate over messages in receive order. Ends after `disconnect()`. If the
   * client failed, the messages received before the failure are yielded and
   * then the terminal error is thrown once.
   */
  async *messages(): AsyncGenerator<StreamMessage, void, undefined> {
    while (true) {
      const next = await this.queue.pop();
      if (next.done) break;
      yield next.value;
    }
    this.throwTerminalError();
  }

  [Symbol.asyncIterator](): AsyncGenerator<StreamMessage, void, undefined> {
    return this.messages();
  }

  /**
   * Wait for the next message. Resolves `undefined` once the client has been
   * disconnected.
   */
  async next(): Promise<StreamMessage | undefined> {
    const next = await this.queue.pop();
    if (next.done) {
      this.throwTerminalError();
      return undefined;
    }
    return next.value;
  }

  stats(): StreamStats {
    const live = this.pump?.counters;
    return {
      state: this._state,
      epoch: this._epoch,
      reconnectAttempts: this.backoff.attempts,
      received: this.retired.received + (live?.received ?? 0),
      dropped: this.queue.dropped,
      buffered: this.queue.size,
      gaps: this.sequencer.gaps,
      malformed: this.retired.malformed + (live?.malformed ?? 0),
      serverErrors: this.retired.serverErrors + (live?.serverErrors ?? 0),
      heartbeatsSent: this.retired.heartbeatsSent + (live?.heartbeatsSent ?? 0),
      subscriptions: this.subscriptionManager.size,
    };
  }

  // ─── Connection lifecycle ─────────────────────────────────────────

  private async attemptConnect(): Promise<void> {
    this.reconnectTimer = undefined;
    if (this.closed) return;

    this.setState('connecting');
    const transport = this.transportFactory({
      url: this.url,
      token: this.config.token,
      connectTimeoutMs: this.config.connectTimeoutMs,
    });
    this.transport = transport;
    this.earlyFrames = [];
    transport.setEvents({
      onMessage: (data) => this.handleTransportMessage(transport, data),
      onClose: (code, reason) => {
        const detail = reason ? `${code}: ${reason}` : String(code);
        this.handleTransportFailure(transport, new ConnectionError(`Connection closed (${detail})`, { closeCode: code }));
      },
      onError: (error) => this.handleTransportFailure(transport, error),
    });

    try {
      await transport.connect();
    } catch (err) {
      this.handleTransportFailure(transport, toError(err));
      return;
    }

    if (this.transport !== transport || this.closed) {
      // Superseded while the handshake finished.
      transport.close();
      return;
    }
    this.handleConnected(transport);
  }

  private handleConnected(transport: StreamTransport): void {
    if (!this.subscriptionManager.replay()) {
      this.handleTransportFailure(transport, new ConnectionError('Failed to replay subscriptions'));
      return;
    }

    this._epoch++;
    this.backoff.reset();
    this.sequencer.reset(this._epoch);

    const pump = new MessagePump({
      epoch: this._epoch,
      sequencer: this.sequencer,
      queue: this.queue,
      send: (frame) => transport.send(frame),
      heartbeatIntervalMs: this.config.heartbeatIntervalMs,
      heartbeatTimeoutMs: this.config.heartbeatIntervalMs * this.config.heartbeatTimeoutMultiplier,
      onFailure: (error) => this.handleTransportFailure(transport, error),
      onGap: (gap) => this.onGap?.(gap),
      onServerError: (message) => this.onServerError?.(message),
      logger: this.log.child('pump'),
    });
    this.pump = pump;
    pump.start();

    this.log.info('Connected', { url: this.url, epoch: this._epoch, subscriptions: this.subscriptionManager.size });
    this.setState('connected');

    const early = this.earlyFrames;
    this.earlyFrames = [];
    for (const frame of early) {
      pump.handleFrame(frame);
    }

    const waiters = this.connectWaiters;
    this.connectWaiters = [];
    for (const waiter of waiters) waiter.resolve();
  }

  private handleTransportMessage(transport: StreamTransport, data: string): void {
    if (transport !== this.transport) return;
    if (this.pump) {
      this.pump.handleFrame(data);
      return;
    }
    if (this.earlyFrames.length < this.config.bufferSize) {
      this.earlyFrames.push(data);
    }
  }

  /**
   * Single entry point for every way a connection can die: handshake
   * rejection, close, socket error, heartbeat failure, refused send.
   * Events from a transport that is no longer current are ignored.
   */
  private handleTransportFailure(transport: StreamTransport, error: Error): void {
    if (transport !== this.transport || this.closed) return;

    const wasConnected = this._state === 'connected';
    this.retirePump();
    this.dropTransport();
    this._lastError = error;
    this.onError?.(error);

    if (wasConnected) {
      this.log.warn('Connection lost', { epoch: this._epoch, error: error.message });
      if (this.config.reconnect) {
        this.scheduleReconnect(error);
      } else {
        this.terminate('disconnected', new ConnectionError('Connection lost', { cause: error }));
      }
      return;
    }

    this.log.error('Connection attempt failed', { url: this.url, error: error.message });
    if (this.config.reconnect) {
      this.scheduleReconnect(error);
    } else {
      this.terminate('failed', error);
    }
  }

  private scheduleReconnect(cause: Error): void {
    this.setState('reconnecting');

    const max = this.config.maxReconnectAttempts;
    if (max !== undefined && this.backoff.attempts >= max) {
      this.log.error(`Max reconnect attempts reached (${max}), giving up`);
      this.terminate('failed', new ReconnectExhaustedError(this.backoff.attempts, cause));
      return;
    }

    const delay = this.backoff.next();
    this.log.info(`Reconnecting in ${Math.round(delay)}ms`, { attempt: this.backoff.attempts });
    this.reconnectTimer = setTimeout(() => {
      this.attemptConnect().catch((err: unknown) => {
        this.log.error('Reconnect attempt crashed', { error: toError(err).message });
      });
    }, delay);
  }

  private terminate(state: 'failed' | 'disconnected', error: Error): void {
    this.closed = true;
    this.terminalError = error;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
    this.setState(state);
    // Messages already received stay readable; the error follows the last one.
    this.queue.close('drain');
    this.settleConnectWaiter(error);
  }

  private retirePump(): void {
    const pump = this.pump;
    if (!pump) return;
    pump.stop();
    this.retired = {
      received: this.retired.received + pump.counters.received,
      malformed: this.retired.malformed + pump.counters.malformed,
      serverErrors: this.retired.serverErrors + pump.counters.serverErrors,
      heartbeatsSent: this.retired.heartbeatsSent + pump.counters.heartbeatsSent,
    };
    this.pump = undefined;
  }

  private dropTransport(): void {
    const transport = this.transport;
    this.transport = undefined;
    this.earlyFrames = [];
    if (transport) {
      transport.setEvents({});
      transport.close();
    }
  }

  private settleConnectWaiter(error: Error): void {
    const waiters = this.connectWaiters;
    this.connectWaiters = [];
    for (const waiter of waiters) waiter.reject(error);
  }

  private setState(state: StreamState): void {
    const previous = this._state;
    if (previous === state) return;
    this._state = state;
    this.onStateChange?.(state, previous);
  }

  private assertUsable(operation: string): void {
    if (this.closed) {
      throw new ClientClosedError(operation);
    }
    if (!this.started) {
      throw new NotConnectedError(operation, this._state);
    }
  }

  private throwTerminalError(): void {
    if (this.terminalError && !this.terminalErrorReported) {
      this.terminalErrorReported = true;
      throw this.terminalError;
    }
  }
}

/**
 * Create a client and start connecting.
 */
export async function connectStream(options: StreamClientOptions): Promise<StreamClient> {
  const client = new StreamClient(options);
  await client.connect();
  return client;
}
