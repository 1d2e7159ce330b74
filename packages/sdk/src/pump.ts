/**
 * Message pump for one connected period.
 *
 * Inbound frames are decoded, control notices consumed, and data messages run
 * through the sequencer before being queued for the consumer. A heartbeat
 * timer runs alongside. `stop()` cancels both; the client builds a fresh pump
 * for every connection.
 */

import { ConnectionError, TimeoutError, createLogger, type Logger } from '@ciris-stream/utils';
import type { DeliveryQueue } from './delivery-queue.js';
import { decodeFrame, encodePing, toStreamMessage, type StreamMessage } from './protocol.js';
import type { Sequencer } from './sequencer.js';

export interface SequenceGap {
  epoch: number;
  expected: number;
  received: number;
  channel: string;
}

export interface MessagePumpOptions {
  epoch: number;
  sequencer: Sequencer;
  queue: DeliveryQueue<StreamMessage>;
  /** Send a text frame on the current connection */
  send: (frame: string) => boolean;
  heartbeatIntervalMs: number;
  /** Silence after which the connection counts as dead; 0 disables */
  heartbeatTimeoutMs?: number;
  /** Called at most once, when the connection must be abandoned */
  onFailure: (error: Error) => void;
  onGap?: (gap: SequenceGap) => void;
  onServerError?: (message: string) => void;
  logger?: Logger;
}

export interface PumpCounters {
  received: number;
  malformed: number;
  serverErrors: number;
  heartbeatsSent: number;
}

export class MessagePump {
  private readonly options: MessagePumpOptions;
  private readonly log: Logger;
  private heartbeatTimer?: ReturnType<typeof setInterval>;
  private lastInboundAt = 0;
  private _running = false;
  private failed = false;

  readonly counters: PumpCounters = {
    received: 0,
    malformed: 0,
    serverErrors: 0,
    heartbeatsSent: 0,
  };

  constructor(options: MessagePumpOptions) {
    this.options = options;
    this.log = options.logger ?? createLogger('pump');
  }

  get running(): boolean {
    return this._running;
  }

  start(): void {
    if (this._running || this.failed) return;
    this._running = true;
    this.lastInboundAt = Date.now();
    this.heartbeatTimer = setInterval(() => this.beat(), this.options.heartbeatIntervalMs);
    this.log.debug('Pump started', { epoch: this.options.epoch, heartbeatMs: this.options.heartbeatIntervalMs });
  }

  stop(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = undefined;
    }
    if (this._running) {
      this._running = false;
      this.log.debug('Pump stopped', { epoch: this.options.epoch });
    }
  }

  /**
   * Process one raw inbound frame. Malformed frames are logged and skipped;
   * they never end the connection.
   */
  handleFrame(raw: string): void {
    if (!this._running) return;
    this.lastInboundAt = Date.now();

    const decoded = decodeFrame(raw);
    if (!decoded.ok) {
      this.counters.malformed++;
      this.log.warn('Skipping malformed frame', { reason: decoded.reason, preview: raw.slice(0, 120) });
      return;
    }

    const frame = decoded.frame;
    switch (frame.kind) {
      case 'pong':
        return;

      case 'error':
        this.counters.serverErrors++;
        this.log.error('Server error', { message: frame.message });
        this.options.onServerError?.(frame.message);
        return;

      case 'data': {
        const observation = this.options.sequencer.observe(frame.sequence);
        if (observation.status === 'gap') {
          const gap: SequenceGap = {
            epoch: this.options.epoch,
            expected: observation.expected,
            received: observation.received,
            channel: frame.channel,
          };
          this.log.warn('Message gap detected', { ...gap });
          this.options.onGap?.(gap);
        }
        this.options.queue.push(toStreamMessage(frame, this.options.epoch));
        this.counters.received++;
        return;
      }
    }
  }

  private beat(): void {
    if (!this._running) return;

    const timeoutMs = this.options.heartbeatTimeoutMs ?? 0;
    if (timeoutMs > 0 && Date.now() - this.lastInboundAt >= timeoutMs) {
      this.fail(new TimeoutError(`No frames received for ${timeoutMs}ms`, timeoutMs));
      return;
    }

    if (this.options.send(encodePing())) {
      this.counters.heartbeatsSent++;
      return;
    }
    this.fail(new ConnectionError('Heartbeat send failed'));
  }

  private fail(error: Error): void {
    if (this.failed) return;
    this.failed = true;
    this.log.warn('Connection considered dead', { epoch: this.options.epoch, error: error.message });
    this.stop();
    this.options.onFailure(error);
  }
}
