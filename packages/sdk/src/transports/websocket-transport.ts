/**
 * WebSocket transport on the `ws` package.
 *
 * The bearer credential travels in the `Authorization` header of the upgrade
 * request; a 401/403 upgrade response surfaces as `AuthenticationError`.
 */

import WebSocket from 'ws';
import { AuthenticationError, ConnectionError, TimeoutError, toError } from '@ciris-stream/utils';
import type { StreamTransport, TransportEvents, TransportOptions, TransportState } from './types.js';

/** Normal closure */
export const CLOSE_NORMAL = 1000;

const UNEXPECTED_RESPONSE = /Unexpected server response: (\d+)/;

function toText(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

/**
 * Map a handshake error to the client's error taxonomy.
 */
export function classifyHandshakeError(err: Error): Error {
  const match = UNEXPECTED_RESPONSE.exec(err.message);
  if (match) {
    const status = Number(match[1]);
    if (status === 401 || status === 403) {
      return new AuthenticationError(`Stream authentication rejected (HTTP ${status})`, status);
    }
    return new ConnectionError(`Stream handshake failed (HTTP ${status})`, { cause: err });
  }
  return new ConnectionError(`Stream connection failed: ${err.message}`, { cause: err });
}

export class WebSocketTransport implements StreamTransport {
  private ws?: WebSocket;
  private readonly options: TransportOptions;
  private events: TransportEvents = {};
  private _state: TransportState = 'idle';
  private rejectConnect?: (err: Error) => void;
  private connectTimer?: ReturnType<typeof setTimeout>;

  constructor(options: TransportOptions) {
    this.options = options;
  }

  get state(): TransportState {
    return this._state;
  }

  setEvents(events: TransportEvents): void {
    this.events = events;
  }

  connect(): Promise<void> {
    if (this._state !== 'idle') {
      return Promise.reject(new ConnectionError(`Transport already used (state: ${this._state})`));
    }
    this._state = 'connecting';

    return new Promise<void>((resolve, reject) => {
      this.rejectConnect = reject;
      const headers: Record<string, string> = {};
      if (this.options.token) {
        headers.Authorization = `Bearer ${this.options.token}`;
      }

      let ws: WebSocket;
      try {
        ws = new WebSocket(this.options.url, { headers });
      } catch (err) {
        this._state = 'closed';
        reject(new ConnectionError(`Invalid stream URL: ${this.options.url}`, { cause: err }));
        return;
      }
      this.ws = ws;

      this.connectTimer = setTimeout(() => {
        if (this._state === 'connecting') {
          this._state = 'closed';
          ws.terminate();
          reject(new TimeoutError('Stream connection timed out', this.options.connectTimeoutMs));
        }
      }, this.options.connectTimeoutMs);

      ws.on('open', () => {
        this.clearConnectTimer();
        if (this._state !== 'connecting') return;
        this._state = 'open';
        this.rejectConnect = undefined;
        resolve();
      });

      // Binary frames go through the same decoder as text; anything that is
      // not a JSON frame is skipped there as malformed.
      ws.on('message', (data: WebSocket.RawData) => {
        if (this._state !== 'open') return;
        this.events.onMessage?.(toText(data));
      });

      ws.on('error', (err: Error) => {
        this.clearConnectTimer();
        if (this._state === 'connecting') {
          this._state = 'closed';
          reject(classifyHandshakeError(err));
          return;
        }
        this.events.onError?.(toError(err));
      });

      ws.on('close', (code: number, reason: Buffer) => {
        this.clearConnectTimer();
        const wasOpen = this._state === 'open' || this._state === 'closing';
        if (this._state === 'connecting') {
          reject(new ConnectionError('Stream closed during handshake', { closeCode: code }));
        }
        this._state = 'closed';
        this.ws = undefined;
        if (wasOpen) {
          this.events.onClose?.(code, reason.toString('utf8'));
        }
      });
    });
  }

  send(data: string): boolean {
    if (!this.ws || this._state !== 'open' || this.ws.readyState !== WebSocket.OPEN) {
      return false;
    }
    try {
      this.ws.send(data);
      return true;
    } catch {
      return false;
    }
  }

  close(code = CLOSE_NORMAL, reason = ''): void {
    const ws = this.ws;
    if (!ws) {
      this._state = 'closed';
      return;
    }
    if (this._state === 'connecting') {
      this._state = 'closed';
      this.clearConnectTimer();
      this.rejectConnect?.(new ConnectionError('Stream closed before the handshake completed'));
      this.rejectConnect = undefined;
      ws.terminate();
      return;
    }
    if (this._state === 'open') {
      this._state = 'closing';
      ws.close(code, reason);
    }
  }

  private clearConnectTimer(): void {
    if (this.connectTimer) {
      clearTimeout(this.connectTimer);
      this.connectTimer = undefined;
    }
  }
}
