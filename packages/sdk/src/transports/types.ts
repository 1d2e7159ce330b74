/**
 * Transport abstraction for the stream client.
 *
 * The client owns reconnection; a transport instance covers exactly one
 * physical connection and is discarded after it closes. Tests inject an
 * in-process implementation through {@link TransportFactory}.
 */

/**
 * Transport connection state.
 */
export type TransportState = 'idle' | 'connecting' | 'open' | 'closing' | 'closed';

/**
 * Transport event handlers.
 */
export interface TransportEvents {
  /** Called for every inbound frame, decoded as UTF-8 text */
  onMessage?: (data: string) => void;
  /** Called once when an open connection closes, for any reason */
  onClose?: (code: number, reason: string) => void;
  /** Called when the transport encounters an error after opening */
  onError?: (error: Error) => void;
}

/**
 * Options every transport receives from the client.
 */
export interface TransportOptions {
  /** Streaming endpoint (ws:// or wss://) */
  url: string;
  /** Bearer credential sent in the opening handshake */
  token?: string;
  /** Connection timeout in milliseconds */
  connectTimeoutMs: number;
}

/**
 * One physical connection to the stream endpoint.
 *
 * Implementations must:
 * - resolve `connect()` once the handshake (including auth) succeeded
 * - reject `connect()` with `AuthenticationError` when the credential is refused
 * - report a close of an open connection through `onClose` exactly once
 */
export interface StreamTransport {
  /** Current connection state */
  readonly state: TransportState;

  /**
   * Open the connection.
   * @throws AuthenticationError, TimeoutError or ConnectionError
   */
  connect(): Promise<void>;

  /**
   * Send a text frame.
   * @returns true if the frame was handed to the socket
   */
  send(data: string): boolean;

  /**
   * Close the connection. Safe to call in any state.
   */
  close(code?: number, reason?: string): void;

  /**
   * Set event handlers.
   */
  setEvents(events: TransportEvents): void;
}

/**
 * Transport factory function type.
 */
export type TransportFactory = (options: TransportOptions) => StreamTransport;
