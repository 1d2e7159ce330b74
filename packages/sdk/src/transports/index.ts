/**
 * Transport module for the stream client.
 *
 * - WebSocketTransport: `ws`-based connection to the streaming endpoint
 * - toStreamUrl: derives the endpoint from the API base address
 */

export type {
  StreamTransport,
  TransportEvents,
  TransportFactory,
  TransportOptions,
  TransportState,
} from './types.js';

export {
  WebSocketTransport,
  classifyHandshakeError,
  CLOSE_NORMAL,
} from './websocket-transport.js';

import { ValidationError } from '@ciris-stream/utils';
import type { TransportFactory } from './types.js';
import { WebSocketTransport } from './websocket-transport.js';

/** Path of the streaming endpoint under the API base address. */
export const STREAM_PATH = '/v1/stream';

/**
 * Convert an API base address to its streaming endpoint.
 *
 * @example
 * toStreamUrl('https://agent.example.com')      // 'wss://agent.example.com/v1/stream'
 * toStreamUrl('http://localhost:8080/')          // 'ws://localhost:8080/v1/stream'
 */
export function toStreamUrl(baseUrl: string): string {
  const url = new URL(baseUrl);
  switch (url.protocol) {
    case 'http:':
      url.protocol = 'ws:';
      break;
    case 'https:':
      url.protocol = 'wss:';
      break;
    case 'ws:':
    case 'wss:':
      break;
    default:
      throw new ValidationError(`Unsupported protocol for stream URL: ${url.protocol}`);
  }

  const path = url.pathname.replace(/\/+$/, '');
  if (!path.endsWith(STREAM_PATH)) {
    url.pathname = `${path}${STREAM_PATH}`;
  }
  return url.toString();
}

/** Default factory: a fresh `ws` connection per attempt. */
export const defaultTransportFactory: TransportFactory = (options) => new WebSocketTransport(options);
