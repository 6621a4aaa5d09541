/**
 * Transport module for broker communication.
 *
 * Provides transport abstraction and implementations:
 * - SocketTransport: TCP with optional in-place TLS upgrade
 * - WebSocketTransport: ws:// and wss:// endpoints
 */

export type {
  Transport,
  TransportEndpoint,
  TransportEvents,
  TransportState,
  TransportFactory,
} from './types.js';

export { SocketTransport } from './socket-transport.js';

export {
  WebSocketTransport,
  isWebSocketUrl,
  type WebSocketTransportConfig,
} from './websocket-transport.js';

import type { Transport, TransportEndpoint } from './types.js';
import { SocketTransport } from './socket-transport.js';
import { isWebSocketUrl, webSocketTransportFor } from './websocket-transport.js';

/**
 * Pick a transport for an endpoint: a `ws://`/`wss://` URL selects the
 * WebSocket transport, anything else uses TCP to host:port.
 *
 * @example
 * ```typescript
 * const tcp = createTransport({ host: 'localhost', port: 4222 });
 * const ws = createTransport({ host: '', port: 0, url: 'wss://broker.example.com:8443' });
 * ```
 */
export function createTransport(endpoint: TransportEndpoint): Transport {
  if (endpoint.url && isWebSocketUrl(endpoint.url)) {
    return webSocketTransportFor(endpoint);
  }
  return new SocketTransport(endpoint);
}
