/**
 * Transport abstraction for broker communication.
 *
 * Defines the interface for different transport implementations:
 * - SocketTransport: TCP sockets with in-place TLS upgrade (Node.js)
 * - WebSocketTransport: WebSocket connections via the `ws` package
 *
 * A transport is a byte pipe. Framing, handshakes and reconnects belong to
 * the connection session, which owns exactly one transport at a time and
 * replaces it wholesale on reconnect.
 */

import type { ConnectionOptions as TlsConnectionOptions } from 'node:tls';

/**
 * Transport connection state.
 */
export type TransportState = 'disconnected' | 'connecting' | 'connected' | 'closing';

/**
 * Transport event handlers.
 */
export interface TransportEvents {
  /** Called when transport receives data */
  onData?: (data: Uint8Array) => void;
  /** Called when transport disconnects */
  onClose?: () => void;
  /** Called when transport encounters an error */
  onError?: (error: Error) => void;
}

/**
 * Where to connect. Built by the session from its settings.
 */
export interface TransportEndpoint {
  host: string;
  port: number;
  /** `ws://` or `wss://` URL; selects the WebSocket transport */
  url?: string;
  /** Connection timeout in milliseconds */
  connectTimeoutMs?: number;
}

export interface Transport {
  /** Current connection state */
  readonly state: TransportState;

  /** True once traffic is encrypted (after `upgradeToTls`, or a wss:// URL). */
  readonly secure: boolean;

  /**
   * Open the connection.
   * @throws Error if connection fails
   */
  connect(): Promise<void>;

  /**
   * Upgrade the open connection to TLS in place. Inbound data keeps flowing
   * to the same `onData` handler, decrypted.
   */
  upgradeToTls(options?: TlsConnectionOptions): Promise<void>;

  /**
   * Send bytes to the broker.
   * @returns true if data was queued for sending
   */
  send(data: Uint8Array): boolean;

  /**
   * Close the connection. Resolves once the underlying socket has closed.
   */
  disconnect(): Promise<void>;

  setEvents(events: TransportEvents): void;
}

export type TransportFactory = (endpoint: TransportEndpoint) => Transport;
