/**
 * WebSocket transport for brokers that expose a WebSocket listener.
 *
 * The protocol bytes are the same as over TCP; each WebSocket message is
 * treated as a chunk of the byte stream. Encryption comes from a `wss://`
 * URL, so an in-place TLS upgrade is not available here.
 */

import WebSocket from 'ws';
import type { ConnectionOptions as TlsConnectionOptions } from 'node:tls';
import { ConnectionError } from '@wisp/utils';
import type { Transport, TransportEndpoint, TransportEvents, TransportState } from './types.js';

export interface WebSocketTransportConfig {
  /** WebSocket URL (e.g., ws://localhost:8080) */
  url: string;
  /** Connection timeout in milliseconds */
  connectTimeoutMs?: number;
  /** Protocols to use in WebSocket handshake */
  protocols?: string | string[];
}

function toBytes(data: WebSocket.RawData): Uint8Array {
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  return data;
}

export class WebSocketTransport implements Transport {
  private ws?: WebSocket;
  private readonly config: WebSocketTransportConfig;
  private events: TransportEvents = {};
  private _state: TransportState = 'disconnected';

  constructor(config: WebSocketTransportConfig) {
    this.config = {
      connectTimeoutMs: 5000,
      ...config,
    };
  }

  get state(): TransportState {
    return this._state;
  }

  get secure(): boolean {
    return this.config.url.startsWith('wss:');
  }

  setEvents(events: TransportEvents): void {
    this.events = events;
  }

  connect(): Promise<void> {
    if (this._state !== 'disconnected') {
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      this._state = 'connecting';

      const timeout = setTimeout(() => {
        if (this._state === 'connecting') {
          this.ws?.terminate();
          this._state = 'disconnected';
          reject(new ConnectionError(`Connection timeout after ${this.config.connectTimeoutMs}ms`));
        }
      }, this.config.connectTimeoutMs);

      const ws = new WebSocket(this.config.url, this.config.protocols);
      ws.binaryType = 'nodebuffer';
      this.ws = ws;

      ws.on('open', () => {
        clearTimeout(timeout);
        this._state = 'connected';
        resolve();
      });

      ws.on('message', (data: WebSocket.RawData) => {
        this.events.onData?.(toBytes(data));
      });

      ws.on('close', () => {
        clearTimeout(timeout);
        if (this.ws !== ws) return;
        const wasConnected = this._state === 'connected';
        this._state = 'disconnected';
        if (wasConnected) this.events.onClose?.();
      });

      ws.on('error', (err: Error) => {
        clearTimeout(timeout);
        if (this._state === 'connecting') {
          this._state = 'disconnected';
          reject(err);
          return;
        }
        this.events.onError?.(err);
      });
    });
  }

  upgradeToTls(_options?: TlsConnectionOptions): Promise<void> {
    if (this.secure) {
      return Promise.resolve();
    }
    return Promise.reject(
      new ConnectionError('TLS upgrade is not available over WebSocket; use a wss:// URL'),
    );
  }

  disconnect(): Promise<void> {
    const ws = this.ws;
    if (!ws || this._state === 'disconnected') {
      return Promise.resolve();
    }

    this._state = 'closing';
    this.ws = undefined;

    return new Promise((resolve) => {
      ws.once('close', () => {
        this._state = 'disconnected';
        resolve();
      });
      ws.close();
    });
  }

  send(data: Uint8Array): boolean {
    if (!this.ws || this._state !== 'connected') {
      return false;
    }

    try {
      this.ws.send(data);
      return true;
    } catch {
      return false;
    }
  }
}

export function isWebSocketUrl(url: string): boolean {
  return /^wss?:\/\//i.test(url);
}

/** Build a WebSocket transport from a session endpoint that carries a ws(s) URL. */
export function webSocketTransportFor(endpoint: TransportEndpoint): WebSocketTransport {
  if (!endpoint.url || !isWebSocketUrl(endpoint.url)) {
    throw new ConnectionError(`Not a WebSocket URL: ${endpoint.url ?? '(none)'}`);
  }
  return new WebSocketTransport({ url: endpoint.url, connectTimeoutMs: endpoint.connectTimeoutMs });
}
