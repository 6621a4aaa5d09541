/**
 * TCP socket transport for Node.js environments.
 */

import net from 'node:net';
import tls from 'node:tls';
import { ConnectionError } from '@wisp/utils';
import type { Transport, TransportEndpoint, TransportEvents, TransportState } from './types.js';

const CLOSE_GRACE_MS = 1000;

/**
 * Socket-based transport for plain TCP connections that can be upgraded to
 * TLS after the broker's INFO.
 * This is the default transport.
 */
export class SocketTransport implements Transport {
  private socket?: net.Socket;
  private readonly endpoint: TransportEndpoint;
  private events: TransportEvents = {};
  private _state: TransportState = 'disconnected';
  private _secure = false;

  constructor(endpoint: TransportEndpoint) {
    this.endpoint = {
      connectTimeoutMs: 5000,
      ...endpoint,
    };
  }

  get state(): TransportState {
    return this._state;
  }

  get secure(): boolean {
    return this._secure;
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
          this.socket?.destroy();
          this._state = 'disconnected';
          reject(new ConnectionError(`Connection timeout after ${this.endpoint.connectTimeoutMs}ms`));
        }
      }, this.endpoint.connectTimeoutMs);

      const socket = net.createConnection({ host: this.endpoint.host, port: this.endpoint.port });
      this.socket = socket;

      socket.once('connect', () => {
        clearTimeout(timeout);
        socket.setNoDelay(true);
        this._state = 'connected';
        resolve();
      });

      this.bindSocket(socket, (err) => {
        clearTimeout(timeout);
        if (this._state === 'connecting') {
          this._state = 'disconnected';
          reject(err);
          return true;
        }
        return false;
      });
    });
  }

  upgradeToTls(options: tls.ConnectionOptions = {}): Promise<void> {
    const raw = this.socket;
    if (!raw || this._state !== 'connected') {
      return Promise.reject(new ConnectionError('Cannot upgrade a transport that is not connected'));
    }

    return new Promise((resolve, reject) => {
      // Encrypted bytes must not reach the parser; the TLS socket takes over.
      raw.removeAllListeners('data');
      raw.removeAllListeners('close');
      raw.removeAllListeners('error');

      let handshaking = true;
      const secureSocket = tls.connect({
        servername: net.isIP(this.endpoint.host) ? undefined : this.endpoint.host,
        ...options,
        socket: raw,
      });
      this.socket = secureSocket;

      secureSocket.once('secureConnect', () => {
        handshaking = false;
        this._secure = true;
        resolve();
      });

      this.bindSocket(secureSocket, (err) => {
        if (handshaking) {
          handshaking = false;
          reject(err);
          return true;
        }
        return false;
      });

      secureSocket.once('close', () => {
        if (handshaking) {
          handshaking = false;
          reject(new ConnectionError('Connection closed during TLS handshake'));
        }
      });
    });
  }

  disconnect(): Promise<void> {
    const socket = this.socket;
    if (!socket || this._state === 'disconnected') {
      return Promise.resolve();
    }

    this._state = 'closing';
    this.socket = undefined;

    return new Promise((resolve) => {
      const force = setTimeout(() => socket.destroy(), CLOSE_GRACE_MS);
      socket.once('close', () => {
        clearTimeout(force);
        this._state = 'disconnected';
        resolve();
      });
      socket.end();
    });
  }

  send(data: Uint8Array): boolean {
    if (!this.socket || this._state !== 'connected') {
      return false;
    }

    try {
      this.socket.write(data);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Wire data/close/error handlers. `onPendingError` gets first refusal on
   * errors so a pending connect or upgrade can reject instead of reporting.
   */
  private bindSocket(socket: net.Socket, onPendingError: (err: Error) => boolean): void {
    socket.on('data', (data: Buffer) => {
      this.events.onData?.(new Uint8Array(data.buffer, data.byteOffset, data.byteLength));
    });

    socket.on('close', () => {
      if (this.socket !== socket) return;
      const wasConnected = this._state === 'connected';
      this._state = 'disconnected';
      this._secure = false;
      if (wasConnected) this.events.onClose?.();
    });

    socket.on('error', (err: Error) => {
      if (onPendingError(err)) return;
      this.events.onError?.(err);
    });
  }
}
