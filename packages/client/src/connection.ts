/**
 * Connection session.
 * Owns one transport at a time and drives the broker handshake, keepalive
 * and reconnect. Subscriptions and requests ride on top.
 *
 * Handshake: connecting -> awaiting_info -> [tls_upgrading] -> authenticating -> ready
 */

import {
  type Command,
  type ConnectOptions,
  type Frame,
  type Payload,
  type ServerInfo,
  PROTOCOL_VERSION,
  ProtocolParser,
  encodeCommand,
  payloadBytes,
} from '@wisp/protocol';
import {
  AuthorizationError,
  ConnectionClosedError,
  ConnectionError,
  ConnectionTimeoutError,
  InvalidRequestSubjectError,
  type Logger,
  NotConnectedError,
  PayloadTooLargeError,
  ProtocolError,
  TimeoutError,
  UnknownSubscriptionError,
  UsageError,
  createLogger,
  toError,
} from '@wisp/utils';
import { Dispatcher } from './dispatcher.js';
import { InboxFactory } from './inbox.js';
import { type DeliveryTarget, type Message, MessageQueue, toTarget } from './message.js';
import { RequestCorrelator } from './request.js';
import { type ConnectionSettings, type ResolvedSettings, resolveSettings } from './settings.js';
import { SubscriptionRegistry } from './subscriptions.js';
import { createTransport } from './transports/index.js';
import type { Transport } from './transports/types.js';

export const CLIENT_LANG = 'typescript';
export const CLIENT_VERSION = '0.1.0';

export type ConnectionState =
  | 'disconnected'
  | 'connecting'
  | 'awaiting_info'
  | 'tls_upgrading'
  | 'authenticating'
  | 'ready'
  | 'reconnecting'
  | 'draining';

type HandshakePhase = 'connecting' | 'awaiting_info' | 'tls_upgrading' | 'authenticating';

export type StateListener = (state: ConnectionState, previous: ConnectionState) => void;
export type ErrorListener = (error: Error) => void;

export interface SubscribeOptions {
  queueGroup?: string;
  /** Subject must come from `newInbox()` on this connection */
  asRequest?: boolean;
}

export interface UnsubscribeOptions {
  /** Deliver exactly this many more messages, then remove */
  maxMessages?: number;
}

export interface PublishOptions {
  replyTo?: string;
}

export interface RequestOptions {
  timeoutMs?: number;
}

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

function defer<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  // Waiters may be abandoned when a handshake fails; that is not an unhandled rejection.
  promise.catch(() => undefined);
  return { promise, resolve, reject };
}

function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(toError(err));
      },
    );
  });
}

interface PendingPong {
  settled: boolean;
  timer?: ReturnType<typeof setTimeout>;
  settle: (error?: Error) => void;
}

export class Connection {
  private readonly settings: ResolvedSettings;
  private readonly logger: Logger;
  private readonly parser: ProtocolParser;
  private readonly registry = new SubscriptionRegistry();
  private readonly dispatcher: Dispatcher;
  private readonly inboxes = new InboxFactory();
  private readonly requests: RequestCorrelator;

  private transport?: Transport;
  private _state: ConnectionState = 'disconnected';
  private _serverInfo?: ServerInfo;
  private closed = false;
  private starting?: Promise<void>;
  private reconnecting?: Promise<void>;

  // Handshake bookkeeping; all undefined outside establish()
  private handshakePhase?: HandshakePhase;
  private handshakeAbort?: (error: Error) => void;
  private infoWaiter?: Deferred<ServerInfo>;
  private pongWaiter?: Deferred<void>;

  private pendingPongs: PendingPong[] = [];
  private pingTimer?: ReturnType<typeof setInterval>;
  private cancelWait?: () => void;

  private stateListeners = new Set<StateListener>();
  private errorListeners = new Set<ErrorListener>();

  constructor(settings: ConnectionSettings = {}) {
    this.settings = resolveSettings(settings);
    this.logger = createLogger('connection', { level: this.settings.logLevel });
    this.parser = new ProtocolParser({ maxPayload: this.settings.maxPayload });
    this.dispatcher = new Dispatcher(this.registry, this.logger.child('dispatch'));
    this.requests = new RequestCorrelator(
      {
        newInbox: () => this.newInbox(),
        subscribe: (subject, target, options) => this.subscribe(subject, target, options),
        unsubscribe: (sid, options) => this.unsubscribe(sid, options),
        publish: (subject, payload, options) => this.publish(subject, payload, options),
        isSubscribed: (sid) => this.registry.has(sid),
      },
      this.settings.requestTimeoutMs,
    );
  }

  /** Construct a connection and wait until it is ready. */
  static async connect(settings?: ConnectionSettings): Promise<Connection> {
    const connection = new Connection(settings);
    await connection.start();
    return connection;
  }

  get state(): ConnectionState {
    return this._state;
  }

  /** INFO from the most recent handshake */
  get serverInfo(): ServerInfo | undefined {
    return this._serverInfo;
  }

  get subscriptionCount(): number {
    return this.registry.size;
  }

  get pendingRequests(): number {
    return this.requests.pendingCount;
  }

  isSubscribed(sid: number): boolean {
    return this.registry.has(sid);
  }

  onStateChange(listener: StateListener): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  /** Broker `-ERR`, parse errors, handler failures and lost connections. */
  onError(listener: ErrorListener): () => void {
    this.errorListeners.add(listener);
    return () => {
      this.errorListeners.delete(listener);
    };
  }

  /**
   * Connect and complete the handshake. Startup is never retried: a failure
   * rejects and leaves the connection disconnected. After reconnect attempts
   * are exhausted, calling start() again reconnects with subscriptions intact.
   */
  start(): Promise<void> {
    if (this.closed) return Promise.reject(new ConnectionClosedError());
    if (this._state === 'ready') return Promise.resolve();
    if (this.starting) return this.starting;
    if (this.reconnecting) {
      return this.reconnecting.then(() => {
        if (this._state !== 'ready') throw new NotConnectedError(this._state);
      });
    }

    this.starting = this.open().finally(() => {
      this.starting = undefined;
    });
    return this.starting;
  }

  /**
   * Close the connection. Pending pings and requests reject with
   * ConnectionClosedError and every later operation throws it.
   */
  async stop(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.logger.info('Stopping', { state: this._state, subscriptions: this.registry.size });
    this.setState('draining');

    this.stopKeepalive();
    this.cancelWait?.();

    const closedError = new ConnectionClosedError();
    this.handshakeAbort?.(closedError);
    this.rejectPongs(closedError);

    for (const entry of this.registry.live()) {
      if (entry.target instanceof MessageQueue) entry.target.close();
    }
    this.registry.clear();
    this.requests.rejectAll(closedError);

    const transport = this.transport;
    this.transport = undefined;
    if (transport) {
      transport.setEvents({});
      try {
        await transport.disconnect();
      } catch (err) {
        this.logger.warn('Transport close failed', { error: toError(err).message });
      }
    }

    this.setState('disconnected');
    this.logger.info('Stopped');
  }

  newInbox(): string {
    this.assertOpen();
    return this.inboxes.next();
  }

  /**
   * Register a subscription and send SUB.
   * @returns the subscription id
   * @throws InvalidRequestSubjectError when `asRequest` is set for a subject not from newInbox()
   * @throws NotConnectedError unless ready
   */
  subscribe(subject: string, target: DeliveryTarget, options: SubscribeOptions = {}): number {
    this.assertOpen();
    if (!subject) throw new UsageError('Subject must not be empty');
    const { queueGroup, asRequest = false } = options;
    if (queueGroup !== undefined && !queueGroup) {
      throw new UsageError('Queue group must not be empty');
    }
    if (asRequest && !this.inboxes.isIssued(subject)) {
      throw new InvalidRequestSubjectError(subject);
    }
    this.assertReady();

    const entry = this.registry.add({
      subject,
      queueGroup,
      isRequest: asRequest,
      target: toTarget(target, (error, message) => {
        this.logger.error('Subscription handler threw', {
          subject: message.subject,
          sid: message.sid,
          error: error.message,
        });
        this.emitError(error);
      }),
    });

    try {
      this.writeOrThrow({ op: 'SUB', subject, queueGroup, sid: entry.sid });
    } catch (err) {
      this.registry.remove(entry.sid);
      throw err;
    }

    this.logger.debug('Subscribed', { subject, queueGroup, sid: entry.sid });
    return entry.sid;
  }

  /**
   * Remove a subscription now, or after `maxMessages` more deliveries.
   * While not ready only local state changes; reconnect re-issues budgets.
   */
  unsubscribe(sid: number, options: UnsubscribeOptions = {}): void {
    this.assertOpen();
    const entry = this.registry.get(sid);
    if (!entry) throw new UnknownSubscriptionError(sid);

    const { maxMessages } = options;
    if (maxMessages === undefined) {
      this.registry.remove(sid);
      this.registry.release(entry.target);
      if (this._state === 'ready') this.send({ op: 'UNSUB', sid });
      this.logger.debug('Unsubscribed', { sid, subject: entry.subject });
      return;
    }

    if (!Number.isInteger(maxMessages) || maxMessages < 1) {
      throw new UsageError(`maxMessages must be a positive integer, got ${maxMessages}`);
    }
    this.registry.setBudget(sid, maxMessages);
    // The broker counts from the original SUB, not from now.
    if (this._state === 'ready') {
      this.send({ op: 'UNSUB', sid, maxMessages: entry.delivered + maxMessages });
    }
  }

  /**
   * @throws NotConnectedError unless ready
   * @throws PayloadTooLargeError above the broker's max_payload
   */
  publish(subject: string, payload: Payload, options: PublishOptions = {}): void {
    this.assertReady();
    if (!subject) throw new UsageError('Subject must not be empty');

    const size = payloadBytes(payload).length;
    const maxPayload = this._serverInfo?.max_payload ?? this.settings.maxPayload;
    if (size > maxPayload) throw new PayloadTooLargeError(size, maxPayload);

    this.writeOrThrow({ op: 'PUB', subject, replyTo: options.replyTo, payload });
  }

  /** Publish with a fresh inbox as reply-to and resolve with the first reply. */
  async request(subject: string, payload: Payload, options: RequestOptions = {}): Promise<Message> {
    this.assertOpen();
    return this.requests.request(subject, payload, options.timeoutMs);
  }

  /** Round-trip a PING. Rejects with TimeoutError if no PONG within `timeoutMs`. */
  ping(timeoutMs = this.settings.pingTimeoutMs): Promise<void> {
    try {
      this.assertReady();
    } catch (err) {
      return Promise.reject(toError(err));
    }

    return new Promise<void>((resolve, reject) => {
      const entry: PendingPong = {
        settled: false,
        settle: (error) => {
          if (entry.settled) return;
          entry.settled = true;
          clearTimeout(entry.timer);
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        },
      };
      entry.timer = setTimeout(() => {
        entry.settle(new TimeoutError(`No PONG within ${timeoutMs}ms`, timeoutMs));
      }, timeoutMs);
      this.pendingPongs.push(entry);

      try {
        this.writeOrThrow({ op: 'PING' });
      } catch (err) {
        entry.settle(toError(err));
      }
    });
  }

  // --- lifecycle -----------------------------------------------------------

  private async open(): Promise<void> {
    this.logger.info('Connecting', {
      host: this.settings.host,
      port: this.settings.port,
      url: this.settings.url,
    });

    try {
      await this.establish(false);
      if (this.closed) throw new ConnectionClosedError();
      if (!this.resubscribe()) {
        this.dropTransport();
        throw new ConnectionError('Connection lost while restoring subscriptions');
      }
    } catch (err) {
      if (!this.closed) this.setState('disconnected');
      this.logger.error('Connect failed', { error: toError(err).message });
      throw err;
    }

    this.enterReady();
  }

  /**
   * Open a fresh transport and run the handshake under one deadline.
   * `quiet` keeps the public state at `reconnecting` throughout.
   */
  private async establish(quiet: boolean): Promise<void> {
    const transport = (this.settings.transportFactory ?? createTransport)({
      host: this.settings.host,
      port: this.settings.port,
      url: this.settings.url,
      connectTimeoutMs: this.settings.connectionTimeoutMs,
    });
    this.transport = transport;
    this.parser.reset();

    transport.setEvents({
      onData: (data) => {
        if (this.transport === transport) this.handleData(transport, data);
      },
      onClose: () => {
        if (this.transport !== transport) return;
        this.logger.warn('Transport closed');
        this.handleTransportLoss(new ConnectionError('Connection closed by broker'));
      },
      onError: (error) => {
        if (this.transport !== transport) return;
        this.logger.warn('Transport error', { error: error.message });
        this.handleTransportLoss(new ConnectionError(error.message, { cause: error }));
      },
    });

    const lost = defer<never>();
    this.handshakeAbort = lost.reject;

    try {
      await withTimeout(
        Promise.race([this.runHandshake(transport, quiet), lost.promise]),
        this.settings.connectionTimeoutMs,
        () => new ConnectionTimeoutError(this.settings.connectionTimeoutMs),
      );
    } catch (err) {
      const error = toError(err);
      this.infoWaiter?.reject(error);
      this.pongWaiter?.reject(error);
      if (this.transport === transport) this.transport = undefined;
      transport.setEvents({});
      transport.disconnect().catch((closeErr: unknown) => {
        this.logger.debug('Transport close failed', { error: toError(closeErr).message });
      });
      throw error;
    } finally {
      this.handshakeAbort = undefined;
      this.handshakePhase = undefined;
      this.infoWaiter = undefined;
      this.pongWaiter = undefined;
    }
  }

  private async runHandshake(transport: Transport, quiet: boolean): Promise<void> {
    const enter = (phase: HandshakePhase): void => {
      if (this.closed) throw new ConnectionClosedError();
      if (this.transport !== transport) throw new ConnectionError('Transport replaced during handshake');
      this.handshakePhase = phase;
      if (!quiet) this.setState(phase);
    };

    enter('connecting');
    const info = defer<ServerInfo>();
    this.infoWaiter = info;
    await transport.connect();

    enter('awaiting_info');
    const serverInfo = await info.promise;
    this.infoWaiter = undefined;

    if ((serverInfo.tls_required || this.settings.tls) && !transport.secure) {
      enter('tls_upgrading');
      await transport.upgradeToTls(this.settings.tlsOptions);
    }

    enter('authenticating');
    const pong = defer<void>();
    this.pongWaiter = pong;
    this.writeHandshake(transport, { op: 'CONNECT', options: this.connectOptions(transport.secure) });
    this.writeHandshake(transport, { op: 'PING' });

    let grace: ReturnType<typeof setTimeout> | undefined;
    const ponged = await Promise.race([
      pong.promise.then(() => true),
      new Promise<boolean>((resolve) => {
        grace = setTimeout(() => resolve(false), this.settings.authGracePeriodMs);
      }),
    ]);
    clearTimeout(grace);
    this.pongWaiter = undefined;

    if (this.closed) throw new ConnectionClosedError();
    if (this.transport !== transport) throw new ConnectionError('Transport replaced during handshake');
    if (!ponged) {
      // Absorb the handshake PONG if it turns up late.
      this.pendingPongs.push({ settled: true, settle: () => undefined });
    }

    this.logger.debug('Handshake complete', {
      serverId: serverInfo.server_id,
      secure: transport.secure,
      confirmed: ponged,
    });
  }

  private connectOptions(secure: boolean): ConnectOptions {
    const { username, password, token, name, echo } = this.settings;
    const options: ConnectOptions = {
      verbose: false,
      pedantic: false,
      tls_required: secure,
      lang: CLIENT_LANG,
      version: CLIENT_VERSION,
      protocol: PROTOCOL_VERSION,
      echo,
    };
    if (name) options.name = name;
    if (token) {
      options.auth_token = token;
    } else if (username) {
      options.user = username;
      if (password !== undefined) options.pass = password;
    }
    return options;
  }

  private writeHandshake(transport: Transport, command: Command): void {
    if (!transport.send(encodeCommand(command))) {
      throw new ConnectionError(`Write failed during handshake: ${command.op}`);
    }
  }

  private enterReady(): void {
    this.setState('ready');
    this.startKeepalive();
    this.logger.info('Connected', {
      serverId: this._serverInfo?.server_id,
      subscriptions: this.registry.size,
    });
  }

  /** Re-issue SUB (and UNSUB for finite budgets) for every live subscription. */
  private resubscribe(): boolean {
    this.registry.resetDeliveryCounts();
    for (const entry of this.registry.live()) {
      if (!this.send({ op: 'SUB', subject: entry.subject, queueGroup: entry.queueGroup, sid: entry.sid })) {
        return false;
      }
      if (entry.remaining !== undefined && !this.send({ op: 'UNSUB', sid: entry.sid, maxMessages: entry.remaining })) {
        return false;
      }
    }
    return true;
  }

  private handleTransportLoss(error: Error): void {
    if (this.closed) return;
    if (this.handshakeAbort) {
      this.handshakeAbort(error);
      return;
    }
    if (this._state === 'ready') this.beginReconnect(error);
  }

  private beginReconnect(cause: Error): void {
    this.logger.warn('Connection lost', { error: cause.message });
    this.stopKeepalive();
    this.dropTransport();
    this.rejectPongs(new NotConnectedError('reconnecting'));

    if (!this.settings.reconnect) {
      this.setState('disconnected');
      this.emitError(new ConnectionError('Connection lost', { cause }));
      return;
    }

    this.setState('reconnecting');
    this.reconnecting = this.reconnectLoop().finally(() => {
      this.reconnecting = undefined;
    });
  }

  private async reconnectLoop(): Promise<void> {
    const { maxReconnectAttempts, reconnectMaxDelayMs } = this.settings;
    let delay = this.settings.reconnectDelayMs;

    for (let attempt = 1; attempt <= maxReconnectAttempts; attempt++) {
      await this.wait(delay);
      if (this.closed) return;

      this.logger.info('Reconnecting', { attempt, maxReconnectAttempts, delayMs: delay });
      try {
        await this.establish(true);
      } catch (err) {
        if (this.closed) return;
        this.logger.warn('Reconnect attempt failed', { attempt, error: toError(err).message });
        delay = Math.min(delay * 2, reconnectMaxDelayMs);
        continue;
      }

      if (this.closed) return;
      if (!this.resubscribe()) {
        this.logger.warn('Connection lost while restoring subscriptions', { attempt });
        this.dropTransport();
        delay = Math.min(delay * 2, reconnectMaxDelayMs);
        continue;
      }

      this.enterReady();
      this.logger.info('Reconnected', { attempt });
      return;
    }

    this.setState('disconnected');
    this.logger.error('Reconnect attempts exhausted', { attempts: maxReconnectAttempts });
    this.emitError(new ConnectionError(`Reconnect failed after ${maxReconnectAttempts} attempts`));
  }

  private wait(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.cancelWait = undefined;
        resolve();
      }, ms);
      this.cancelWait = () => {
        clearTimeout(timer);
        this.cancelWait = undefined;
        resolve();
      };
    });
  }

  private dropTransport(): void {
    const transport = this.transport;
    this.transport = undefined;
    if (!transport) return;
    transport.setEvents({});
    transport.disconnect().catch((err: unknown) => {
      this.logger.debug('Transport close failed', { error: toError(err).message });
    });
  }

  // --- keepalive -----------------------------------------------------------

  private startKeepalive(): void {
    this.stopKeepalive();
    if (this.settings.pingIntervalMs === 0) return;

    this.pingTimer = setInterval(() => {
      this.ping().catch((err: unknown) => {
        if (err instanceof TimeoutError) {
          this.logger.warn('Keepalive PONG missed', { timeoutMs: err.timeoutMs });
          this.handleTransportLoss(new ConnectionError('Stale connection', { cause: err }));
          return;
        }
        this.logger.debug('Keepalive ping failed', { error: toError(err).message });
      });
    }, this.settings.pingIntervalMs);
  }

  private stopKeepalive(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = undefined;
    }
  }

  private rejectPongs(error: Error): void {
    const pending = this.pendingPongs;
    this.pendingPongs = [];
    for (const entry of pending) entry.settle(error);
  }

  // --- inbound -------------------------------------------------------------

  private handleData(transport: Transport, data: Uint8Array): void {
    for (const frame of this.parser.push(data)) {
      // A frame may have cost us the transport (failed PONG write); drop the rest.
      if (this.transport !== transport) return;
      this.processFrame(frame);
    }
  }

  private processFrame(frame: Frame): void {
    switch (frame.kind) {
      case 'INFO':
        this._serverInfo = frame.info;
        this.parser.setMaxPayload(frame.info.max_payload);
        this.infoWaiter?.resolve(frame.info);
        break;
      case 'MSG':
        try {
          this.dispatcher.dispatch(frame);
        } catch (err) {
          const error = toError(err);
          this.logger.error('Delivery target threw', { subject: frame.subject, sid: frame.sid, error: error.message });
          this.emitError(error);
        }
        break;
      case 'PING':
        this.send({ op: 'PONG' });
        break;
      case 'PONG':
        this.handlePong();
        break;
      case 'OK':
        break;
      case 'ERR':
        this.handleBrokerError(frame.message);
        break;
      case 'PARSE_ERROR':
        this.logger.error('Parser error', { reason: frame.reason, line: frame.line });
        this.emitError(new ProtocolError(frame.reason, 'parser'));
        break;
    }
  }

  private handlePong(): void {
    if (this.pongWaiter) {
      this.pongWaiter.resolve();
      return;
    }
    // PONGs answer PINGs in order; a timed-out entry still consumes its PONG.
    this.pendingPongs.shift()?.settle();
  }

  private handleBrokerError(message: string): void {
    if (this.handshakeAbort) {
      this.logger.error('Handshake rejected', { error: message, phase: this.handshakePhase });
      this.handshakeAbort(
        this.handshakePhase === 'authenticating'
          ? new AuthorizationError(message)
          : new ProtocolError(message, 'broker'),
      );
      return;
    }
    this.logger.error('Broker error', { error: message });
    this.emitError(new ProtocolError(message, 'broker'));
  }

  // --- helpers -------------------------------------------------------------

  /** Write a command; a failed write counts as transport loss. */
  private send(command: Command): boolean {
    const transport = this.transport;
    if (transport && transport.send(encodeCommand(command))) return true;
    this.handleTransportLoss(new ConnectionError(`Write failed: ${command.op}`));
    return false;
  }

  private writeOrThrow(command: Command): void {
    if (!this.send(command)) throw new NotConnectedError(this._state);
  }

  private assertOpen(): void {
    if (this.closed) throw new ConnectionClosedError();
  }

  private assertReady(): void {
    this.assertOpen();
    if (this._state !== 'ready') throw new NotConnectedError(this._state);
  }

  private setState(state: ConnectionState): void {
    if (this._state === state) return;
    const previous = this._state;
    this._state = state;
    this.logger.debug('State change', { from: previous, to: state });
    for (const listener of [...this.stateListeners]) {
      try {
        listener(state, previous);
      } catch (err) {
        this.logger.error('State listener threw', { error: toError(err).message });
      }
    }
  }

  private emitError(error: Error): void {
    for (const listener of [...this.errorListeners]) {
      try {
        listener(error);
      } catch (err) {
        this.logger.error('Error listener threw', { error: toError(err).message });
      }
    }
  }
}
