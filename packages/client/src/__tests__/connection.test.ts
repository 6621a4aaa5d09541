import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  AuthorizationError,
  ConnectionClosedError,
  ConnectionError,
  ConnectionTimeoutError,
  InvalidRequestSubjectError,
  NotConnectedError,
  PayloadTooLargeError,
  ProtocolError,
  RequestTimeoutError,
  TimeoutError,
  UnknownSubscriptionError,
  UsageError,
  configureLogging,
  resetLogging,
  type LogEntry,
} from '@wisp/utils';
import { CLIENT_VERSION, Connection, type ConnectionState } from '../connection.js';
import { MessageQueue } from '../message.js';
import type { ConnectionSettings } from '../settings.js';
import { FakeBroker } from './fake-broker.js';

const connections: Connection[] = [];

function settingsFor(broker: FakeBroker, overrides: ConnectionSettings = {}): ConnectionSettings {
  return {
    transportFactory: broker.factory,
    connectionTimeoutMs: 500,
    authGracePeriodMs: 50,
    pingIntervalMs: 0,
    reconnectDelayMs: 5,
    reconnectMaxDelayMs: 20,
    logLevel: 'silent',
    ...overrides,
  };
}

function track(conn: Connection): Connection {
  connections.push(conn);
  return conn;
}

async function connect(broker: FakeBroker, overrides: ConnectionSettings = {}): Promise<Connection> {
  return track(await Connection.connect(settingsFor(broker, overrides)));
}

afterEach(async () => {
  await Promise.all(connections.splice(0).map((conn) => conn.stop()));
  resetLogging();
});

describe('Connection', () => {
  describe('handshake', () => {
    it('walks the handshake states in order', async () => {
      const broker = new FakeBroker();
      const conn = track(new Connection(settingsFor(broker)));
      const states: ConnectionState[] = [];
      conn.onStateChange((state) => states.push(state));

      await conn.start();

      expect(states).toEqual(['connecting', 'awaiting_info', 'authenticating', 'ready']);
      expect(conn.serverInfo?.server_id).toBe('fake-broker');
      expect(broker.current.lines.slice(1)).toEqual(['PING']);
    });

    it('shares one in-flight start', async () => {
      const broker = new FakeBroker();
      const conn = track(new Connection(settingsFor(broker)));

      const first = conn.start();
      const second = conn.start();

      expect(second).toBe(first);
      await first;
      expect(broker.accepted).toBe(1);
    });

    it('sends credentials and client identity in CONNECT', async () => {
      const broker = new FakeBroker();
      await connect(broker, { username: 'bob', password: 'test-secret', name: 'orders-worker' });

      expect(broker.current.connectOptions).toEqual({
        verbose: false,
        pedantic: false,
        tls_required: false,
        lang: 'typescript',
        version: CLIENT_VERSION,
        protocol: 1,
        echo: true,
        name: 'orders-worker',
        user: 'bob',
        pass: 'test-secret',
      });
    });

    it('sends a token as auth_token', async () => {
      const broker = new FakeBroker();
      await connect(broker, { token: 'test-token' });

      expect(broker.current.connectOptions?.auth_token).toBe('test-token');
      expect(broker.current.connectOptions?.user).toBeUndefined();
    });

    it('upgrades to TLS when the broker requires it', async () => {
      const broker = new FakeBroker();
      broker.info = { ...broker.info, tls_required: true };
      const conn = track(new Connection(settingsFor(broker)));
      const states: ConnectionState[] = [];
      conn.onStateChange((state) => states.push(state));

      await conn.start();

      expect(states).toEqual(['connecting', 'awaiting_info', 'tls_upgrading', 'authenticating', 'ready']);
      expect(broker.current.connectOptions?.tls_required).toBe(true);
    });

    it('upgrades to TLS when settings ask for it', async () => {
      const broker = new FakeBroker();
      await connect(broker, { tls: true });

      expect(broker.current.connectOptions?.tls_required).toBe(true);
    });

    it('fails the handshake when the transport cannot upgrade', async () => {
      const broker = new FakeBroker();
      broker.info = { ...broker.info, tls_required: true };
      broker.tlsSupported = false;
      const conn = track(new Connection(settingsFor(broker)));

      await expect(conn.start()).rejects.toThrow('TLS handshake failed');
      expect(conn.state).toBe('disconnected');
    });

    it('rejects with AuthorizationError when the broker refuses CONNECT', async () => {
      const broker = new FakeBroker();
      broker.rejectAuth = 'Authorization Violation';
      const conn = track(new Connection(settingsFor(broker, { username: 'bob', password: 'wrong' })));

      const error = await conn.start().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(AuthorizationError);
      expect(error).toHaveProperty('message', 'Authorization Violation');
      expect(conn.state).toBe('disconnected');
    });

    it('times out when INFO never arrives', async () => {
      const broker = new FakeBroker();
      broker.sendInfo = false;
      const conn = track(new Connection(settingsFor(broker, { connectionTimeoutMs: 50 })));
      const started = Date.now();

      const error = await conn.start().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ConnectionTimeoutError);
      expect(error).toHaveProperty('message', 'Connection not established within 50ms');
      expect(Date.now() - started).toBeGreaterThanOrEqual(40);
      expect(conn.state).toBe('disconnected');
    });

    it('never retries a failed startup', async () => {
      const broker = new FakeBroker();
      broker.refuseConnections = true;
      const conn = track(new Connection(settingsFor(broker)));

      await expect(conn.start()).rejects.toBeInstanceOf(ConnectionError);
      await new Promise((resolve) => setTimeout(resolve, 30));

      expect(broker.endpoints).toHaveLength(1);
      expect(conn.state).toBe('disconnected');
    });

    it('accepts a silent broker once the grace period passes', async () => {
      const broker = new FakeBroker();
      broker.answerPings = false;

      const conn = await connect(broker, { authGracePeriodMs: 20 });

      expect(conn.state).toBe('ready');
    });
  });

  describe('publish and subscribe', () => {
    it('delivers a published message to a subscriber', async () => {
      const broker = new FakeBroker();
      const conn = await connect(broker);
      const queue = new MessageQueue();

      conn.subscribe('test', queue);
      conn.publish('test', 'yo dawg');
      const msg = await queue.next(1000);

      expect(msg.subject).toBe('test');
      expect(msg.body).toBe('yo dawg');
      expect(msg.replyTo).toBeUndefined();
    });

    it('delivers one copy per independent subscription', async () => {
      const broker = new FakeBroker();
      const conn = await connect(broker);
      const queues = [new MessageQueue(), new MessageQueue(), new MessageQueue()];

      for (const queue of queues) conn.subscribe('fan', queue);
      conn.publish('fan', 'hello');
      await conn.ping();

      expect(queues.map((q) => q.size)).toEqual([1, 1, 1]);
    });

    it('delivers each message to one queue group member', async () => {
      const broker = new FakeBroker();
      const conn = await connect(broker);
      const first = new MessageQueue();
      const second = new MessageQueue();

      conn.subscribe('dup', first, { queueGroup: 'us' });
      conn.subscribe('dup', second, { queueGroup: 'us' });
      conn.publish('dup', 'yo');
      conn.publish('dup', 'ma');
      await conn.ping();

      expect(first.size + second.size).toBe(2);
      expect(first.size).toBe(1);
      expect(broker.current.lines).toContain('SUB dup us 1');
    });

    it('reports callback errors without stopping delivery', async () => {
      const broker = new FakeBroker();
      const conn = await connect(broker);
      const errors: Error[] = [];
      const seen: string[] = [];
      conn.onError((error) => errors.push(error));

      conn.subscribe('boom', (msg) => {
        seen.push(msg.body);
        if (msg.body === 'first') throw new Error('handler failed');
      });
      conn.publish('boom', 'first');
      conn.publish('boom', 'second');
      await conn.ping();

      expect(seen).toEqual(['first', 'second']);
      expect(errors.map((e) => e.message)).toEqual(['handler failed']);
    });

    it('rejects payloads above the broker maximum', async () => {
      const broker = new FakeBroker();
      broker.info = { ...broker.info, max_payload: 16 };
      const conn = await connect(broker);

      expect(() => conn.publish('big', 'x'.repeat(17))).toThrow(PayloadTooLargeError);
      expect(() => conn.publish('big', 'x'.repeat(16))).not.toThrow();
    });

    it('validates subjects and queue groups', async () => {
      const broker = new FakeBroker();
      const conn = await connect(broker);
      const queue = new MessageQueue();

      expect(() => conn.subscribe('', queue)).toThrow(UsageError);
      expect(() => conn.subscribe('test', queue, { queueGroup: '' })).toThrow(UsageError);
      expect(() => conn.publish('', 'x')).toThrow(UsageError);
      expect(conn.subscriptionCount).toBe(0);
    });
  });

  describe('unsubscribe', () => {
    it('delivers exactly maxMessages more messages', async () => {
      const broker = new FakeBroker();
      const conn = await connect(broker);
      const queue = new MessageQueue();

      const sid = conn.subscribe('limited', queue);
      conn.unsubscribe(sid, { maxMessages: 2 });
      for (const body of ['a', 'b', 'c', 'd', 'e']) conn.publish('limited', body);
      await conn.ping();

      expect(queue.size).toBe(2);
      expect(conn.isSubscribed(sid)).toBe(false);
      expect(broker.current.lines).toContain(`UNSUB ${sid} 2`);
    });

    it('enforces the budget even if the broker keeps sending', async () => {
      const broker = new FakeBroker();
      broker.ignoreUnsubMax = true;
      const conn = await connect(broker);
      const queue = new MessageQueue();

      const sid = conn.subscribe('limited', queue);
      conn.unsubscribe(sid, { maxMessages: 2 });
      for (const body of ['a', 'b', 'c', 'd']) conn.publish('limited', body);
      await conn.ping();

      expect(queue.size).toBe(2);
      expect(queue.tryNext()?.body).toBe('a');
      expect(queue.tryNext()?.body).toBe('b');
    });

    it('counts earlier deliveries in the broker budget', async () => {
      const broker = new FakeBroker();
      const conn = await connect(broker);
      const queue = new MessageQueue();

      const sid = conn.subscribe('jobs', queue);
      conn.publish('jobs', 'one');
      await queue.next(500);
      conn.unsubscribe(sid, { maxMessages: 2 });

      expect(broker.current.lines).toContain(`UNSUB ${sid} 3`);
    });

    it('removes immediately without a budget', async () => {
      const broker = new FakeBroker();
      const conn = await connect(broker);
      const queue = new MessageQueue();

      const sid = conn.subscribe('gone', queue);
      conn.unsubscribe(sid);
      conn.publish('gone', 'late');
      await conn.ping();

      expect(queue.size).toBe(0);
      expect(broker.current.lines).toContain(`UNSUB ${sid}`);
    });

    it('ends a consumer loop when the subscription goes away', async () => {
      const broker = new FakeBroker();
      const conn = await connect(broker);
      const queue = new MessageQueue();
      const sid = conn.subscribe('feed', queue);

      const bodies: string[] = [];
      const consumer = (async () => {
        for await (const msg of queue) bodies.push(msg.body);
      })();
      conn.publish('feed', 'one');
      await conn.ping();
      conn.unsubscribe(sid);
      await consumer;

      expect(bodies).toEqual(['one']);
      expect(queue.isClosed).toBe(true);
    });

    it('rejects unknown sids and bad budgets', async () => {
      const broker = new FakeBroker();
      const conn = await connect(broker);
      const sid = conn.subscribe('test', new MessageQueue());

      expect(() => conn.unsubscribe(999)).toThrow(UnknownSubscriptionError);
      expect(() => conn.unsubscribe(sid, { maxMessages: 0 })).toThrow(UsageError);
      expect(() => conn.unsubscribe(sid, { maxMessages: 1.5 })).toThrow(UsageError);
      expect(conn.isSubscribed(sid)).toBe(true);
    });
  });

  describe('request/reply', () => {
    it('issues distinct inboxes', async () => {
      const conn = await connect(new FakeBroker());

      const a = conn.newInbox();
      const b = conn.newInbox();

      expect(a).not.toBe(b);
      expect(a.startsWith('_INBOX.')).toBe(true);
    });

    it('refuses request subscriptions on subjects that are not inboxes', async () => {
      const broker = new FakeBroker();
      const conn = await connect(broker);

      expect(() => conn.subscribe('not_an_inbox', new MessageQueue(), { asRequest: true })).toThrow(
        new InvalidRequestSubjectError('not_an_inbox').message,
      );
      expect(() => conn.subscribe('not_an_inbox', new MessageQueue(), { asRequest: true })).toThrow(
        InvalidRequestSubjectError,
      );
      expect(conn.subscriptionCount).toBe(0);
      expect(broker.current.lines.some((line) => line.startsWith('SUB'))).toBe(false);
    });

    it('accepts request subscriptions on its own inboxes', async () => {
      const conn = await connect(new FakeBroker());
      const inbox = conn.newInbox();

      const sid = conn.subscribe(inbox, new MessageQueue(), { asRequest: true });

      expect(conn.isSubscribed(sid)).toBe(true);
    });

    it('returns the reply from a responder', async () => {
      const broker = new FakeBroker();
      const conn = await connect(broker);
      conn.subscribe('svc.echo', (msg) => {
        if (msg.replyTo) conn.publish(msg.replyTo, `echo: ${msg.body}`);
      });

      const reply = await conn.request('svc.echo', 'hello', { timeoutMs: 500 });

      expect(reply.body).toBe('echo: hello');
      expect(reply.subject.startsWith('_INBOX.')).toBe(true);
      expect(conn.subscriptionCount).toBe(1);
      expect(conn.pendingRequests).toBe(0);
      expect(broker.current.lines).toContain('UNSUB 2 1');
    });

    it('times out without a responder and removes the inbox', async () => {
      const conn = await connect(new FakeBroker());
      const started = Date.now();

      const error = await conn.request('nobody.home', 'ping', { timeoutMs: 50 }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RequestTimeoutError);
      expect(error).toHaveProperty('message', 'No reply on "nobody.home" within 50ms');
      expect(Date.now() - started).toBeGreaterThanOrEqual(40);
      expect(Date.now() - started).toBeLessThan(500);
      expect(conn.subscriptionCount).toBe(0);
    });

    it('uses the configured default timeout', async () => {
      const conn = await connect(new FakeBroker(), { requestTimeoutMs: 30 });

      await expect(conn.request('nobody.home', 'ping')).rejects.toHaveProperty('timeoutMs', 30);
    });
  });

  describe('protocol errors', () => {
    it('reports broker -ERR to listeners and the log', async () => {
      const broker = new FakeBroker();
      const entries: LogEntry[] = [];
      configureLogging({ level: 'error', sink: (entry) => entries.push(entry) });
      const conn = await connect(broker, { logLevel: undefined });
      const errors: Error[] = [];
      conn.onError((error) => errors.push(error));

      broker.sendRaw(`-ERR 'Unknown Protocol Operation'\r\n`);
      await conn.ping();

      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(ProtocolError);
      expect(errors[0]).toHaveProperty('code', 'BROKER_ERROR');
      expect(errors[0].message).toBe('Unknown Protocol Operation');
      expect(entries.map((e) => [e.component, e.message, e.context])).toEqual([
        ['connection', 'Broker error', { error: 'Unknown Protocol Operation' }],
      ]);
      expect(conn.state).toBe('ready');
    });

    it('reports unparseable frames and keeps going', async () => {
      const broker = new FakeBroker();
      const conn = await connect(broker);
      const errors: Error[] = [];
      conn.onError((error) => errors.push(error));
      const queue = new MessageQueue();
      conn.subscribe('after', queue);

      broker.sendRaw('BOGUS frame\r\n');
      conn.publish('after', 'still here');

      expect((await queue.next(500)).body).toBe('still here');
      expect(errors).toHaveLength(1);
      expect(errors[0]).toHaveProperty('code', 'PARSE_ERROR');
      expect(errors[0].message).toBe('Unknown protocol operation: BOGUS');
    });
  });

  describe('keepalive', () => {
    it('answers broker PINGs', async () => {
      const broker = new FakeBroker();
      const conn = await connect(broker);

      broker.sendRaw('PING\r\n');
      await conn.ping();

      expect(broker.current.lines).toContain('PONG');
    });

    it('resolves ping() on PONG', async () => {
      const conn = await connect(new FakeBroker());

      await expect(conn.ping()).resolves.toBeUndefined();
    });

    it('rejects ping() when no PONG arrives', async () => {
      const broker = new FakeBroker();
      const conn = await connect(broker);
      broker.answerPings = false;

      await expect(conn.ping(30)).rejects.toBeInstanceOf(TimeoutError);
      expect(conn.state).toBe('ready');
    });

    it('reconnects after a missed keepalive PONG', async () => {
      const broker = new FakeBroker();
      await connect(broker, { pingIntervalMs: 20, pingTimeoutMs: 20, authGracePeriodMs: 10 });
      broker.answerPings = false;

      await vi.waitFor(() => expect(broker.accepted).toBeGreaterThanOrEqual(2));
    });
  });

  describe('reconnect', () => {
    it('fails publishes while down and restores subscriptions after', async () => {
      const broker = new FakeBroker();
      const conn = await connect(broker, { maxReconnectAttempts: 1000 });
      const queue = new MessageQueue();
      conn.subscribe('test', queue);
      const states: ConnectionState[] = [];
      conn.onStateChange((state) => states.push(state));

      broker.refuseConnections = true;
      broker.dropAll();
      await vi.waitFor(() => expect(conn.state).toBe('reconnecting'));

      expect(() => conn.publish('test', 'lost')).toThrow(NotConnectedError);

      broker.refuseConnections = false;
      await vi.waitFor(() => expect(conn.state).toBe('ready'));
      conn.publish('test', 'back');

      expect((await queue.next(500)).body).toBe('back');
      expect(states).toEqual(['reconnecting', 'ready']);
      expect(broker.current.lines.slice(2)).toEqual(['SUB test 1', 'PUB test 4']);
    });

    it('re-issues remaining budgets', async () => {
      const broker = new FakeBroker();
      const conn = await connect(broker);
      const queue = new MessageQueue();
      const sid = conn.subscribe('jobs', queue);
      conn.unsubscribe(sid, { maxMessages: 3 });
      conn.publish('jobs', 'a');
      await queue.next(500);

      broker.dropAll();
      await vi.waitFor(() => expect(broker.accepted).toBe(2));
      await vi.waitFor(() => expect(conn.state).toBe('ready'));

      expect(broker.current.lines.slice(2)).toEqual([`SUB jobs ${sid}`, `UNSUB ${sid} 2`]);

      for (const body of ['b', 'c', 'd']) conn.publish('jobs', body);
      await conn.ping();
      expect(queue.size).toBe(2);
      expect(conn.isSubscribed(sid)).toBe(false);
    });

    it('keeps pending requests alive across a reconnect', async () => {
      const broker = new FakeBroker();
      const conn = await connect(broker);
      const responder = await connect(broker);
      let replyTo: string | undefined;
      responder.subscribe('svc.slow', (msg) => {
        replyTo = msg.replyTo;
      });

      const pending = conn.request('svc.slow', 'work', { timeoutMs: 2000 });
      await vi.waitFor(() => expect(replyTo).toBeDefined());

      broker.sessions[0].drop();
      await vi.waitFor(() => expect(broker.accepted).toBe(3));
      await vi.waitFor(() => expect(conn.state).toBe('ready'));
      responder.publish(replyTo ?? '', 'done');

      expect((await pending).body).toBe('done');
      expect(conn.pendingRequests).toBe(0);
    });

    it('goes disconnected when attempts run out and can be restarted', async () => {
      const broker = new FakeBroker();
      const conn = await connect(broker, { maxReconnectAttempts: 2 });
      const errors: Error[] = [];
      conn.onError((error) => errors.push(error));
      const queue = new MessageQueue();
      conn.subscribe('test', queue);

      broker.refuseConnections = true;
      broker.dropAll();
      await vi.waitFor(() => expect(conn.state).toBe('disconnected'));

      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(ConnectionError);
      expect(errors[0].message).toBe('Reconnect failed after 2 attempts');
      expect(conn.subscriptionCount).toBe(1);

      broker.refuseConnections = false;
      await conn.start();
      conn.publish('test', 'again');

      expect((await queue.next(500)).body).toBe('again');
    });

    it('stays down when reconnect is disabled', async () => {
      const broker = new FakeBroker();
      const conn = await connect(broker, { reconnect: false });
      const errors: Error[] = [];
      conn.onError((error) => errors.push(error));

      broker.dropAll();
      await vi.waitFor(() => expect(conn.state).toBe('disconnected'));

      expect(errors.map((e) => e.message)).toEqual(['Connection lost']);
      expect(broker.accepted).toBe(1);
    });
  });

  describe('stop', () => {
    it('rejects pending work and refuses further operations', async () => {
      const broker = new FakeBroker();
      const conn = await connect(broker);
      const queue = new MessageQueue();
      conn.subscribe('test', queue);
      const pending = expect(conn.request('nobody.home', 'x', { timeoutMs: 5000 })).rejects.toBeInstanceOf(
        ConnectionClosedError,
      );

      await conn.stop();
      await pending;

      expect(conn.state).toBe('disconnected');
      expect(conn.subscriptionCount).toBe(0);
      expect(queue.isClosed).toBe(true);
      expect(() => conn.publish('test', 'x')).toThrow(ConnectionClosedError);
      expect(() => conn.subscribe('test', queue)).toThrow(ConnectionClosedError);
      expect(() => conn.newInbox()).toThrow(ConnectionClosedError);
      await expect(conn.request('test', 'x')).rejects.toBeInstanceOf(ConnectionClosedError);
      await expect(conn.start()).rejects.toBeInstanceOf(ConnectionClosedError);
    });

    it('ends with draining then disconnected', async () => {
      const conn = await connect(new FakeBroker());
      const states: ConnectionState[] = [];
      conn.onStateChange((state) => states.push(state));

      await conn.stop();
      await conn.stop();

      expect(states).toEqual(['draining', 'disconnected']);
    });

    it('aborts a startup in progress', async () => {
      const broker = new FakeBroker();
      broker.sendInfo = false;
      const conn = new Connection(settingsFor(broker, { connectionTimeoutMs: 5000 }));

      const starting = conn.start().catch((err: unknown) => err);
      await vi.waitFor(() => expect(conn.state).toBe('awaiting_info'));
      await conn.stop();

      expect(await starting).toBeInstanceOf(ConnectionClosedError);
      expect(conn.state).toBe('disconnected');
    });
  });
});
