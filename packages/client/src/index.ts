/**
 * @wisp/client
 *
 * Pub/sub client: one connection multiplexing subscriptions, publishes and
 * request/reply over a TCP, TLS or WebSocket transport.
 *
 * @example
 * ```typescript
 * import { Connection, MessageQueue } from '@wisp/client';
 *
 * const conn = await Connection.connect({ host: 'localhost', port: 4222 });
 * const queue = new MessageQueue();
 * conn.subscribe('orders.created', queue);
 * conn.publish('orders.created', JSON.stringify({ id: 42 }));
 * const msg = await queue.next(1000);
 * await conn.stop();
 * ```
 */

export {
  Connection,
  CLIENT_LANG,
  CLIENT_VERSION,
  type ConnectionState,
  type StateListener,
  type ErrorListener,
  type SubscribeOptions,
  type UnsubscribeOptions,
  type PublishOptions,
  type RequestOptions,
} from './connection.js';

export {
  ConnectionSettingsSchema,
  DEFAULT_PORT,
  resolveSettings,
  settingsFromEnv,
  type ConnectionSettings,
  type ResolvedSettings,
} from './settings.js';

export {
  MessageQueue,
  CallbackTarget,
  createMessage,
  toTarget,
  type Message,
  type MessageTarget,
  type MessageHandler,
  type DeliveryTarget,
  type MessageQueueOptions,
} from './message.js';

export {
  SubscriptionRegistry,
  type Subscription,
  type NewSubscription,
  type DeliveryOutcome,
} from './subscriptions.js';

export { Dispatcher } from './dispatcher.js';
export { InboxFactory, INBOX_PREFIX } from './inbox.js';
export { RequestCorrelator, type RequestChannel } from './request.js';

export * from './transports/index.js';

export {
  WispError,
  ConnectionError,
  NotConnectedError,
  ConnectionClosedError,
  TimeoutError,
  ConnectionTimeoutError,
  RequestTimeoutError,
  UsageError,
  InvalidRequestSubjectError,
  UnknownSubscriptionError,
  PayloadTooLargeError,
  ProtocolError,
  AuthorizationError,
  configureLogging,
  type LogLevel,
} from '@wisp/utils';
