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
  toError,
} from './errors.js';

export {
  Logger,
  createLogger,
  configure as configureLogging,
  resetLogging,
  formatLogLine,
  type LogLevel,
  type LogEntry,
  type LogSink,
  type LoggerConfig,
} from './logger.js';

export { generateToken } from './token.js';
