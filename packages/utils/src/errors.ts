/**
 * Error types for wisp.
 *
 * Every error carries a stable `code` so callers can branch without
 * matching on messages. The hierarchy follows the four failure families a
 * client sees: transport, protocol, usage and timeout.
 */

export class WispError extends Error {
  readonly code: string;

  constructor(message: string, code = 'WISP_ERROR', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WispError';
    this.code = code;
  }
}

/** The transport could not be opened or was lost. */
export class ConnectionError extends WispError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONNECTION_ERROR', options);
    this.name = 'ConnectionError';
  }
}

/** An operation needed a ready session but the session is connecting or reconnecting. */
export class NotConnectedError extends WispError {
  readonly state: string;

  constructor(state: string) {
    super(`Not connected (state: ${state})`, 'NOT_CONNECTED');
    this.name = 'NotConnectedError';
    this.state = state;
  }
}

/** The connection was stopped; it accepts no further operations. */
export class ConnectionClosedError extends WispError {
  constructor(message = 'Connection closed') {
    super(message, 'CONNECTION_CLOSED');
    this.name = 'ConnectionClosedError';
  }
}

export class TimeoutError extends WispError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, code = 'TIMEOUT') {
    super(message, code);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ConnectionTimeoutError extends TimeoutError {
  constructor(timeoutMs: number) {
    super(`Connection not established within ${timeoutMs}ms`, timeoutMs, 'CONNECTION_TIMEOUT');
    this.name = 'ConnectionTimeoutError';
  }
}

export class RequestTimeoutError extends TimeoutError {
  readonly subject: string;

  constructor(subject: string, timeoutMs: number) {
    super(`No reply on "${subject}" within ${timeoutMs}ms`, timeoutMs, 'REQUEST_TIMEOUT');
    this.name = 'RequestTimeoutError';
    this.subject = subject;
  }
}

/** Caller misuse. Thrown synchronously; never affects the session. */
export class UsageError extends WispError {
  constructor(message: string, code = 'USAGE_ERROR') {
    super(message, code);
    this.name = 'UsageError';
  }
}

export class InvalidRequestSubjectError extends UsageError {
  readonly subject: string;

  constructor(subject: string) {
    super(
      'When subscribing as a request, you must use newInbox() to create the subject.',
      'INVALID_REQUEST_SUBJECT',
    );
    this.name = 'InvalidRequestSubjectError';
    this.subject = subject;
  }
}

export class UnknownSubscriptionError extends UsageError {
  readonly sid: number;

  constructor(sid: number) {
    super(`Unknown subscription: ${sid}`, 'UNKNOWN_SUBSCRIPTION');
    this.name = 'UnknownSubscriptionError';
    this.sid = sid;
  }
}

export class PayloadTooLargeError extends UsageError {
  readonly size: number;
  readonly maxPayload: number;

  constructor(size: number, maxPayload: number) {
    super(`Payload too large: ${size} > ${maxPayload}`, 'PAYLOAD_TOO_LARGE');
    this.name = 'PayloadTooLargeError';
    this.size = size;
    this.maxPayload = maxPayload;
  }
}

/**
 * A protocol-level failure: either the broker sent `-ERR` or an inbound
 * frame could not be parsed. Reported asynchronously, never thrown at a caller.
 */
export class ProtocolError extends WispError {
  readonly source: 'broker' | 'parser';

  constructor(message: string, source: 'broker' | 'parser') {
    super(message, source === 'broker' ? 'BROKER_ERROR' : 'PARSE_ERROR');
    this.name = 'ProtocolError';
    this.source = source;
  }
}

/** The broker rejected the CONNECT handshake. */
export class AuthorizationError extends WispError {
  constructor(message: string) {
    super(message, 'AUTHORIZATION_ERROR');
    this.name = 'AuthorizationError';
  }
}

/**
 * Normalise an unknown thrown value to an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
