/**
 * Inbound messages and the targets they are delivered to.
 *
 * A target is anything that can accept one message without blocking the
 * dispatcher: an in-process queue, a callback, or the one-shot promise a
 * request waits on.
 */

import type { MsgFrame } from '@wisp/protocol';
import { ConnectionClosedError, TimeoutError, toError } from '@wisp/utils';

const textDecoder = new TextDecoder();

export interface Message {
  readonly subject: string;
  readonly sid: number;
  readonly replyTo?: string;
  /** Raw payload bytes */
  readonly data: Uint8Array;
  /** Payload decoded as UTF-8 */
  readonly body: string;
}

export function createMessage(frame: MsgFrame): Message {
  return Object.freeze({
    subject: frame.subject,
    sid: frame.sid,
    replyTo: frame.replyTo,
    data: frame.payload,
    body: textDecoder.decode(frame.payload),
  });
}

export interface MessageTarget {
  deliver(message: Message): void;
}

export type MessageHandler = (message: Message) => void;

export type DeliveryTarget = MessageTarget | MessageHandler;

/**
 * Wraps a plain callback. A throwing handler is reported through `onError`
 * and never reaches the dispatcher.
 */
export class CallbackTarget implements MessageTarget {
  constructor(
    private readonly handler: MessageHandler,
    private readonly onError: (error: Error, message: Message) => void,
  ) {}

  deliver(message: Message): void {
    try {
      this.handler(message);
    } catch (err) {
      this.onError(toError(err), message);
    }
  }
}

export function toTarget(
  target: DeliveryTarget,
  onError: (error: Error, message: Message) => void,
): MessageTarget {
  return typeof target === 'function' ? new CallbackTarget(target, onError) : target;
}

type Waiter = (message: Message | undefined) => void;

export interface MessageQueueOptions {
  /** Oldest messages are dropped beyond this many buffered. Default: unbounded. */
  maxPending?: number;
}

/**
 * Buffered inbound queue. `deliver` only appends, so a consumer that never
 * drains affects nobody else. Consume with `next()` or `for await`.
 * Iteration ends when the last subscription feeding the queue retires
 * (unsubscribe or an exhausted budget) or the connection stops.
 */
export class MessageQueue implements MessageTarget, AsyncIterable<Message> {
  private buffer: Message[] = [];
  private waiters: Waiter[] = [];
  private closed = false;
  private _dropped = 0;
  private readonly maxPending: number;

  constructor(options: MessageQueueOptions = {}) {
    this.maxPending = options.maxPending ?? Number.POSITIVE_INFINITY;
  }

  /** Messages waiting to be consumed */
  get size(): number {
    return this.buffer.length;
  }

  /** Messages discarded because the queue was full */
  get dropped(): number {
    return this._dropped;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  deliver(message: Message): void {
    if (this.closed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(message);
      return;
    }

    this.buffer.push(message);
    if (this.buffer.length > this.maxPending) {
      this.buffer.shift();
      this._dropped += 1;
    }
  }

  /** Take a buffered message without waiting. */
  tryNext(): Message | undefined {
    return this.buffer.shift();
  }

  /**
   * Resolve with the next message.
   * @throws TimeoutError if `timeoutMs` elapses first
   * @throws ConnectionClosedError if the queue is closed while waiting
   */
  next(timeoutMs?: number): Promise<Message> {
    const buffered = this.buffer.shift();
    if (buffered) return Promise.resolve(buffered);
    if (this.closed) return Promise.reject(new ConnectionClosedError('Message queue closed'));

    return new Promise((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const waiter: Waiter = (message) => {
        if (timer) clearTimeout(timer);
        if (message) {
          resolve(message);
        } else {
          reject(new ConnectionClosedError('Message queue closed'));
        }
      };

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          reject(new TimeoutError(`No message within ${timeoutMs}ms`, timeoutMs));
        }, timeoutMs);
      }

      this.waiters.push(waiter);
    });
  }

  /** Stop accepting messages. Buffered messages stay readable. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter(undefined);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Message> {
    while (true) {
      const buffered = this.buffer.shift();
      if (buffered) {
        yield buffered;
        continue;
      }
      if (this.closed) return;
      const message = await new Promise<Message | undefined>((resolve) => {
        this.waiters.push(resolve);
      });
      if (!message) return;
      yield message;
    }
  }
}
