/**
 * Request/reply on top of inbox subscriptions.
 */

import type { Payload } from '@wisp/protocol';
import { RequestTimeoutError, toError } from '@wisp/utils';
import type { Message, MessageTarget } from './message.js';

/** The slice of the connection a request needs. */
export interface RequestChannel {
  newInbox(): string;
  subscribe(subject: string, target: MessageTarget, options: { asRequest: true }): number;
  unsubscribe(sid: number, options?: { maxMessages?: number }): void;
  publish(subject: string, payload: Payload, options: { replyTo: string }): void;
  isSubscribed(sid: number): boolean;
}

interface PendingRequest {
  subject: string;
  resolve: (message: Message) => void;
  reject: (error: Error) => void;
  timer?: ReturnType<typeof setTimeout>;
}

export class RequestCorrelator {
  private pending = new Map<number, PendingRequest>();

  constructor(
    private readonly channel: RequestChannel,
    private readonly defaultTimeoutMs: number,
  ) {}

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Publish `payload` to `subject` with a fresh inbox as reply-to and wait
   * for exactly one reply.
   *
   * The inbox subscription carries a one-message budget, so it retires itself
   * even if a responder replies twice; on timeout it is removed here.
   */
  request(subject: string, payload: Payload, timeoutMs = this.defaultTimeoutMs): Promise<Message> {
    return new Promise<Message>((resolve, reject) => {
      const inbox = this.channel.newInbox();
      const entry: PendingRequest = { subject, resolve, reject };

      let sid = 0;
      const target: MessageTarget = {
        deliver: (message) => this.settle(sid, (p) => p.resolve(message)),
      };

      sid = this.channel.subscribe(inbox, target, { asRequest: true });
      this.pending.set(sid, entry);

      try {
        this.channel.unsubscribe(sid, { maxMessages: 1 });
        this.channel.publish(subject, payload, { replyTo: inbox });
      } catch (err) {
        this.settle(sid, (p) => p.reject(toError(err)));
        return;
      }

      entry.timer = setTimeout(() => {
        this.settle(sid, (p) => p.reject(new RequestTimeoutError(subject, timeoutMs)));
      }, timeoutMs);
    });
  }

  /** Fail every in-flight request, e.g. when the connection stops. */
  rejectAll(error: Error): void {
    const pending = [...this.pending.keys()];
    for (const sid of pending) {
      this.settle(sid, (p) => p.reject(error));
    }
  }

  private settle(sid: number, finish: (pending: PendingRequest) => void): void {
    const entry = this.pending.get(sid);
    if (!entry) return;
    this.pending.delete(sid);
    if (entry.timer) clearTimeout(entry.timer);
    if (this.channel.isSubscribed(sid)) {
      this.channel.unsubscribe(sid);
    }
    finish(entry);
  }
}
