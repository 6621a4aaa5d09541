/**
 * Subscription registry.
 *
 * Sole owner of subscription state. Callers only ever hold the numeric sid;
 * everything else is looked up here.
 */

import { UnknownSubscriptionError } from '@wisp/utils';
import { MessageQueue, type MessageTarget } from './message.js';

export interface Subscription {
  readonly sid: number;
  readonly subject: string;
  readonly queueGroup?: string;
  readonly target: MessageTarget;
  /** Subscribed to a request inbox */
  readonly isRequest: boolean;
  /** Deliveries since the broker last saw SUB for this sid */
  delivered: number;
  /** Deliveries left before auto-removal; undefined means unbounded */
  remaining?: number;
}

export interface NewSubscription {
  subject: string;
  queueGroup?: string;
  target: MessageTarget;
  isRequest?: boolean;
}

export type DeliveryOutcome = 'retained' | 'exhausted';

export class SubscriptionRegistry {
  private entries = new Map<number, Subscription>();
  private sidSeq = 0;

  get size(): number {
    return this.entries.size;
  }

  add(params: NewSubscription): Subscription {
    this.sidSeq += 1;
    const entry: Subscription = {
      sid: this.sidSeq,
      subject: params.subject,
      queueGroup: params.queueGroup,
      target: params.target,
      isRequest: params.isRequest ?? false,
      delivered: 0,
    };
    this.entries.set(entry.sid, entry);
    return entry;
  }

  get(sid: number): Subscription | undefined {
    return this.entries.get(sid);
  }

  has(sid: number): boolean {
    return this.entries.has(sid);
  }

  remove(sid: number): boolean {
    return this.entries.delete(sid);
  }

  /**
   * Allow exactly `maxMessages` further deliveries.
   * @throws UnknownSubscriptionError
   */
  setBudget(sid: number, maxMessages: number): Subscription {
    const entry = this.entries.get(sid);
    if (!entry) throw new UnknownSubscriptionError(sid);
    entry.remaining = maxMessages;
    return entry;
  }

  /**
   * Count one delivery against `sid`. An exhausted budget removes the entry,
   * so frames that arrive after it are dropped.
   */
  recordDelivery(sid: number): DeliveryOutcome {
    const entry = this.entries.get(sid);
    if (!entry) throw new UnknownSubscriptionError(sid);
    entry.delivered += 1;
    if (entry.remaining === undefined) return 'retained';
    entry.remaining -= 1;
    if (entry.remaining > 0) return 'retained';
    this.entries.delete(sid);
    return 'exhausted';
  }

  /**
   * End a queue's iteration once no live subscription feeds it. A queue
   * shared by several subscriptions stays open until the last one retires.
   */
  release(target: MessageTarget): void {
    if (!(target instanceof MessageQueue)) return;
    for (const entry of this.entries.values()) {
      if (entry.target === target) return;
    }
    target.close();
  }

  /** The broker forgets counts on a new SUB; mirror that after a reconnect. */
  resetDeliveryCounts(): void {
    for (const entry of this.entries.values()) {
      entry.delivered = 0;
    }
  }

  /** Live subscriptions in registration order. */
  live(): Subscription[] {
    return [...this.entries.values()];
  }

  clear(): void {
    this.entries.clear();
  }
}
