import type { MsgFrame } from '@wisp/protocol';
import type { Logger } from '@wisp/utils';
import { createMessage } from './message.js';
import type { SubscriptionRegistry } from './subscriptions.js';

/**
 * Routes MSG frames to their subscription's target.
 *
 * The broker sends one frame per matching sid, so plain subscriptions on the
 * same subject each get their own frame and a queue group gets exactly one.
 * Routing by sid therefore never duplicates a delivery.
 */
export class Dispatcher {
  constructor(
    private readonly registry: SubscriptionRegistry,
    private readonly logger: Logger,
  ) {}

  /** @returns false when the frame's sid is not (or no longer) registered */
  dispatch(frame: MsgFrame): boolean {
    const entry = this.registry.get(frame.sid);
    if (!entry) {
      this.logger.debug('Dropping message for unknown subscription', {
        sid: frame.sid,
        subject: frame.subject,
      });
      return false;
    }

    const message = createMessage(frame);
    // Budget first: a target that unsubscribes or re-enters sees final state.
    const outcome = this.registry.recordDelivery(frame.sid);
    if (outcome === 'exhausted') {
      this.logger.debug('Subscription budget exhausted', { sid: frame.sid, subject: entry.subject });
    }
    entry.target.deliver(message);
    if (outcome === 'exhausted') this.registry.release(entry.target);
    return true;
  }
}
