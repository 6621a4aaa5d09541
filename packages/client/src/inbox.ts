import { generateToken } from '@wisp/utils';

export const INBOX_PREFIX = '_INBOX';

/**
 * Issues reply subjects for one connection:
 * `_INBOX.<random connection token>.<counter>`.
 *
 * The random token keeps inboxes distinct across connections; the counter
 * keeps them distinct within one. Issued inboxes are recognised from the
 * counter range, so nothing is retained per inbox.
 */
export class InboxFactory {
  readonly prefix: string;
  private seq = 0;

  constructor(token: string = generateToken()) {
    this.prefix = `${INBOX_PREFIX}.${token}`;
  }

  next(): string {
    this.seq += 1;
    return `${this.prefix}.${this.seq}`;
  }

  /** True if `subject` is an inbox this factory has already handed out. */
  isIssued(subject: string): boolean {
    const head = `${this.prefix}.`;
    if (!subject.startsWith(head)) return false;
    const suffix = subject.slice(head.length);
    if (!/^[1-9]\d*$/.test(suffix)) return false;
    return Number(suffix) <= this.seq;
  }
}
