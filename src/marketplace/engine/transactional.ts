import type { LedgerEvent } from './types';

/**
 * A participant in a marketplace operation whose state can be captured
 * before the operation and put back if the operation fails.
 */
export interface Transactional<S = unknown> {
  snapshot(): S;
  restore(snapshot: S): void;
}

/**
 * Events recorded while an operation runs. Rolled back with the operation,
 * drained by the caller once it commits.
 */
export class EventOutbox implements Transactional<LedgerEvent[]> {
  private pending: LedgerEvent[] = [];

  record(event: LedgerEvent): void {
    this.pending.push(event);
  }

  drain(): LedgerEvent[] {
    const events = this.pending;
    this.pending = [];
    return events;
  }

  snapshot(): LedgerEvent[] {
    return [...this.pending];
  }

  restore(snapshot: LedgerEvent[]): void {
    this.pending = [...snapshot];
  }
}
