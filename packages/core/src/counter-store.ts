import type { ChangeListener, ChannelId, Suit, SuitCounts } from '@suit-tally/types';
import { ValidationError } from './errors';
import { emptyCounts } from './suits';

/**
 * Per-channel suit counters.
 *
 * Every method runs to completion without yielding, so on the event loop
 * each call is an atomic critical section: a snapshot-and-reset observes
 * either all of an increment or none of it, and no increment is lost.
 */
export class CounterStore {
  private records = new Map<ChannelId, SuitCounts>();
  private readonly onChange?: ChangeListener;

  constructor(onChange?: ChangeListener) {
    this.onChange = onChange;
  }

  /** Add `amount` to one suit, creating the channel's record on first use. */
  increment(channel: ChannelId, suit: Suit, amount: number): void {
    if (!Number.isInteger(amount) || amount <= 0) {
      throw new ValidationError('amount', `Increment must be a positive integer, got ${amount}`);
    }
    const record = this.record(channel);
    record[suit] += amount;
    this.onChange?.({ type: 'increment', channel, suit, amount });
  }

  /** Return the current counts and zero them in the same step. */
  snapshotAndReset(channel: ChannelId): SuitCounts {
    const current = this.records.get(channel);
    const snapshot = current ? { ...current } : emptyCounts();
    this.records.set(channel, emptyCounts());
    this.onChange?.({ type: 'reset', channel });
    return snapshot;
  }

  /** Copy of the channel's counts; all zeros for a channel never seen. */
  get(channel: ChannelId): SuitCounts {
    const current = this.records.get(channel);
    return current ? { ...current } : emptyCounts();
  }

  /** Load persisted counts. Not reported as a change. */
  restore(channel: ChannelId, counts: SuitCounts): void {
    this.records.set(channel, { ...counts });
  }

  channels(): ChannelId[] {
    return Array.from(this.records.keys());
  }

  private record(channel: ChannelId): SuitCounts {
    let record = this.records.get(channel);
    if (!record) {
      record = emptyCounts();
      this.records.set(channel, record);
    }
    return record;
  }
}
