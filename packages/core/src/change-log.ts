import type { ChannelChange, ChannelId, StateChange, SuitCounts } from '@suit-tally/types';

/** Ledger part of a pending change; counts are read from the store at drain. */
export type LedgerChange = Pick<ChannelChange, 'purgeLedger' | 'marks'>;

function emptyChange(): LedgerChange {
  return { purgeLedger: false, marks: [] };
}

/** Combine an older ledger change with a newer one for the same channel. */
export function mergeChanges(older: LedgerChange, newer: LedgerChange): LedgerChange {
  return {
    purgeLedger: older.purgeLedger || newer.purgeLedger,
    marks: newer.purgeLedger ? [...newer.marks] : [...older.marks, ...newer.marks],
  };
}

/**
 * In-memory log of channels touched since the last flush.
 *
 * Ledger changes are folded (mark 1, purge, mark 2 becomes
 * `{ purgeLedger: true, marks: ['2'] }`). Counter changes only mark the
 * channel dirty: a drained change carries the channel's totals at drain
 * time, so writing it is idempotent.
 */
export class ChangeLog {
  private changes = new Map<ChannelId, LedgerChange>();
  private count = 0;

  /** Add a single change to the current window. */
  add(change: StateChange): void {
    const entry = this.entry(change.channel);
    switch (change.type) {
      case 'mark':
        entry.marks.push(change.sequence);
        break;
      case 'purge':
        entry.purgeLedger = true;
        entry.marks = [];
        break;
      case 'increment':
      case 'reset':
        break;
    }
    this.count++;
  }

  /**
   * Put back a batch that failed to persist, ordered before anything
   * recorded since it was drained.
   */
  requeue(batch: Map<ChannelId, LedgerChange>): void {
    for (const [channel, older] of batch) {
      const newer = this.changes.get(channel);
      this.changes.set(channel, newer ? mergeChanges(older, newer) : mergeChanges(older, emptyChange()));
      this.count++;
    }
  }

  /** Returns the number of changes accumulated. */
  get size(): number {
    return this.count;
  }

  /** Returns the number of channels with pending changes. */
  get channelCount(): number {
    return this.changes.size;
  }

  /**
   * Drain the log. Each channel's change carries its current totals from
   * `snapshot`. Resets internal state for the next window.
   */
  drain(snapshot: (channel: ChannelId) => SuitCounts): Map<ChannelId, ChannelChange> {
    const batch = new Map<ChannelId, ChannelChange>();
    for (const [channel, { purgeLedger, marks }] of this.changes) {
      batch.set(channel, { counts: snapshot(channel), purgeLedger, marks });
    }
    this.changes = new Map();
    this.count = 0;
    return batch;
  }

  private entry(channel: ChannelId): LedgerChange {
    let entry = this.changes.get(channel);
    if (!entry) {
      entry = emptyChange();
      this.changes.set(channel, entry);
    }
    return entry;
  }
}
