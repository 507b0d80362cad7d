import type { ChangeListener, ChannelId, SequenceKey } from '@suit-tally/types';

/**
 * Sequence numbers already applied, per channel.
 *
 * Keys are never evicted on their own; they live until the channel is
 * purged by a reset.
 */
export class DedupLedger {
  private keys = new Map<ChannelId, Set<SequenceKey>>();
  private readonly onChange?: ChangeListener;

  constructor(onChange?: ChangeListener) {
    this.onChange = onChange;
  }

  /**
   * Record `(channel, sequence)` if it is new.
   * Returns false, without touching state, when it was already recorded.
   */
  tryMark(channel: ChannelId, sequence: SequenceKey): boolean {
    let seen = this.keys.get(channel);
    if (seen?.has(sequence)) return false;
    if (!seen) {
      seen = new Set();
      this.keys.set(channel, seen);
    }
    seen.add(sequence);
    this.onChange?.({ type: 'mark', channel, sequence });
    return true;
  }

  has(channel: ChannelId, sequence: SequenceKey): boolean {
    return this.keys.get(channel)?.has(sequence) ?? false;
  }

  /** Drop every key of the channel. Returns how many were removed. */
  purge(channel: ChannelId): number {
    const removed = this.keys.get(channel)?.size ?? 0;
    this.keys.delete(channel);
    this.onChange?.({ type: 'purge', channel });
    return removed;
  }

  /** Load persisted keys. Not reported as a change. */
  restore(channel: ChannelId, sequences: Iterable<SequenceKey>): void {
    this.keys.set(channel, new Set(sequences));
  }

  /** Key count for one channel, or across all channels. */
  size(channel?: ChannelId): number {
    if (channel !== undefined) return this.keys.get(channel)?.size ?? 0;
    let total = 0;
    for (const seen of this.keys.values()) total += seen.size;
    return total;
  }
}
