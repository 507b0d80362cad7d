import type { ChannelId, SequenceKey, SuitCounts } from './core';

/**
 * Pending write for one channel.
 *
 * `counts` are the channel's current totals and replace the stored ones.
 * When `purgeLedger` is set the stored ledger must be cleared before
 * `marks` is added. Applying the same change twice leaves the same state.
 */
export interface ChannelChange {
  counts: SuitCounts;
  purgeLedger: boolean;
  marks: SequenceKey[];
}

/** State of one channel as read back from a provider. */
export interface PersistedChannelState {
  counts: SuitCounts;
  sequences: SequenceKey[];
}

/**
 * Persistence backend contract. Memory stays authoritative; providers
 * receive folded changes and are read once on startup.
 */
export interface IStateProvider {
  /**
   * Persist a batch of folded channel changes. A rejected promise makes
   * the engine keep the batch and retry it on the next flush.
   *
   * @example
   * await provider.flush(new Map([
   *   ['-100123', {
   *     counts: { clubs: 0, diamonds: 0, spades: 0, hearts: 2 },
   *     purgeLedger: false,
   *     marks: ['42'],
   *   }],
   * ]))
   */
  flush(batch: Map<ChannelId, ChannelChange>): Promise<void>;

  /** Read every persisted channel. */
  load(): Promise<Map<ChannelId, PersistedChannelState>>;

  /**
   * Optional: Initialize provider resources (connections, etc.)
   */
  initialize?(): Promise<void>;

  /**
   * Optional: Clean up resources on shutdown
   */
  close?(): Promise<void>;
}
