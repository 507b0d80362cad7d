import type {
  ChannelId,
  DisplayStyle,
  Extractor,
  SequenceKey,
  Suit,
  SuitCounts,
  SuitTally,
} from '@suit-tally/types';
import type { CounterStore } from './counter-store';
import type { DedupLedger } from './dedup-ledger';
import { ValidationError } from './errors';
import { findSequence, hasConfirmation } from './extract';
import { renderCounts } from './render';
import { SUITS } from './suits';

export type RejectReason = 'no-confirmation' | 'duplicate' | 'no-content';

export type ProcessOutcome =
  | {
      status: 'counted';
      channel: ChannelId;
      sequence: SequenceKey | null;
      found: SuitTally;
      totals: SuitCounts;
      response: string;
    }
  | {
      status: 'rejected';
      channel: ChannelId;
      reason: RejectReason;
      sequence: SequenceKey | null;
    };

export interface ProcessorDeps {
  store: CounterStore;
  ledger: DedupLedger;
  extract: Extractor;
  confirmationMarkers: readonly string[];
  displayStyle: DisplayStyle;
}

/**
 * Run one message through the counting pipeline.
 *
 * Gates short-circuit in order: confirmation marker, sequence dedup,
 * extraction. Only the dedup mark and the increments touch state. The
 * extractor result is validated before the mark, so an invalid result
 * throws without consuming the sequence.
 */
export function processEvent(deps: ProcessorDeps, channel: ChannelId, text: string): ProcessOutcome {
  if (!hasConfirmation(text, deps.confirmationMarkers)) {
    return { status: 'rejected', channel, reason: 'no-confirmation', sequence: null };
  }

  const tally = deps.extract(text);
  const found = tally ? positiveEntries(tally) : [];

  const sequence = findSequence(text);
  if (sequence !== null && !deps.ledger.tryMark(channel, sequence)) {
    return { status: 'rejected', channel, reason: 'duplicate', sequence };
  }

  if (found.length === 0) {
    return { status: 'rejected', channel, reason: 'no-content', sequence };
  }

  const applied: SuitTally = {};
  for (const [suit, amount] of found) {
    deps.store.increment(channel, suit, amount);
    applied[suit] = amount;
  }

  const totals = deps.store.get(channel);
  return {
    status: 'counted',
    channel,
    sequence,
    found: applied,
    totals,
    response: renderCounts(totals, deps.displayStyle),
  };
}

function positiveEntries(tally: SuitTally): Array<[Suit, number]> {
  const entries: Array<[Suit, number]> = [];
  for (const suit of SUITS) {
    const amount = tally[suit];
    if (amount === undefined || amount === 0) continue;
    if (!Number.isInteger(amount) || amount < 0) {
      throw new ValidationError('extract', `Extractor returned an invalid count for ${suit}: ${amount}`);
    }
    entries.push([suit, amount]);
  }
  return entries;
}
