import type { IStateProvider } from './provider';

/** Opaque channel identifier. Transports stringify numeric chat ids. */
export type ChannelId = string;

/** Card suits recognized inside the first parenthesized group of a message. */
export type Suit = 'clubs' | 'diamonds' | 'spades' | 'hearts';

/** Running totals for one channel. Every suit is always present. */
export type SuitCounts = Record<Suit, number>;

/** Suits found in a single message; absent suits were not seen. */
export type SuitTally = Partial<SuitCounts>;

/**
 * Dedup key of a `#n<digits>` marker: the decimal digits with leading zeros
 * stripped, so `#n042` and `#n42` match and numbers of any length compare
 * exactly.
 */
export type SequenceKey = string;

/** Pure extraction function: returns null when nothing countable was found. */
export type Extractor = (text: string) => SuitTally | null;

/**
 * Outbound message capability. Delivery is best-effort: the engine logs a
 * rejected promise and never retries.
 */
export type ReplySink = (channel: ChannelId, text: string) => Promise<void>;

/** Layout used when rendering per-message responses. */
export type DisplayStyle = 1 | 2 | 3;

/**
 * Inbound text event as delivered by a transport.
 */
export interface TallyEvent {
  /** Channel the event was posted in */
  channel: ChannelId;

  /** Transport message id, unique within the channel */
  eventId: string | number;

  /** Message text */
  text: string;

  /** True when this delivery is an edit of an earlier message */
  isEdit: boolean;
}

/**
 * Configuration for the TallyEngine
 */
export interface EngineConfig {
  /** Where responses and reports are sent */
  reply: ReplySink;

  /** Optional write-behind persistence backend */
  provider?: IStateProvider;

  /** Suit extraction function. Default: the built-in card extractor */
  extract?: Extractor;

  debounce?: {
    /** Quiet window (ms) an edited message must survive before it is counted. Default: 3000 */
    quietMs?: number;
  };

  processing?: {
    /** At least one of these must appear in a message for it to count. Default: ✅ and 🔰 */
    confirmationMarkers?: string[];

    /** Response layout. Default: 1 */
    displayStyle?: DisplayStyle;
  };

  autoReport?: {
    /** Also purge the channel's dedup ledger after each automatic report. Default: false */
    purgeLedger?: boolean;
  };

  persistence?: {
    /** Interval (ms) between provider flushes. Default: 1000 */
    flushIntervalMs?: number;
  };

  /** Wall clock, injectable for tests. Default: () => new Date() */
  now?: () => Date;
}

/**
 * A single mutation of counter or ledger state, as seen by persistence.
 */
export type StateChange =
  | { type: 'increment'; channel: ChannelId; suit: Suit; amount: number }
  | { type: 'reset'; channel: ChannelId }
  | { type: 'mark'; channel: ChannelId; sequence: SequenceKey }
  | { type: 'purge'; channel: ChannelId };

export type ChangeListener = (change: StateChange) => void;

/**
 * Engine statistics for monitoring
 */
export interface EngineStats {
  /** Events handed to the engine, edits included */
  eventsReceived: number;

  /** Events that changed the counters */
  eventsCounted: number;

  /** Events rejected by a processing gate */
  eventsRejected: number;

  /** Rejections caused by an already-seen sequence number */
  duplicatesRejected: number;

  /** Edits queued behind the quiet window */
  editsScheduled: number;

  /** Edits replaced by a newer edit of the same message */
  editsSuperseded: number;

  /** Automatic reports delivered */
  reportsSent: number;

  /** Channel resets performed */
  resets: number;

  /** Persistence flushes completed */
  flushCount: number;

  /** Last successful flush */
  lastFlushAt?: Date;

  /** Errors encountered */
  errorCount: number;

  /** Edits currently waiting for their quiet window */
  pendingEdits: number;

  /** Channels with a live auto-report task */
  activeAutoReports: number;

  /** Channels with a live controller */
  channels: number;
}
