export { TallyEngine } from './engine';
export type { ResetSummary } from './engine';
export { CounterStore } from './counter-store';
export { DedupLedger } from './dedup-ledger';
export { EditDebouncer, EditSlot } from './edit-debouncer';
export type { EditDebouncerOptions, EditHandler, EventId } from './edit-debouncer';
export {
  AutoReportTask,
  validateInterval,
  MIN_INTERVAL_MINUTES,
  MAX_INTERVAL_MINUTES,
} from './auto-report';
export type { AutoReportOptions } from './auto-report';
export { ChannelController } from './channel-controller';
export type { ChannelControllerOptions, ShutdownSummary } from './channel-controller';
export { processEvent } from './processor';
export type { ProcessOutcome, ProcessorDeps, RejectReason } from './processor';
export { extractSuits, findSequence, hasConfirmation, DEFAULT_CONFIRMATION_MARKERS } from './extract';
export { renderCounts, renderReport, formatUtcPlusOne } from './render';
export { ChangeLog, mergeChanges } from './change-log';
export type { LedgerChange } from './change-log';
export { SUITS, SUIT_GLYPHS, SUIT_NAMES, emptyCounts } from './suits';
export { ValidationError } from './errors';

// Re-export types consumers need
export type {
  ChannelId,
  Suit,
  SuitCounts,
  SuitTally,
  SequenceKey,
  Extractor,
  ReplySink,
  DisplayStyle,
  TallyEvent,
  EngineConfig,
  EngineStats,
  StateChange,
  ChannelChange,
  PersistedChannelState,
  IStateProvider,
} from '@suit-tally/types';
