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
  StateChange,
  ChangeListener,
  EngineStats,
} from './core';

export type { ChannelChange, PersistedChannelState, IStateProvider } from './provider';
