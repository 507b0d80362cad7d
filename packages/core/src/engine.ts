import { EventEmitter } from 'events';
import type {
  ChannelChange,
  ChannelId,
  EngineConfig,
  EngineStats,
  IStateProvider,
  ReplySink,
  StateChange,
  SuitCounts,
  TallyEvent,
} from '@suit-tally/types';
import { validateInterval } from './auto-report';
import { ChangeLog } from './change-log';
import { ChannelController } from './channel-controller';
import { CounterStore } from './counter-store';
import { DedupLedger } from './dedup-ledger';
import type { EventId } from './edit-debouncer';
import { DEFAULT_CONFIRMATION_MARKERS, extractSuits } from './extract';
import { processEvent, type ProcessOutcome, type ProcessorDeps } from './processor';
import { renderReport } from './render';

const DEFAULTS = {
  QUIET_MS: 3000,
  DISPLAY_STYLE: 1,
  FLUSH_INTERVAL_MS: 1000,
} as const;

export interface ResetSummary {
  channel: ChannelId;
  autoReportCancelled: boolean;
  editsCancelled: number;
  ledgerKeysPurged: number;
  /** Counts held just before the reset */
  counts: SuitCounts;
}

type MutableStats = Omit<EngineStats, 'pendingEdits' | 'activeAutoReports' | 'channels'>;

/**
 * Core tally engine.
 *
 * Routes inbound events through the counting pipeline, debounces edits,
 * runs per-channel auto-report loops and resets channels. When a provider
 * is configured, state changes are folded in memory and flushed to it on
 * a timer; memory stays authoritative.
 */
export class TallyEngine extends EventEmitter {
  private readonly store: CounterStore;
  private readonly ledger: DedupLedger;
  private readonly changes = new ChangeLog();
  private readonly controllers = new Map<ChannelId, ChannelController>();
  private readonly processor: ProcessorDeps;
  private readonly reply: ReplySink;
  private readonly provider?: IStateProvider;
  private readonly quietMs: number;
  private readonly purgeLedgerOnReport: boolean;
  private readonly flushIntervalMs: number;
  private readonly now: () => Date;
  private running = false;
  private flushing: Promise<void> | null = null;
  private flushTimer: ReturnType<typeof setTimeout> | null = null;

  private stats: MutableStats = {
    eventsReceived: 0,
    eventsCounted: 0,
    eventsRejected: 0,
    duplicatesRejected: 0,
    editsScheduled: 0,
    editsSuperseded: 0,
    reportsSent: 0,
    resets: 0,
    flushCount: 0,
    lastFlushAt: undefined,
    errorCount: 0,
  };

  constructor(config: EngineConfig) {
    super();
    this.reply = config.reply;
    this.provider = config.provider;
    this.quietMs = config.debounce?.quietMs ?? DEFAULTS.QUIET_MS;
    this.purgeLedgerOnReport = config.autoReport?.purgeLedger ?? false;
    this.flushIntervalMs = config.persistence?.flushIntervalMs ?? DEFAULTS.FLUSH_INTERVAL_MS;
    this.now = config.now ?? (() => new Date());

    const record = config.provider ? (change: StateChange) => this.changes.add(change) : undefined;
    this.store = new CounterStore(record);
    this.ledger = new DedupLedger(record);

    this.processor = {
      store: this.store,
      ledger: this.ledger,
      extract: config.extract ?? extractSuits,
      confirmationMarkers: config.processing?.confirmationMarkers ?? DEFAULT_CONFIRMATION_MARKERS,
      displayStyle: config.processing?.displayStyle ?? DEFAULTS.DISPLAY_STYLE,
    };
  }

  /**
   * Restore persisted state and start the flush timer.
   * Rejects when the provider cannot be initialized or read.
   */
  async start(): Promise<void> {
    if (this.running) return;

    if (this.provider) {
      if (this.provider.initialize) {
        await this.provider.initialize();
      }
      await this.restore(this.provider);
    }

    this.running = true;
    this.emit('started');
    this.scheduleFlush();
  }

  /** Cancel every live task, flush what is left and close the provider. */
  async stop(): Promise<void> {
    this.running = false;

    for (const controller of this.controllers.values()) {
      controller.shutdown();
    }
    this.controllers.clear();

    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }

    if (this.flushing) {
      await this.flushing;
    }
    await this.flush();

    if (this.provider?.close) {
      await this.provider.close();
    }

    this.emit('stopped');
  }

  /**
   * Accept one inbound event. Edits are queued behind the quiet window and
   * resolve to null; other events are processed now and their outcome returned.
   */
  async handle(event: TallyEvent): Promise<ProcessOutcome | null> {
    this.stats.eventsReceived++;

    if (event.isEdit) {
      const superseded = this.controller(event.channel).edits.schedule(event.eventId, event.text);
      this.stats.editsScheduled++;
      if (superseded) this.stats.editsSuperseded++;
      this.emit('edit-scheduled', { channel: event.channel, eventId: event.eventId, superseded });
      return null;
    }

    return this.processAndReply(event.channel, event.text);
  }

  /**
   * Clear a channel: stop its auto-report, drop its pending edits, purge
   * its ledger and zero its counters. Runs without yielding, so no edit
   * can fire part-way through and re-mark a purged sequence.
   */
  reset(channel: ChannelId): ResetSummary {
    const controller = this.controllers.get(channel);
    this.controllers.delete(channel);
    const { autoReportCancelled, editsCancelled } = controller?.shutdown() ?? {
      autoReportCancelled: false,
      editsCancelled: 0,
    };
    const ledgerKeysPurged = this.ledger.purge(channel);
    const counts = this.store.snapshotAndReset(channel);

    this.stats.resets++;
    const summary: ResetSummary = { channel, autoReportCancelled, editsCancelled, ledgerKeysPurged, counts };
    this.emit('reset', summary);
    return summary;
  }

  /** Start or replace the channel's auto-report loop. Throws ValidationError for a bad interval. */
  configureAutoReport(channel: ChannelId, intervalMinutes: number): void {
    validateInterval(intervalMinutes);
    this.controller(channel).configureAutoReport(intervalMinutes);
    this.emit('auto-report-configured', { channel, intervalMinutes });
  }

  /** Idempotent: returns false when the channel had no auto-report. */
  cancelAutoReport(channel: ChannelId): boolean {
    const controller = this.controllers.get(channel);
    if (!controller) return false;
    const cancelled = controller.cancelAutoReport();
    this.releaseIfIdle(channel);
    if (cancelled) this.emit('auto-report-cancelled', { channel });
    return cancelled;
  }

  getAutoReportInterval(channel: ChannelId): number | null {
    return this.controllers.get(channel)?.autoReportInterval ?? null;
  }

  hasPendingEdit(channel: ChannelId, eventId: EventId): boolean {
    return this.controllers.get(channel)?.edits.has(eventId) ?? false;
  }

  /** Current counts for a channel. */
  get(channel: ChannelId): SuitCounts {
    return this.store.get(channel);
  }

  getStats(): Readonly<EngineStats> {
    let pendingEdits = 0;
    let activeAutoReports = 0;
    for (const controller of this.controllers.values()) {
      pendingEdits += controller.edits.pending;
      if (controller.autoReportInterval !== null) activeAutoReports++;
    }
    return { ...this.stats, pendingEdits, activeAutoReports, channels: this.controllers.size };
  }

  // ─── Internal ────────────────────────────────────────────────────────────

  private controller(channel: ChannelId): ChannelController {
    let controller = this.controllers.get(channel);
    if (!controller) {
      controller = new ChannelController(channel, {
        quietMs: this.quietMs,
        onEdit: (ch, text, eventId) => {
          this.emit('edit-fired', { channel: ch, eventId });
          this.releaseIfIdle(ch);
          return this.processAndReply(ch, text);
        },
        onEditError: (err, ch, eventId) => this.fail(err, { channel: ch, eventId, stage: 'edit' }),
        runReportCycle: (ch) => this.runReportCycle(ch),
        onReportError: (err, ch) => this.fail(err, { channel: ch, stage: 'auto-report' }),
      });
      this.controllers.set(channel, controller);
    }
    return controller;
  }

  private releaseIfIdle(channel: ChannelId): void {
    if (this.controllers.get(channel)?.idle) {
      this.controllers.delete(channel);
    }
  }

  private async processAndReply(channel: ChannelId, text: string): Promise<ProcessOutcome | null> {
    let outcome: ProcessOutcome;
    try {
      outcome = processEvent(this.processor, channel, text);
    } catch (err) {
      this.fail(err, { channel, stage: 'process' });
      return null;
    }

    if (outcome.status === 'rejected') {
      this.stats.eventsRejected++;
      if (outcome.reason === 'duplicate') this.stats.duplicatesRejected++;
      this.emit('rejected', outcome);
      return outcome;
    }

    this.stats.eventsCounted++;
    this.emit('processed', outcome);

    // State is not rolled back when delivery fails.
    try {
      await this.reply(channel, outcome.response);
    } catch (err) {
      this.fail(err, { channel, stage: 'reply' });
    }
    return outcome;
  }

  private async runReportCycle(channel: ChannelId): Promise<void> {
    const counts = this.store.snapshotAndReset(channel);
    if (this.purgeLedgerOnReport) {
      this.ledger.purge(channel);
    }
    await this.reply(channel, renderReport(counts, this.now()));
    this.stats.reportsSent++;
    this.emit('report', { channel, counts });
  }

  /** Counts and emits an error. Never throws, since timers call it. */
  private fail(err: unknown, context: Record<string, unknown>): void {
    this.stats.errorCount++;
    if (this.listenerCount('error') > 0) {
      this.emit('error', err, context);
    }
  }

  private async restore(provider: IStateProvider): Promise<void> {
    const state = await provider.load();
    for (const [channel, { counts, sequences }] of state) {
      this.store.restore(channel, counts);
      this.ledger.restore(channel, sequences);
    }
    this.emit('restored', { channelCount: state.size });
  }

  private scheduleFlush(): void {
    if (!this.running || !this.provider) return;

    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      void this.flush().then(() => this.scheduleFlush());
    }, this.flushIntervalMs);
  }

  /**
   * Flush folded changes to the provider.
   * Uses a mutex so the timer and stop() never flush concurrently.
   */
  private async flush(): Promise<void> {
    if (this.flushing) {
      await this.flushing;
      return;
    }

    if (!this.provider || this.changes.channelCount === 0) return;

    this.flushing = this.doFlush(this.provider);
    try {
      await this.flushing;
    } finally {
      this.flushing = null;
    }
  }

  private async doFlush(provider: IStateProvider): Promise<void> {
    const batch: Map<ChannelId, ChannelChange> = this.changes.drain((channel) => this.store.get(channel));

    try {
      await provider.flush(batch);
      this.stats.flushCount++;
      this.stats.lastFlushAt = new Date();
      this.emit('flush', { channelCount: batch.size, flushNumber: this.stats.flushCount });
    } catch (err) {
      this.fail(err, { stage: 'flush', channelCount: batch.size });
      // Kept for the next flush, ahead of anything recorded meanwhile.
      this.changes.requeue(batch);
    }
  }
}
