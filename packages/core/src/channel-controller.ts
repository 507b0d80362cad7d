import type { ChannelId } from '@suit-tally/types';
import { AutoReportTask, validateInterval } from './auto-report';
import { EditDebouncer, type EventId } from './edit-debouncer';

export interface ChannelControllerOptions {
  quietMs: number;
  onEdit: (channel: ChannelId, text: string, eventId: EventId) => Promise<unknown>;
  onEditError: (err: unknown, channel: ChannelId, eventId: EventId) => void;
  runReportCycle: (channel: ChannelId) => Promise<void>;
  onReportError: (err: unknown, channel: ChannelId) => void;
}

export interface ShutdownSummary {
  editsCancelled: number;
  autoReportCancelled: boolean;
}

/**
 * Owns the timers of one channel: its pending edits and its auto-report
 * task. `shutdown()` cancels all of them in one call.
 */
export class ChannelController {
  readonly channel: ChannelId;
  readonly edits: EditDebouncer;
  private autoReport: AutoReportTask | null = null;
  private readonly options: ChannelControllerOptions;

  constructor(channel: ChannelId, options: ChannelControllerOptions) {
    this.channel = channel;
    this.options = options;
    this.edits = new EditDebouncer({
      quietMs: options.quietMs,
      onFire: (text, eventId) => options.onEdit(channel, text, eventId),
      onError: (err, eventId) => options.onEditError(err, channel, eventId),
    });
  }

  /** Replace the auto-report task. Throws before touching the old task if the interval is invalid. */
  configureAutoReport(intervalMinutes: number): AutoReportTask {
    validateInterval(intervalMinutes);
    this.autoReport?.cancel();
    const task = new AutoReportTask({
      channel: this.channel,
      intervalMinutes,
      runCycle: this.options.runReportCycle,
      onError: this.options.onReportError,
    });
    this.autoReport = task;
    task.start();
    return task;
  }

  /** Returns false when no task was running. */
  cancelAutoReport(): boolean {
    const task = this.autoReport;
    this.autoReport = null;
    if (!task) return false;
    task.cancel();
    return true;
  }

  get autoReportInterval(): number | null {
    return this.autoReport?.intervalMinutes ?? null;
  }

  /** True when nothing is scheduled. */
  get idle(): boolean {
    return this.autoReport === null && this.edits.pending === 0;
  }

  shutdown(): ShutdownSummary {
    return {
      autoReportCancelled: this.cancelAutoReport(),
      editsCancelled: this.edits.cancelAll(),
    };
  }
}
