import type { ChannelId } from '@suit-tally/types';
import { ValidationError } from './errors';

export const MIN_INTERVAL_MINUTES = 5;
export const MAX_INTERVAL_MINUTES = 32;

const MS_PER_MINUTE = 60_000;

export function validateInterval(minutes: number): number {
  if (!Number.isInteger(minutes) || minutes < MIN_INTERVAL_MINUTES || minutes > MAX_INTERVAL_MINUTES) {
    throw new ValidationError(
      'intervalMinutes',
      `Interval must be between ${MIN_INTERVAL_MINUTES} and ${MAX_INTERVAL_MINUTES} minutes, got ${minutes}`
    );
  }
  return minutes;
}

export interface AutoReportOptions {
  channel: ChannelId;
  intervalMinutes: number;
  /** One report cycle. A rejection is reported and the loop keeps going. */
  runCycle: (channel: ChannelId) => Promise<void>;
  onError: (err: unknown, channel: ChannelId) => void;
}

/**
 * Recurring report loop for one channel: sleep, run a cycle, repeat.
 * Cancellation takes effect at the sleep; a cycle already running finishes.
 */
export class AutoReportTask {
  readonly channel: ChannelId;
  readonly intervalMinutes: number;
  private readonly runCycle: AutoReportOptions['runCycle'];
  private readonly onError: AutoReportOptions['onError'];
  private timer: ReturnType<typeof setTimeout> | null = null;
  private cancelled = false;
  private cycles = 0;

  constructor(options: AutoReportOptions) {
    this.channel = options.channel;
    this.intervalMinutes = validateInterval(options.intervalMinutes);
    this.runCycle = options.runCycle;
    this.onError = options.onError;
  }

  start(): void {
    if (this.timer || this.cancelled) return;
    this.scheduleNext();
  }

  /** Synchronous and idempotent. */
  cancel(): void {
    this.cancelled = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  get active(): boolean {
    return !this.cancelled;
  }

  /** Cycles completed without error. */
  get cycleCount(): number {
    return this.cycles;
  }

  private scheduleNext(): void {
    if (this.cancelled) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, this.intervalMinutes * MS_PER_MINUTE);
  }

  private async tick(): Promise<void> {
    if (this.cancelled) return;
    try {
      await this.runCycle(this.channel);
      this.cycles++;
    } catch (err) {
      this.onError(err, this.channel);
    }
    this.scheduleNext();
  }
}
