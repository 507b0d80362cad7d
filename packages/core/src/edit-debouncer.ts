export type EventId = string | number;

/** Called once with the text of the last edit in a burst. */
export type EditHandler = (text: string, eventId: EventId) => Promise<unknown> | void;

export interface EditDebouncerOptions {
  /** Quiet window in ms. */
  quietMs: number;
  onFire: EditHandler;
  onError: (err: unknown, eventId: EventId) => void;
}

type SlotState = 'pending' | 'fired' | 'cancelled';

/**
 * One pending edit. Owns its timer; once cancelled it can never fire,
 * even if the timer callback was already queued.
 */
export class EditSlot {
  readonly eventId: EventId;
  readonly text: string;
  private state: SlotState = 'pending';
  private timer: ReturnType<typeof setTimeout> | null;

  constructor(eventId: EventId, text: string, quietMs: number, onExpire: (slot: EditSlot) => void) {
    this.eventId = eventId;
    this.text = text;
    this.timer = setTimeout(() => {
      this.timer = null;
      if (this.state !== 'pending') return;
      this.state = 'fired';
      onExpire(this);
    }, quietMs);
  }

  get live(): boolean {
    return this.state === 'pending';
  }

  /** Returns false when the slot had already fired or been cancelled. */
  cancel(): boolean {
    if (this.state !== 'pending') return false;
    this.state = 'cancelled';
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    return true;
  }
}

/**
 * Debounces edits of the same message: each edit replaces the pending one
 * and restarts the quiet window, so only the final text is processed.
 */
export class EditDebouncer {
  private slots = new Map<string, EditSlot>();
  private readonly options: EditDebouncerOptions;

  constructor(options: EditDebouncerOptions) {
    this.options = options;
  }

  /**
   * Queue `text` for `eventId`, replacing any pending edit of the same id.
   * Returns true when a pending edit was superseded.
   */
  schedule(eventId: EventId, text: string): boolean {
    const key = String(eventId);
    const superseded = this.slots.get(key)?.cancel() ?? false;
    this.slots.set(key, new EditSlot(eventId, text, this.options.quietMs, (slot) => this.fire(key, slot)));
    return superseded;
  }

  cancel(eventId: EventId): boolean {
    const key = String(eventId);
    const slot = this.slots.get(key);
    if (!slot) return false;
    this.slots.delete(key);
    return slot.cancel();
  }

  /** Cancel every pending edit without processing it. Returns how many were cancelled. */
  cancelAll(): number {
    let cancelled = 0;
    for (const slot of this.slots.values()) {
      if (slot.cancel()) cancelled++;
    }
    this.slots.clear();
    return cancelled;
  }

  has(eventId: EventId): boolean {
    return this.slots.get(String(eventId))?.live ?? false;
  }

  get pending(): number {
    return this.slots.size;
  }

  private fire(key: string, slot: EditSlot): void {
    if (this.slots.get(key) === slot) {
      this.slots.delete(key);
    }
    void this.run(slot);
  }

  private async run(slot: EditSlot): Promise<void> {
    try {
      await this.options.onFire(slot.text, slot.eventId);
    } catch (err) {
      this.options.onError(err, slot.eventId);
    }
  }
}
