type Dispatch = (label: string, task: () => void) => void;

interface Entry {
  handle: ReturnType<typeof setTimeout>;
  generation: number;
}

/**
 * One-shot timers keyed by name. Expiry is re-dispatched through `dispatch`
 * (the engine's serial queue); a timer cancelled or replaced after it fired
 * but before its task ran does not run its task.
 */
export class KeyedTimers {
  private readonly entries = new Map<string, Entry>();
  private generation = 0;

  constructor(private readonly dispatch: Dispatch) {}

  set(key: string, delayMs: number, task: () => void): void {
    this.cancel(key);
    this.generation += 1;
    const generation = this.generation;
    const handle = setTimeout(() => {
      this.dispatch(`timer:${key}`, () => {
        if (this.entries.get(key)?.generation !== generation) {
          return;
        }
        this.entries.delete(key);
        task();
      });
    }, delayMs);
    this.entries.set(key, { handle, generation });
  }

  /** Idempotent; returns whether a live timer was cancelled. */
  cancel(key: string): boolean {
    const entry = this.entries.get(key);
    if (!entry) {
      return false;
    }
    clearTimeout(entry.handle);
    this.entries.delete(key);
    return true;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  cancelMatching(prefix: string): void {
    for (const key of Array.from(this.entries.keys())) {
      if (key.startsWith(prefix)) {
        this.cancel(key);
      }
    }
  }

  cancelAll(): void {
    for (const entry of this.entries.values()) {
      clearTimeout(entry.handle);
    }
    this.entries.clear();
  }
}
