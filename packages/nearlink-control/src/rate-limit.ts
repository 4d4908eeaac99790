export interface RateLimitOptions {
  maxPerWindow: number;
  windowMs: number;
}

interface WindowState {
  startMs: number;
  count: number;
}

/** Per-key fixed windows, used to bound session minting per client address. */
export class FixedWindowRateLimiter {
  private readonly windows = new Map<string, WindowState>();

  constructor(private readonly options: RateLimitOptions) {}

  allow(key: string, nowMs = Date.now()): boolean {
    const existing = this.current(key, nowMs);
    if (!existing) {
      this.windows.set(key, { startMs: nowMs, count: 1 });
      return true;
    }
    if (existing.count >= this.options.maxPerWindow) {
      return false;
    }
    existing.count += 1;
    return true;
  }

  /** Whole seconds until `key` may try again; 0 when it may now. */
  retryAfterSec(key: string, nowMs = Date.now()): number {
    const existing = this.current(key, nowMs);
    if (!existing || existing.count < this.options.maxPerWindow) {
      return 0;
    }
    return Math.max(1, Math.ceil((existing.startMs + this.options.windowMs - nowMs) / 1000));
  }

  /** Forgets windows that ended before `nowMs`; returns how many were dropped. */
  prune(nowMs = Date.now()): number {
    let dropped = 0;
    for (const [key, state] of this.windows) {
      if ((nowMs - state.startMs) >= this.options.windowMs) {
        this.windows.delete(key);
        dropped += 1;
      }
    }
    return dropped;
  }

  get size(): number {
    return this.windows.size;
  }

  private current(key: string, nowMs: number): WindowState | undefined {
    const existing = this.windows.get(key);
    if (!existing || (nowMs - existing.startMs) >= this.options.windowMs) {
      return undefined;
    }
    return existing;
  }
}
