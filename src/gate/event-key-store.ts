/**
 * Sliding-window de-duplication keys.
 *
 * Keys live in insertion order (refreshing a key moves it to the end), so both
 * the age sweep and the capacity trim only ever look at the oldest entries.
 */

export interface EventKeyStoreOptions {
  maxTrackedKeys: number;
  maxKeyAgeMs: number;
  now?: () => number;
}

export class EventKeyStore {
  private entries: Map<string, number> = new Map();
  private readonly maxTrackedKeys: number;
  private readonly maxKeyAgeMs: number;
  private readonly now: () => number;

  constructor(options: EventKeyStoreOptions) {
    this.maxTrackedKeys = Math.max(1, Math.trunc(options.maxTrackedKeys));
    this.maxKeyAgeMs = Math.max(0, options.maxKeyAgeMs);
    this.now = options.now || Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Returns whether `key` is already tracked. An untracked key is recorded as a side effect.
   */
  seen(key: string): boolean {
    this.prune();
    if (this.entries.has(key)) return true;
    this.entries.set(key, this.now());
    this.prune();
    return false;
  }

  lastSeen(key: string): number | undefined {
    const at = this.entries.get(key);
    if (at === undefined) return undefined;
    if (this.now() - at > this.maxKeyAgeMs) {
      this.entries.delete(key);
      return undefined;
    }
    return at;
  }

  /** Records `key` at `at`, or refreshes it if already tracked. */
  mark(key: string, at: number = this.now()): void {
    this.entries.delete(key);
    this.entries.set(key, at);
    this.prune();
  }

  prune(): void {
    const cutoff = this.now() - this.maxKeyAgeMs;
    for (const [key, at] of this.entries) {
      if (at >= cutoff) break;
      this.entries.delete(key);
    }
    while (this.entries.size > this.maxTrackedKeys) {
      const oldest = this.entries.keys().next();
      if (oldest.done) return;
      this.entries.delete(oldest.value);
    }
  }

  clear(): void {
    this.entries.clear();
  }
}
