import { ReleaseScheduler } from './release-scheduler.js';

export interface ChatCircuitBreakerOptions {
  defaultDurationMs: number;
  now?: () => number;
  scheduler?: ReleaseScheduler;
}

/**
 * Per-chat kill switch for stateful actions.
 *
 * A trip always ends on its own: the release is queued on the scheduler at
 * trip time and there is no public unlock. Releasing an already open chat
 * is a no-op, so a release that fires after `resetAll()` changes nothing.
 */
export class ChatCircuitBreaker {
  private lockedUntilByChat: Map<string, number> = new Map();
  private readonly scheduler: ReleaseScheduler;
  private readonly now: () => number;
  private readonly defaultDurationMs: number;

  constructor(options: ChatCircuitBreakerOptions) {
    this.now = options.now || Date.now;
    this.scheduler = options.scheduler || new ReleaseScheduler(this.now);
    this.defaultDurationMs = options.defaultDurationMs;
  }

  trip(chatId: string, durationMs: number = this.defaultDurationMs): void {
    const duration = Number.isFinite(durationMs) && durationMs > 0 ? durationMs : this.defaultDurationMs;
    const until = this.now() + duration;
    const lockedUntil = Math.max(this.lockedUntilByChat.get(chatId) ?? 0, until);
    this.lockedUntilByChat.set(chatId, lockedUntil);
    console.warn(`[breaker] chat ${chatId} locked for ${duration}ms`);
    this.scheduler.schedule(chatId, lockedUntil, () => this.release(chatId));
  }

  isLocked(chatId: string): boolean {
    const lockedUntil = this.lockedUntilByChat.get(chatId);
    if (lockedUntil === undefined) return false;
    return this.now() < lockedUntil;
  }

  activeLocks(): number {
    const now = this.now();
    let count = 0;
    for (const lockedUntil of this.lockedUntilByChat.values()) {
      if (now < lockedUntil) count += 1;
    }
    return count;
  }

  resetAll(): void {
    this.lockedUntilByChat.clear();
  }

  dispose(): void {
    this.scheduler.dispose();
    this.lockedUntilByChat.clear();
  }

  private release(chatId: string): void {
    const lockedUntil = this.lockedUntilByChat.get(chatId);
    if (lockedUntil === undefined) return;
    if (this.now() < lockedUntil) {
      this.scheduler.schedule(chatId, lockedUntil, () => this.release(chatId));
      return;
    }
    this.lockedUntilByChat.delete(chatId);
    console.log(`[breaker] chat ${chatId} released`);
  }
}
