/**
 * Delayed-task queue keyed by chat id, driven by one timer.
 *
 * Scheduling a key that is already queued keeps the later due time, so each
 * chat has at most one pending task no matter how often it is re-armed.
 */

interface ScheduledTask {
  dueAt: number;
  run: () => void;
}

export class ReleaseScheduler {
  private tasks: Map<string, ScheduledTask> = new Map();
  private timer?: ReturnType<typeof setTimeout>;
  private timerDueAt?: number;
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  get pending(): number {
    return this.tasks.size;
  }

  schedule(key: string, dueAt: number, run: () => void): void {
    const existing = this.tasks.get(key);
    this.tasks.set(key, {
      dueAt: existing ? Math.max(existing.dueAt, dueAt) : dueAt,
      run,
    });
    this.arm();
  }

  /** Stops the timer and forgets every task. Only used on shutdown. */
  dispose(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
    this.timerDueAt = undefined;
    this.tasks.clear();
  }

  private nextDueAt(): number | undefined {
    let next: number | undefined;
    for (const task of this.tasks.values()) {
      if (next === undefined || task.dueAt < next) next = task.dueAt;
    }
    return next;
  }

  private arm(): void {
    const dueAt = this.nextDueAt();
    if (dueAt === undefined) {
      if (this.timer) clearTimeout(this.timer);
      this.timer = undefined;
      this.timerDueAt = undefined;
      return;
    }
    if (this.timer && this.timerDueAt !== undefined && this.timerDueAt <= dueAt) return;

    if (this.timer) clearTimeout(this.timer);
    this.timerDueAt = dueAt;
    this.timer = setTimeout(() => this.fire(), Math.max(0, dueAt - this.now()));
    this.timer.unref?.();
  }

  private fire(): void {
    this.timer = undefined;
    this.timerDueAt = undefined;
    const now = this.now();
    const due: ScheduledTask[] = [];
    for (const [key, task] of this.tasks) {
      if (task.dueAt <= now) {
        due.push(task);
        this.tasks.delete(key);
      }
    }
    for (const task of due) {
      try {
        task.run();
      } catch (error) {
        console.error('[release-scheduler] task failed:', error);
      }
    }
    this.arm();
  }
}
