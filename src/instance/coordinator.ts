/**
 * Leader election for the update poller.
 *
 * Only the holder of a live lease may poll the platform. The holder renews
 * the lease on its own timer; a process that crashes simply stops renewing and
 * its lease expires after `ttlMs`. Every storage call is bounded by
 * `ioTimeoutMs`, and a slow or failing store counts as "not renewed".
 */

import type { InstanceLease, LeaseStore } from '../types/index.js';
import { sleep, withTimeout } from '../infra/timeout.js';

export interface SingleInstanceCoordinatorOptions {
  store: LeaseStore;
  ttlMs: number;
  heartbeatIntervalMs: number;
  ioTimeoutMs: number;
  now?: () => number;
}

export interface WaitForLeaseOptions {
  timeoutMs: number;
  retryMs?: number;
}

export type LeaseLostHandler = (reason: string) => void;

export class SingleInstanceCoordinator {
  private readonly store: LeaseStore;
  private readonly ttlMs: number;
  private readonly heartbeatIntervalMs: number;
  private readonly ioTimeoutMs: number;
  private readonly now: () => number;
  private heartbeatTimer?: ReturnType<typeof setInterval>;
  private operationQueue: Promise<unknown> = Promise.resolve();

  constructor(options: SingleInstanceCoordinatorOptions) {
    this.store = options.store;
    this.ttlMs = options.ttlMs;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs;
    this.ioTimeoutMs = options.ioTimeoutMs;
    this.now = options.now || Date.now;
  }

  isExpired(lease: InstanceLease, at: number = this.now()): boolean {
    return at > lease.expiresAt;
  }

  async current(): Promise<InstanceLease | undefined> {
    try {
      return await withTimeout(this.store.read(), this.ioTimeoutMs, 'lease read');
    } catch (error) {
      console.error('[lease] failed to read lease:', error);
      return undefined;
    }
  }

  /**
   * Becomes the sole poller when no live lease exists. Re-acquiring a lease the
   * caller already holds renews it.
   */
  tryAcquire(ownerId: string): Promise<boolean> {
    return this.enqueue('acquire', async () => {
      const existing = await this.store.read();
      const now = this.now();
      if (existing && existing.ownerId !== ownerId && !this.isExpired(existing, now)) {
        return false;
      }
      const next: InstanceLease = {
        ownerId,
        acquiredAt: existing && existing.ownerId === ownerId ? existing.acquiredAt : now,
        heartbeatAt: now,
        expiresAt: now + this.ttlMs,
      };
      const swapped = await this.store.compareAndSwap(existing, next);
      if (swapped) {
        const previous = existing && existing.ownerId !== ownerId ? ` (took over expired lease of ${existing.ownerId})` : '';
        console.log(`[lease] ${ownerId} acquired poller lease until ${new Date(next.expiresAt).toISOString()}${previous}`);
      }
      return swapped;
    });
  }

  /** Extends the caller's lease. False means another owner holds it now. */
  heartbeat(ownerId: string): Promise<boolean> {
    return this.enqueue('heartbeat', async () => {
      const existing = await this.store.read();
      if (!existing || existing.ownerId !== ownerId) {
        console.warn(`[lease] heartbeat rejected for ${ownerId}: lease held by ${existing?.ownerId ?? 'nobody'}`);
        return false;
      }
      const now = this.now();
      if (this.isExpired(existing, now)) {
        console.warn(`[lease] heartbeat for ${ownerId} arrived after expiry`);
      }
      return this.store.compareAndSwap(existing, {
        ...existing,
        heartbeatAt: now,
        expiresAt: now + this.ttlMs,
      });
    });
  }

  release(ownerId: string): Promise<boolean> {
    return this.enqueue('release', async () => {
      const existing = await this.store.read();
      if (!existing || existing.ownerId !== ownerId) return false;
      const released = await this.store.compareAndSwap(existing, undefined);
      if (released) {
        console.log(`[lease] ${ownerId} released poller lease`);
      }
      return released;
    });
  }

  /** Retries `tryAcquire` until it succeeds or `timeoutMs` elapses. */
  async waitForLease(ownerId: string, options: WaitForLeaseOptions): Promise<boolean> {
    const retryMs = options.retryMs ?? 1000;
    const deadline = this.now() + options.timeoutMs;
    for (;;) {
      if (await this.tryAcquire(ownerId)) return true;
      const remaining = deadline - this.now();
      if (remaining <= 0) return false;
      await sleep(Math.min(retryMs, remaining));
    }
  }

  /**
   * Renews the lease every `heartbeatIntervalMs`. The first failed renewal
   * stops the timer and reports the loss once.
   */
  startHeartbeat(ownerId: string, onLost: LeaseLostHandler): void {
    this.stopHeartbeat();
    let inFlight = false;
    const timer = setInterval(() => {
      if (inFlight) return;
      inFlight = true;
      void this.heartbeat(ownerId)
        .then((renewed) => {
          if (renewed || this.heartbeatTimer !== timer) return;
          this.stopHeartbeat();
          onLost(`lease for ${ownerId} could not be renewed`);
        })
        .finally(() => {
          inFlight = false;
        });
    }, this.heartbeatIntervalMs);
    timer.unref?.();
    this.heartbeatTimer = timer;
  }

  stopHeartbeat(): void {
    if (this.heartbeatTimer) clearInterval(this.heartbeatTimer);
    this.heartbeatTimer = undefined;
  }

  private enqueue(label: string, operation: () => Promise<boolean>): Promise<boolean> {
    const run = async (): Promise<boolean> => {
      try {
        return await withTimeout(operation(), this.ioTimeoutMs, `lease ${label}`);
      } catch (error) {
        console.error(`[lease] ${label} failed:`, error);
        return false;
      }
    };
    const next = this.operationQueue.then(run, run);
    this.operationQueue = next;
    return next;
  }
}
