/**
 * Wires configuration, leader election, the event source, the admission gate
 * and the optional status server into one running bot.
 */

import { hostname } from 'os';
import { randomUUID } from 'crypto';
import type { ChatGateConfig, EventSource, InstanceLease, LeaseStore, UpdateHandler } from '../types/index.js';
import { AdmissionGate } from '../gate/admission-gate.js';
import { NavigationTracker } from '../navigation/navigation-tracker.js';
import { createLeaseStore } from '../instance/index.js';
import { SingleInstanceCoordinator } from '../instance/coordinator.js';
import { UpdatePoller } from '../bridge/update-poller.js';
import { StatusServer } from '../bridge/status-server.js';

export interface BotRuntimeDeps {
  config: ChatGateConfig;
  source: EventSource;
  handler: UpdateHandler;
  ownerId?: string;
  leaseStore?: LeaseStore;
  now?: () => number;
}

export type BotRuntimeStartResult =
  | { status: 'running'; ownerId: string; statusPort?: number }
  | { status: 'not-leader'; ownerId: string; holder?: InstanceLease };

export function createOwnerId(): string {
  return `${hostname()}-${process.pid}-${randomUUID().slice(0, 8)}`;
}

export class BotRuntime {
  readonly ownerId: string;
  readonly gate: AdmissionGate;
  readonly coordinator: SingleInstanceCoordinator;
  readonly poller: UpdatePoller;
  private readonly store: LeaseStore;
  private statusServer?: StatusServer;
  private stopping?: Promise<void>;
  private stoppedResolve?: () => void;
  private readonly stopped: Promise<void>;

  constructor(private deps: BotRuntimeDeps) {
    const { config } = deps;
    const now = deps.now || Date.now;
    this.ownerId = deps.ownerId || createOwnerId();
    this.store = deps.leaseStore || createLeaseStore(config.lease);
    this.coordinator = new SingleInstanceCoordinator({
      store: this.store,
      ttlMs: config.lease.ttlMs,
      heartbeatIntervalMs: config.lease.heartbeatIntervalMs,
      ioTimeoutMs: config.lease.ioTimeoutMs,
      now,
    });
    this.gate = new AdmissionGate({
      config: config.gate,
      navigation: new NavigationTracker(config.navigation, now),
      now,
    });
    this.poller = new UpdatePoller({ source: deps.source, gate: this.gate, handler: deps.handler });
    this.stopped = new Promise<void>((resolve) => {
      this.stoppedResolve = resolve;
    });
  }

  /**
   * Waits for the poller lease, then starts polling. A second instance that
   * cannot get the lease within the startup timeout returns `not-leader`
   * without touching the platform.
   */
  async start(): Promise<BotRuntimeStartResult> {
    const { lease, statusPort } = this.deps.config;
    console.log(`[runtime] ${this.ownerId} waiting for poller lease (${lease.store} store at ${lease.path})`);

    const acquired = await this.coordinator.waitForLease(this.ownerId, { timeoutMs: lease.startupTimeoutMs });
    if (!acquired) {
      const holder = await this.coordinator.current();
      console.warn(`[runtime] another instance is polling (${holder?.ownerId ?? 'unknown owner'}); exiting`);
      this.closeStore();
      this.stoppedResolve?.();
      return { status: 'not-leader', ownerId: this.ownerId, holder };
    }

    this.coordinator.startHeartbeat(this.ownerId, (reason) => {
      console.error(`[runtime] ${reason}; stopping poller`);
      void this.stop('lease lost');
    });

    try {
      await this.deps.source.start();
    } catch (error) {
      await this.stop('event source failed to start');
      throw error;
    }
    this.poller.start();

    let boundPort: number | undefined;
    if (statusPort > 0) {
      this.statusServer = new StatusServer({
        port: statusPort,
        ownerId: this.ownerId,
        metricsSnapshot: () => this.gate.metricsSnapshot(),
        resetAll: () => this.gate.resetAll(),
        pollerStats: () => this.poller.getStats(),
        currentLease: () => this.coordinator.current(),
      });
      try {
        boundPort = await this.statusServer.start();
      } catch (error) {
        console.warn(`[runtime] status server disabled: ${error instanceof Error ? error.message : String(error)}`);
        this.statusServer = undefined;
      }
    }

    return { status: 'running', ownerId: this.ownerId, statusPort: boundPort };
  }

  /** Idempotent; concurrent callers share one shutdown. */
  stop(reason: string = 'shutdown'): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown(reason);
    }
    return this.stopping;
  }

  /** Resolves once the runtime has stopped for any reason. */
  waitUntilStopped(): Promise<void> {
    return this.stopped;
  }

  private async shutdown(reason: string): Promise<void> {
    console.log(`[runtime] stopping (${reason})`);
    this.coordinator.stopHeartbeat();
    try {
      await this.poller.stop();
      await this.statusServer?.stop();
      await this.deps.source.stop();
    } catch (error) {
      console.error('[runtime] error while stopping:', error);
    } finally {
      await this.coordinator.release(this.ownerId);
      this.gate.dispose();
      this.closeStore();
      this.stoppedResolve?.();
    }
  }

  private closeStore(): void {
    try {
      this.store.close?.();
    } catch (error) {
      console.warn('[runtime] failed to close lease store:', error);
    }
  }
}

/** Stops the runtime on SIGINT/SIGTERM. Returns a function that removes the listeners. */
export function installSignalHandlers(runtime: BotRuntime): () => void {
  const shutdown = () => void runtime.stop('signal');
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
  return () => {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
  };
}
