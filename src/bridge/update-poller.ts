import type { AdmissionResult, EventSource, InboundEvent, UpdateHandler } from '../types/index.js';
import { AdmissionGate, normalizeChatId } from '../gate/admission-gate.js';

export interface UpdatePollerDeps {
  source: EventSource;
  gate: AdmissionGate;
  handler: UpdateHandler;
  /** How long one `fetchBatch` call may wait for events. */
  batchWaitMs?: number;
  /** Pause after a failed fetch before polling again. */
  errorBackoffMs?: number;
}

export interface UpdatePollerStats {
  running: boolean;
  batches: number;
  dispatched: number;
  inFlight: number;
  handlerErrors: number;
}

/**
 * Drains the event source batch by batch and runs one worker per event.
 * The loop never awaits workers, so a slow handler in one chat does not hold
 * back admission decisions for the others.
 */
export class UpdatePoller {
  private running = false;
  private loop?: Promise<void>;
  private inFlight: Set<Promise<void>> = new Set();
  private batches = 0;
  private dispatched = 0;
  private handlerErrors = 0;
  private readonly batchWaitMs: number;
  private readonly errorBackoffMs: number;

  constructor(private deps: UpdatePollerDeps) {
    this.batchWaitMs = deps.batchWaitMs ?? 1000;
    this.errorBackoffMs = deps.errorBackoffMs ?? 1000;
  }

  isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.loop = this.run();
  }

  /** Stops polling and waits for every in-flight worker to finish. */
  async stop(): Promise<void> {
    this.running = false;
    await this.loop;
    this.loop = undefined;
    await this.drain();
  }

  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  getStats(): UpdatePollerStats {
    return {
      running: this.running,
      batches: this.batches,
      dispatched: this.dispatched,
      inFlight: this.inFlight.size,
      handlerErrors: this.handlerErrors,
    };
  }

  /** Admits and handles one event. Exposed for sources that push instead of being polled. */
  dispatch(event: InboundEvent): Promise<void> {
    this.dispatched += 1;
    const worker = this.process(event).finally(() => {
      this.inFlight.delete(worker);
    });
    this.inFlight.add(worker);
    return worker;
  }

  private async run(): Promise<void> {
    console.log('[poller] polling started');
    while (this.running) {
      let batch: InboundEvent[];
      try {
        batch = await this.deps.source.fetchBatch(this.batchWaitMs);
      } catch (error) {
        console.error('[poller] failed to fetch updates:', error);
        await new Promise((resolve) => setTimeout(resolve, this.errorBackoffMs));
        continue;
      }
      if (batch.length === 0) continue;
      this.batches += 1;
      for (const event of batch) {
        void this.dispatch(event);
      }
    }
    console.log('[poller] polling stopped');
  }

  private async process(event: InboundEvent): Promise<void> {
    const admission = this.deps.gate.admit(event);
    if (!admission.admitted) {
      await this.acknowledge(event, admission);
      return;
    }

    try {
      await this.deps.handler(event, admission);
    } catch (error) {
      this.handlerErrors += 1;
      console.error(`[poller] handler failed for ${event.kind} "${event.payload.slice(0, 30)}" in chat ${event.chatId}:`, error);
      this.deps.gate.navigation.resetSession(normalizeChatId(event.chatId));
    }
  }

  private async acknowledge(event: InboundEvent, admission: AdmissionResult): Promise<void> {
    if (typeof this.deps.source.acknowledge !== 'function') return;
    try {
      await this.deps.source.acknowledge(event, admission);
    } catch (error) {
      console.warn(`[poller] failed to acknowledge suppressed event ${event.eventId}:`, error);
    }
  }
}
