/**
 * Seams injected into components so tests can replace the file system,
 * the process environment, and the platform transport.
 */

import type { AdmissionResult, AdmittedResult, InboundEvent, InstanceLease } from './index.js';

export interface IStorage {
  readFile(path: string, encoding: BufferEncoding): string;
  writeFile(path: string, data: string): void;
  chmod(path: string, mode: number): void;
  exists(path: string): boolean;
  mkdirp(path: string): void;
}

export interface IEnvironment {
  get(key: string): string | undefined;
  homedir(): string;
}

/**
 * Shared storage holding the instance lease.
 * `compareAndSwap` must be atomic across every process that uses the store:
 * it writes `next` (or deletes the lease when `next` is undefined) only when
 * the stored lease still equals `expected`.
 */
export interface LeaseStore {
  read(): Promise<InstanceLease | undefined>;
  compareAndSwap(expected: InstanceLease | undefined, next: InstanceLease | undefined): Promise<boolean>;
  close?(): void;
}

export interface EventSource {
  start(): Promise<void>;
  /** Resolves with buffered events, waiting up to `maxWaitMs` when none are buffered. */
  fetchBatch(maxWaitMs: number): Promise<InboundEvent[]>;
  /** Transport-level acknowledgement of a suppressed event; never a response. */
  acknowledge?(event: InboundEvent, result: AdmissionResult): Promise<void>;
  stop(): Promise<void>;
}

export type UpdateHandler = (event: InboundEvent, admission: AdmittedResult) => Promise<void>;
