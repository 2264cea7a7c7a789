import type { LeaseConfig, LeaseStore } from '../types/index.js';
import { FileLeaseStore } from './file-lease-store.js';
import { SqliteLeaseStore } from './sqlite-lease-store.js';

export { MemoryLeaseStore, leasesEqual, parseLease } from './lease-store.js';
export { FileLeaseStore } from './file-lease-store.js';
export { SqliteLeaseStore } from './sqlite-lease-store.js';
export { SingleInstanceCoordinator } from './coordinator.js';
export type { LeaseLostHandler, SingleInstanceCoordinatorOptions, WaitForLeaseOptions } from './coordinator.js';

export function createLeaseStore(config: Pick<LeaseConfig, 'store' | 'path'>): LeaseStore {
  switch (config.store) {
    case 'sqlite':
      return new SqliteLeaseStore(config.path);
    case 'file':
      return new FileLeaseStore(config.path);
  }
}
