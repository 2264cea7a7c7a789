import type { InstanceLease, LeaseStore } from '../types/index.js';

export function leasesEqual(a: InstanceLease | undefined, b: InstanceLease | undefined): boolean {
  if (!a || !b) return a === b;
  return (
    a.ownerId === b.ownerId &&
    a.acquiredAt === b.acquiredAt &&
    a.heartbeatAt === b.heartbeatAt &&
    a.expiresAt === b.expiresAt
  );
}

/**
 * Validates a lease read back from shared storage. Anything that does not
 * look like a lease is treated as absent.
 */
export function parseLease(raw: unknown): InstanceLease | undefined {
  if (!raw || typeof raw !== 'object') return undefined;
  const field = (name: string): unknown => Reflect.get(raw, name);
  const ownerId = field('ownerId');
  const acquiredAt = field('acquiredAt');
  const heartbeatAt = field('heartbeatAt');
  const expiresAt = field('expiresAt');
  if (typeof ownerId !== 'string' || ownerId.length === 0) return undefined;
  if (typeof acquiredAt !== 'number' || !Number.isFinite(acquiredAt)) return undefined;
  if (typeof heartbeatAt !== 'number' || !Number.isFinite(heartbeatAt)) return undefined;
  if (typeof expiresAt !== 'number' || !Number.isFinite(expiresAt)) return undefined;
  return { ownerId, acquiredAt, heartbeatAt, expiresAt };
}

export class MemoryLeaseStore implements LeaseStore {
  private lease?: InstanceLease;

  async read(): Promise<InstanceLease | undefined> {
    return this.lease ? { ...this.lease } : undefined;
  }

  async compareAndSwap(expected: InstanceLease | undefined, next: InstanceLease | undefined): Promise<boolean> {
    if (!leasesEqual(this.lease, expected)) return false;
    this.lease = next ? { ...next } : undefined;
    return true;
  }
}
