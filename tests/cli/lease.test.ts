import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { clearLease, leaseCommand } from '../../src/cli/commands/lease.js';
import { FileLeaseStore } from '../../src/instance/file-lease-store.js';
import { MemoryLeaseStore } from '../../src/instance/lease-store.js';
import type { InstanceLease, LeaseConfig } from '../../src/types/index.js';

const lease: InstanceLease = { ownerId: 'host-1-a', acquiredAt: 1000, heartbeatAt: 1000, expiresAt: 10_000 };

describe('clearLease', () => {
  let store: MemoryLeaseStore;

  beforeEach(async () => {
    store = new MemoryLeaseStore();
  });

  it('reports a missing lease', async () => {
    expect(await clearLease(store, false, 5000)).toBe('absent');
  });

  it('leaves a live lease alone without force', async () => {
    await store.compareAndSwap(undefined, lease);

    expect(await clearLease(store, false, 10_000)).toBe('live');
    expect(await store.read()).toEqual(lease);
  });

  it('clears an expired lease', async () => {
    await store.compareAndSwap(undefined, lease);

    expect(await clearLease(store, false, 10_001)).toBe('cleared');
    expect(await store.read()).toBeUndefined();
  });

  it('clears a live lease with force', async () => {
    await store.compareAndSwap(undefined, lease);

    expect(await clearLease(store, true, 5000)).toBe('cleared');
    expect(await store.read()).toBeUndefined();
  });

  it('reports a lease that changed underneath', async () => {
    await store.compareAndSwap(undefined, lease);
    vi.spyOn(store, 'compareAndSwap').mockResolvedValueOnce(false);

    expect(await clearLease(store, true, 5000)).toBe('conflict');
  });
});

describe('leaseCommand', () => {
  let dir: string;
  let leaseConfig: LeaseConfig;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'chatgate-cli-lease-'));
    leaseConfig = {
      store: 'file',
      path: join(dir, 'lease.json'),
      ttlMs: 9000,
      heartbeatIntervalMs: 3000,
      startupTimeoutMs: 0,
      ioTimeoutMs: 1000,
    };
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    process.exitCode = 0;
    rmSync(dir, { recursive: true, force: true });
  });

  it('shows that no lease is stored', async () => {
    await leaseCommand('show', {}, leaseConfig);

    expect(console.log).toHaveBeenCalledWith(expect.stringContaining(`No lease stored at ${leaseConfig.path}`));
  });

  it('shows the stored lease owner', async () => {
    await new FileLeaseStore(leaseConfig.path).compareAndSwap(undefined, lease);

    await leaseCommand('show', {}, leaseConfig);

    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Owner: host-1-a'), expect.stringContaining('expired'));
  });

  it('clears an expired lease', async () => {
    await new FileLeaseStore(leaseConfig.path).compareAndSwap(undefined, lease);

    await leaseCommand('clear', {}, leaseConfig);

    expect(await new FileLeaseStore(leaseConfig.path).read()).toBeUndefined();
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Lease cleared'));
  });

  it('fails when the lease is still live', async () => {
    const live = { ...lease, expiresAt: Date.now() + 60_000 };
    await new FileLeaseStore(leaseConfig.path).compareAndSwap(undefined, live);

    await leaseCommand('clear', {}, leaseConfig);

    expect(process.exitCode).toBe(1);
    expect(await new FileLeaseStore(leaseConfig.path).read()).toEqual(live);
  });
});
