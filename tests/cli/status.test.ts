import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { collectStatus } from '../../src/cli/commands/status.js';
import { StatusServer } from '../../src/bridge/status-server.js';
import { FileLeaseStore } from '../../src/instance/file-lease-store.js';
import type { ChatGateConfig, GateMetricsSnapshot, InstanceLease } from '../../src/types/index.js';

function createConfig(leasePath: string, statusPort: number): ChatGateConfig {
  return {
    discord: { token: 'test-token' },
    gate: {
      statefulCooldownMs: 1000,
      breakerDurationMs: 2000,
      maxTrackedKeys: 1000,
      maxKeyAgeMs: 30_000,
      navigationalPrefixes: ['menu_'],
      navigationalActions: [],
    },
    navigation: { maxHistory: 20, purgeThresholdMs: 3_600_000, purgeEvery: 10, duplicateWindowMs: 500, menuRootPrefix: 'menu_' },
    lease: { store: 'file', path: leasePath, ttlMs: 9000, heartbeatIntervalMs: 3000, startupTimeoutMs: 0, ioTimeoutMs: 1000 },
    statusPort,
  };
}

const metrics: GateMetricsSnapshot = {
  trackedKeys: 2,
  activeLocks: 0,
  navigation: { chats: 1, steps: 1 },
  admitted: 4,
  suppressed: { breaker: 0, 'duplicate-event': 1, 'stateful-cooldown': 0 },
  failOpen: 0,
};

describe('collectStatus', () => {
  let dir: string;
  let leasePath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'chatgate-status-'));
    leasePath = join(dir, 'lease.json');
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reports no lease and a disabled status server', async () => {
    const report = await collectStatus(createConfig(leasePath, 0), '/tmp/config.json');

    expect(report).toEqual({
      configPath: '/tmp/config.json',
      lease: undefined,
      leaseLive: false,
      statusServer: { port: 0, reachable: false },
    });
  });

  it('tells a live lease from an expired one', async () => {
    const lease: InstanceLease = { ownerId: 'host-1-a', acquiredAt: 1000, heartbeatAt: 1000, expiresAt: 10_000 };
    await new FileLeaseStore(leasePath).compareAndSwap(undefined, lease);
    const config = createConfig(leasePath, 0);

    const live = await collectStatus(config, '/tmp/config.json', 10_000);
    const expired = await collectStatus(config, '/tmp/config.json', 10_001);

    expect(live.lease).toEqual(lease);
    expect(live.leaseLive).toBe(true);
    expect(expired.leaseLive).toBe(false);
  });

  it('queries a running status server', async () => {
    const lease: InstanceLease = { ownerId: 'host-1-a', acquiredAt: 0, heartbeatAt: 0, expiresAt: Date.now() + 60_000 };
    const server = new StatusServer({
      port: 0,
      ownerId: 'host-1-a',
      metricsSnapshot: () => metrics,
      resetAll: () => {},
      pollerStats: () => ({ running: true, batches: 1, dispatched: 4, inFlight: 0, handlerErrors: 0 }),
      currentLease: async () => lease,
    });
    const port = await server.start();

    try {
      const report = await collectStatus(createConfig(leasePath, port), '/tmp/config.json');

      expect(report.statusServer).toEqual({ port, reachable: true, healthy: true, metrics });
    } finally {
      await server.stop();
    }
  });
});
