import chalk from 'chalk';
import { getConfig, getConfigPath } from '../../config/index.js';
import { createLeaseStore } from '../../instance/index.js';
import type { ChatGateConfig, GateMetricsSnapshot, InstanceLease } from '../../types/index.js';

export interface StatusReport {
  configPath: string;
  lease?: InstanceLease;
  leaseLive: boolean;
  statusServer: {
    port: number;
    reachable: boolean;
    healthy?: boolean;
    metrics?: GateMetricsSnapshot;
  };
}

async function fetchJson(url: string, timeoutMs: number): Promise<{ ok: boolean; body: unknown } | undefined> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, { headers: { accept: 'application/json' }, signal: controller.signal });
    const body: unknown = await response.json();
    return { ok: response.ok, body };
  } catch {
    return undefined;
  } finally {
    clearTimeout(timeout);
  }
}

function isMetricsSnapshot(value: unknown): value is GateMetricsSnapshot {
  return !!value && typeof value === 'object' && 'trackedKeys' in value && 'activeLocks' in value;
}

export async function collectStatus(
  config: ChatGateConfig,
  configPath: string,
  now: number = Date.now(),
): Promise<StatusReport> {
  const store = createLeaseStore(config.lease);
  let lease: InstanceLease | undefined;
  try {
    lease = await store.read();
  } finally {
    store.close?.();
  }

  const report: StatusReport = {
    configPath,
    lease,
    leaseLive: !!lease && now <= lease.expiresAt,
    statusServer: { port: config.statusPort, reachable: false },
  };

  if (config.statusPort > 0) {
    const base = `http://127.0.0.1:${config.statusPort}`;
    const health = await fetchJson(`${base}/health`, 1500);
    if (health) {
      report.statusServer.reachable = true;
      report.statusServer.healthy = health.ok;
      const metrics = await fetchJson(`${base}/metrics`, 1500);
      if (metrics && isMetricsSnapshot(metrics.body)) {
        report.statusServer.metrics = metrics.body;
      }
    }
  }

  return report;
}

export async function statusCommand(options: { json?: boolean }) {
  const report = await collectStatus(getConfig(), getConfigPath());

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  console.log(chalk.cyan('\n📊 chatgate Status\n'));
  console.log(chalk.white('Configuration:'));
  console.log(chalk.gray(`   Config file: ${report.configPath}`));

  console.log(chalk.white('\nPoller lease:'));
  if (!report.lease) {
    console.log(chalk.gray('   ○ no lease held'));
  } else {
    const state = report.leaseLive ? chalk.green('● live') : chalk.yellow('○ expired');
    console.log(chalk.white(`   ${report.lease.ownerId}`), state);
    console.log(chalk.gray(`     Acquired: ${new Date(report.lease.acquiredAt).toISOString()}`));
    console.log(chalk.gray(`     Last heartbeat: ${new Date(report.lease.heartbeatAt).toISOString()}`));
    console.log(chalk.gray(`     Expires: ${new Date(report.lease.expiresAt).toISOString()}`));
  }

  console.log(chalk.white('\nStatus server:'));
  if (report.statusServer.port === 0) {
    console.log(chalk.gray('   (disabled)'));
  } else if (!report.statusServer.reachable) {
    console.log(chalk.gray(`   not reachable on port ${report.statusServer.port}`));
  } else {
    const health = report.statusServer.healthy ? chalk.green('healthy') : chalk.red('unhealthy');
    console.log(chalk.gray(`   port ${report.statusServer.port}:`), health);
    const metrics = report.statusServer.metrics;
    if (metrics) {
      const suppressed = Object.values(metrics.suppressed).reduce((sum, count) => sum + count, 0);
      console.log(chalk.gray(`   Admitted: ${metrics.admitted}, suppressed: ${suppressed}, fail-open: ${metrics.failOpen}`));
      console.log(chalk.gray(`   Tracked keys: ${metrics.trackedKeys}, active locks: ${metrics.activeLocks}`));
      console.log(chalk.gray(`   Navigation: ${metrics.navigation.chats} chat(s), ${metrics.navigation.steps} step(s)`));
    }
  }
  console.log('');
}
