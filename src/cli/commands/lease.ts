import chalk from 'chalk';
import { getConfig } from '../../config/index.js';
import { createLeaseStore } from '../../instance/index.js';
import type { LeaseConfig, LeaseStore } from '../../types/index.js';

export type LeaseAction = 'show' | 'clear';

export type LeaseClearOutcome = 'cleared' | 'absent' | 'live' | 'conflict';

/**
 * Removes the stored lease. A live lease is left alone unless `force` is set,
 * since its holder is still polling.
 */
export async function clearLease(store: LeaseStore, force: boolean, now: number = Date.now()): Promise<LeaseClearOutcome> {
  const existing = await store.read();
  if (!existing) return 'absent';
  if (!force && now <= existing.expiresAt) return 'live';
  return (await store.compareAndSwap(existing, undefined)) ? 'cleared' : 'conflict';
}

export async function leaseCommand(action: LeaseAction, options: { force?: boolean }, leaseConfig: LeaseConfig = getConfig().lease) {
  const store = createLeaseStore(leaseConfig);
  try {
    if (action === 'show') {
      const lease = await store.read();
      if (!lease) {
        console.log(chalk.gray(`No lease stored at ${leaseConfig.path}`));
        return;
      }
      const live = Date.now() <= lease.expiresAt;
      console.log(chalk.white(`Owner: ${lease.ownerId}`), live ? chalk.green('● live') : chalk.yellow('○ expired'));
      console.log(chalk.gray(`   Acquired: ${new Date(lease.acquiredAt).toISOString()}`));
      console.log(chalk.gray(`   Last heartbeat: ${new Date(lease.heartbeatAt).toISOString()}`));
      console.log(chalk.gray(`   Expires: ${new Date(lease.expiresAt).toISOString()}`));
      return;
    }

    const outcome = await clearLease(store, !!options.force);
    switch (outcome) {
      case 'cleared':
        console.log(chalk.green('✅ Lease cleared'));
        return;
      case 'absent':
        console.log(chalk.gray('No lease to clear'));
        return;
      case 'live':
        console.error(chalk.red('Lease is still live; its holder is polling.'));
        console.log(chalk.gray('Stop that instance first, or pass --force.'));
        process.exitCode = 1;
        return;
      case 'conflict':
        console.error(chalk.red('Lease changed while clearing; try again.'));
        process.exitCode = 1;
        return;
    }
  } finally {
    store.close?.();
  }
}
