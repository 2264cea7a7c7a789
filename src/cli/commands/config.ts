import chalk from 'chalk';
import { NUMBER_SETTINGS, getConfig, getConfigPath, saveConfig } from '../../config/index.js';
import type { LeaseStoreKind } from '../../types/index.js';

export interface ConfigCommandOptions {
  show?: boolean;
  token?: string;
  statusPort?: string | number;
  leaseStore?: LeaseStoreKind;
  leasePath?: string;
  cooldownMs?: string | number;
  breakerMs?: string | number;
  heartbeatMs?: string | number;
  leaseTtlMs?: string | number;
  navPrefixes?: string;
  navActions?: string;
}

function maskToken(token: string): string {
  return token ? '****' + token.slice(-4) : '(not set)';
}

function splitList(raw: string): string[] {
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export async function configCommand(options: ConfigCommandOptions) {
  const parseBoundedInt = (raw: string | number, label: string, min: number, max: number): number => {
    const valueRaw = String(raw).trim();
    if (!/^\d+$/.test(valueRaw)) {
      console.error(chalk.red(`Invalid ${label}: ${raw}`));
      console.log(chalk.gray(`${label} must be an integer between ${min} and ${max}.`));
      process.exit(1);
    }
    const value = parseInt(valueRaw, 10);
    if (value < min || value > max) {
      console.error(chalk.red(`Invalid ${label}: ${raw}`));
      console.log(chalk.gray(`${label} must be an integer between ${min} and ${max}.`));
      process.exit(1);
    }
    return value;
  };

  if (options.show) {
    const config = getConfig();
    console.log(chalk.cyan('\n📋 Current configuration:\n'));
    console.log(chalk.gray(`   Config file: ${getConfigPath()}`));
    console.log(chalk.gray(`   Discord Token: ${maskToken(config.discord.token)}`));
    console.log(chalk.gray(`   Stateful cooldown: ${config.gate.statefulCooldownMs}ms`));
    console.log(chalk.gray(`   Breaker duration: ${config.gate.breakerDurationMs}ms`));
    console.log(chalk.gray(`   Tracked keys: ${config.gate.maxTrackedKeys} (max age ${config.gate.maxKeyAgeMs}ms)`));
    console.log(chalk.gray(`   Navigational prefixes: ${config.gate.navigationalPrefixes.join(', ')}`));
    console.log(chalk.gray(`   Navigational actions: ${config.gate.navigationalActions.join(', ')}`));
    console.log(
      chalk.gray(
        `   Navigation history: ${config.navigation.maxHistory} steps, purge after ${config.navigation.purgeThresholdMs}ms`,
      ),
    );
    console.log(chalk.gray(`   Lease store: ${config.lease.store} (${config.lease.path})`));
    console.log(
      chalk.gray(`   Lease TTL: ${config.lease.ttlMs}ms, heartbeat every ${config.lease.heartbeatIntervalMs}ms`),
    );
    console.log(chalk.gray(`   Startup timeout: ${config.lease.startupTimeoutMs}ms`));
    console.log(chalk.gray(`   Status port: ${config.statusPort > 0 ? config.statusPort : '(disabled)'}`));
    console.log('');
    return;
  }

  let updated = false;

  if (options.token !== undefined) {
    const token = options.token.trim();
    if (!token) {
      console.error(chalk.red('Invalid bot token input.'));
      process.exit(1);
    }
    saveConfig({ token });
    console.log(chalk.green(`✅ Bot token saved (${maskToken(token)})`));
    updated = true;
  }

  if (options.statusPort !== undefined) {
    const { min, max } = NUMBER_SETTINGS.statusPort;
    const port = parseBoundedInt(options.statusPort, 'status port', min, max);
    saveConfig({ statusPort: port });
    console.log(chalk.green(port === 0 ? '✅ Status server disabled' : `✅ Status port saved: ${port}`));
    updated = true;
  }

  if (options.leaseStore) {
    saveConfig({ leaseStore: options.leaseStore });
    console.log(chalk.green(`✅ Lease store saved: ${options.leaseStore}`));
    updated = true;
  }

  if (options.leasePath !== undefined) {
    const path = options.leasePath.trim();
    if (!path || path.toLowerCase() === 'default') {
      saveConfig({ leasePath: undefined });
      console.log(chalk.green('✅ Lease path reset to default'));
    } else {
      saveConfig({ leasePath: path });
      console.log(chalk.green(`✅ Lease path saved: ${path}`));
    }
    updated = true;
  }

  if (options.cooldownMs !== undefined) {
    const { min, max } = NUMBER_SETTINGS.statefulCooldownMs;
    const value = parseBoundedInt(options.cooldownMs, 'stateful cooldown ms', min, max);
    saveConfig({ statefulCooldownMs: value });
    console.log(chalk.green(`✅ Stateful cooldown saved: ${value}ms`));
    updated = true;
  }

  if (options.breakerMs !== undefined) {
    const { min, max } = NUMBER_SETTINGS.breakerDurationMs;
    const value = parseBoundedInt(options.breakerMs, 'breaker duration ms', min, max);
    saveConfig({ breakerDurationMs: value });
    console.log(chalk.green(`✅ Breaker duration saved: ${value}ms`));
    updated = true;
  }

  if (options.heartbeatMs !== undefined) {
    const { min, max } = NUMBER_SETTINGS.heartbeatIntervalMs;
    const value = parseBoundedInt(options.heartbeatMs, 'heartbeat ms', min, max);
    saveConfig({ heartbeatIntervalMs: value });
    console.log(chalk.green(`✅ Heartbeat interval saved: ${value}ms`));
    updated = true;
  }

  if (options.leaseTtlMs !== undefined) {
    const { min, max } = NUMBER_SETTINGS.leaseTtlMs;
    const value = parseBoundedInt(options.leaseTtlMs, 'lease ttl ms', min, max);
    saveConfig({ leaseTtlMs: value });
    console.log(chalk.green(`✅ Lease TTL saved: ${value}ms`));
    updated = true;
  }

  if (options.navPrefixes !== undefined) {
    const prefixes = splitList(options.navPrefixes);
    saveConfig({ navigationalPrefixes: prefixes.length > 0 ? prefixes : undefined });
    console.log(chalk.green(prefixes.length > 0 ? `✅ Navigational prefixes saved: ${prefixes.join(', ')}` : '✅ Navigational prefixes reset to default'));
    updated = true;
  }

  if (options.navActions !== undefined) {
    const actions = splitList(options.navActions);
    saveConfig({ navigationalActions: actions.length > 0 ? actions : undefined });
    console.log(chalk.green(actions.length > 0 ? `✅ Navigational actions saved: ${actions.join(', ')}` : '✅ Navigational actions reset to default'));
    updated = true;
  }

  if (!updated) {
    console.log(chalk.yellow('No options provided. Use --help to see available options.'));
    console.log(chalk.gray('\nExample:'));
    console.log(chalk.gray('  chatgate config --token YOUR_BOT_TOKEN'));
    console.log(chalk.gray('  chatgate config --lease-store sqlite'));
    console.log(chalk.gray('  chatgate config --status-port 18480'));
    console.log(chalk.gray('  chatgate config --nav-prefixes menu_,back_,page_'));
    console.log(chalk.gray('  chatgate config --show'));
  }
}
