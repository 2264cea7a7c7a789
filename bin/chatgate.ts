#!/usr/bin/env node

/**
 * CLI entry point for chatgate
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';
import chalk from 'chalk';
import { startCommand } from '../src/cli/commands/start.js';
import { statusCommand } from '../src/cli/commands/status.js';
import { configCommand } from '../src/cli/commands/config.js';
import { leaseCommand } from '../src/cli/commands/lease.js';

const CLI_COMMAND_NAME = 'chatgate';

function resolveCliVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const candidates = [resolve(here, '../package.json'), resolve(here, '../../package.json')];

  for (const candidate of candidates) {
    try {
      const parsed: { version?: unknown } = JSON.parse(readFileSync(candidate, 'utf-8'));
      if (typeof parsed.version === 'string') return parsed.version;
    } catch {
      // Try next candidate.
    }
  }

  return process.env.npm_package_version || '0.0.0';
}

export async function runCli(rawArgs: string[] = hideBin(process.argv)): Promise<void> {
  await yargs(rawArgs)
    .scriptName(CLI_COMMAND_NAME)
    .usage('$0 <command>')
    .version(resolveCliVersion())
    .help()
    .strict()
    .demandCommand(1)
    .command(
      'start',
      'Start polling, if no other instance holds the lease',
      (y) =>
        y
          .option('handler', { type: 'string', describe: 'Module whose default export handles admitted events' })
          .option('owner', { type: 'string', describe: 'Lease owner id (defaults to host-pid-random)' }),
      async (argv) => startCommand({ handler: argv.handler, owner: argv.owner }),
    )
    .command(
      'status',
      'Show lease holder and live admission metrics',
      (y) => y.option('json', { type: 'boolean', default: false, describe: 'Print machine-readable JSON output' }),
      async (argv) => statusCommand({ json: argv.json }),
    )
    .command(
      'config',
      'Configure chatgate settings',
      (y) =>
        y
          .option('token', { alias: 't', type: 'string', describe: 'Set Discord bot token' })
          .option('status-port', { type: 'string', describe: 'Set status server port (0 disables it)' })
          .option('lease-store', { choices: ['file', 'sqlite'] as const, describe: 'Set lease store backend' })
          .option('lease-path', { type: 'string', describe: 'Set lease file or database path (use "default" to reset)' })
          .option('cooldown-ms', { type: 'string', describe: 'Set stateful action cooldown' })
          .option('breaker-ms', { type: 'string', describe: 'Set circuit breaker duration' })
          .option('heartbeat-ms', { type: 'string', describe: 'Set lease heartbeat interval' })
          .option('lease-ttl-ms', { type: 'string', describe: 'Set lease time-to-live' })
          .option('nav-prefixes', { type: 'string', describe: 'Comma-separated navigational prefixes (empty resets)' })
          .option('nav-actions', { type: 'string', describe: 'Comma-separated navigational actions (empty resets)' })
          .option('show', { type: 'boolean', describe: 'Show current configuration' }),
      async (argv) =>
        configCommand({
          show: argv.show,
          token: argv.token,
          statusPort: argv.statusPort,
          leaseStore: argv.leaseStore === 'file' || argv.leaseStore === 'sqlite' ? argv.leaseStore : undefined,
          leasePath: argv.leasePath,
          cooldownMs: argv.cooldownMs,
          breakerMs: argv.breakerMs,
          heartbeatMs: argv.heartbeatMs,
          leaseTtlMs: argv.leaseTtlMs,
          navPrefixes: argv.navPrefixes,
          navActions: argv.navActions,
        }),
    )
    .command(
      'lease <action>',
      'Inspect or clear the poller lease (show|clear)',
      (y) =>
        y
          .positional('action', { choices: ['show', 'clear'] as const, demandOption: true })
          .option('force', { type: 'boolean', default: false, describe: 'Clear even a live lease' }),
      async (argv) => leaseCommand(argv.action === 'clear' ? 'clear' : 'show', { force: argv.force }),
    )
    .parseAsync();
}

if (import.meta.url === `file://${process.argv[1]}`) {
  runCli().catch((error) => {
    console.error(chalk.red('Fatal CLI error:'), error);
    process.exit(1);
  });
}
