import chalk from 'chalk';
import { main } from '../../index.js';
import { getConfig, getConfigPath, validateConfig } from '../../config/index.js';

export async function startCommand(options: { handler?: string; owner?: string }) {
  try {
    validateConfig();
    const config = getConfig();

    console.log(chalk.cyan('\n🚀 Starting chatgate\n'));
    console.log(chalk.white('Configuration:'));
    console.log(chalk.gray(`   Config file: ${getConfigPath()}`));
    console.log(chalk.gray(`   Lease: ${config.lease.store} store at ${config.lease.path}`));
    console.log(chalk.gray(`   Status port: ${config.statusPort > 0 ? config.statusPort : '(disabled)'}`));
    console.log(chalk.gray(`   Handler: ${options.handler || '(log only)'}`));
    console.log('');

    const exitCode = await main({ handlerPath: options.handler, ownerId: options.owner });
    process.exit(exitCode);
  } catch (error) {
    console.error(chalk.red('Error starting bot:'), error);
    process.exit(1);
  }
}
