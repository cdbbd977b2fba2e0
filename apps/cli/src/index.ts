#!/usr/bin/env node
/**
 * CLI Entry Point
 * 
 * Command-line interface for sftp-writer.
 */

import { config as dotenvConfig } from 'dotenv';
import { Command } from 'commander';
import chalk from 'chalk';
import { APP_VERSION } from './config/index.js';
import { runCommand } from './commands/run.js';

dotenvConfig();

const program = new Command();

program
  .name('sftp-writer')
  .description('Upload input tables and files to an SFTP server')
  .version(APP_VERSION);

program
  .command('run', { isDefault: true })
  .description('Upload every staged table and file')
  .option('-d, --data-dir <dir>', 'Data directory containing config.json and in/ (default: $KBC_DATADIR or ./data)')
  .option('--debug', 'Enable debug logging')
  .action(runCommand);

program.exitOverride((err) => {
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  if (err.code === 'commander.unknownCommand') {
    console.log('Run', chalk.cyan('sftp-writer --help'), 'for available commands');
  }
  process.exit(1);
});

// Parse and execute
program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('Unexpected failure:'), error);
  process.exit(2);
});
