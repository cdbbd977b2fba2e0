/**
 * Output Formatter
 * 
 * Final human-readable status lines. Everything else goes through the logger.
 */

import chalk from 'chalk';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}
