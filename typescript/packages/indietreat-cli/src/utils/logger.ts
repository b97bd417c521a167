import chalk from 'chalk';
import type { ChainLogger } from '@indietreat/core';

export const logger = {
  success: (message: string) => console.log(chalk.green('✓'), message),
  error: (message: string) => console.log(chalk.red('✗'), message),
  info: (message: string) => console.log(chalk.blue('ℹ'), message),
  warn: (message: string) => console.log(chalk.yellow('⚠'), message),
  step: (message: string) => console.log(chalk.cyan('→'), message),
  log: (message: string) => console.log(message),
  header: (message: string) => {
    console.log('\n' + chalk.bold.underline(message));
  },
  json: (data: unknown) => console.log(JSON.stringify(data, null, 2)),
  keyValue: (key: string, value: string) => {
    console.log(`  ${chalk.gray(key + ':')} ${value}`);
  }
};

/**
 * Routes local chain diagnostics to the CLI output.
 */
export const chainLogger: ChainLogger = {
  debug: (message: string) => logger.step(chalk.gray(message)),
  warn: (message: string) => logger.warn(message)
};
