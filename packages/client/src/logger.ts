/**
 * Console logger with a fixed prefix and a colored status symbol per level.
 * Debug lines are dropped unless enabled.
 */

import chalk from 'chalk';

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

const PREFIX = '[chronokv]';

export function createLogger(debug: boolean): Logger {
  return {
    error: (msg) => console.error(chalk.red('✖'), PREFIX, msg),
    warn: (msg) => console.warn(chalk.yellow('⚠'), PREFIX, msg),
    info: (msg) => console.log(chalk.blue('ℹ'), PREFIX, msg),
    debug: (msg) => {
      if (debug) {
        console.log(chalk.gray('○'), PREFIX, chalk.gray(msg));
      }
    },
  };
}
