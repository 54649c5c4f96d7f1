import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Scoped console logger; every line is prefixed with [scope]. Verbosity
 * belongs to the caller (the CommandRunner), which decides whether to call
 * debug at all.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  return {
    debug(message) {
      console.log(chalk.gray(`${prefix} ${message}`));
    },
    info(message) {
      console.log(`${chalk.blue(prefix)} ${message}`);
    },
    success(message) {
      console.log(`${chalk.blue(prefix)} ${chalk.green(message)}`);
    },
    warn(message) {
      console.warn(`${chalk.yellow(prefix)} ${chalk.yellow(message)}`);
    },
    error(message) {
      console.error(`${chalk.red(prefix)} ${chalk.red(message)}`);
    },
  };
}
