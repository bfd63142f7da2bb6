import chalk from 'chalk';

/**
 * Leveled, side-effect only logging sink. Implementations must never throw.
 */
export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

export interface ConsoleLoggerOptions {
  debug?: boolean;
  scope?: string;
}

/**
 * @description Logger writing to the console, coloured with chalk.
 * @description Debug lines are dropped unless `debug` is set.
 */
export function createConsoleLogger(
  options: ConsoleLoggerOptions = {}
): Logger {
  const prefix = options.scope ? `[${options.scope}] ` : '';

  return {
    error: (message) => console.error(chalk.red(`${prefix}${message}`)),
    warn: (message) => console.error(chalk.yellow(`${prefix}${message}`)),
    info: (message) => console.log(`${prefix}${message}`),
    debug: (message) => {
      if (options.debug) {
        console.error(chalk.dim(`${prefix}${message}`));
      }
    },
  };
}

const noop = (): void => undefined;

export const silentLogger: Logger = {
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
};
