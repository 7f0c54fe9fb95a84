import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  debug(message: string): void;
}

export function createConsoleLogger(verbose = false): Logger {
  return {
    info: message => console.log(message),
    warn: message => console.warn(chalk.yellow(`⚠ ${message}`)),
    debug: message => {
      if (verbose) {
        console.log(chalk.dim(message));
      }
    }
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  debug: () => undefined
};
