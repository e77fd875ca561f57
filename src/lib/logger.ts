import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
}

// Diagnostics go to stderr so stdout stays clean for the report (and --json)
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return {
    debug(message) {
      if (options.verbose) {
        console.error(chalk.gray(`[debug] ${message}`));
      }
    },
    warn(message) {
      console.error(chalk.yellow(message));
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  warn() {},
};
