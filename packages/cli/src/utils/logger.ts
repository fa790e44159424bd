import chalk from 'chalk';
import type { Logger } from '@callflow/parser';

export interface CliLoggerOptions {
  /** Show debug lines */
  verbose?: boolean;
}

/**
 * Logger for the command line. Everything goes to stderr: stdout carries
 * the graph document and must stay pipeable.
 */
export function createCliLogger(options: CliLoggerOptions = {}): Logger {
  const { verbose = false } = options;

  return {
    info: (message: string) => console.error(message),
    warning: (message: string) => console.error(chalk.yellow(`Warning: ${message}`)),
    error: (message: string) => console.error(chalk.red(`Error: ${message}`)),
    debug: (message: string) => {
      if (verbose) {
        console.error(chalk.dim(message));
      }
    },
  };
}
