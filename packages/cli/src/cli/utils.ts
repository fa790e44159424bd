import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import { isCallflowError, getErrorMessage, getErrorStack } from '@callflow/parser';

/**
 * Spinner wrapper for progress on stderr. Silent when stderr is not a
 * terminal, so redirected runs only ever see diagnostics there.
 */
export class TaskSpinner {
  private spinner: Ora;

  constructor(initialText: string, options: { silent?: boolean } = {}) {
    this.spinner = ora({
      text: initialText,
      stream: process.stderr,
      isSilent: options.silent === true || !process.stderr.isTTY,
    }).start();
  }

  /**
   * Shows success message and stops spinner
   */
  succeed(text: string): void {
    this.spinner.succeed(text);
  }

  /**
   * Shows failure message and stops spinner
   */
  fail(text: string): void {
    this.spinner.fail(text);
  }
}

/**
 * Handles command errors with consistent formatting
 * Distinguishes between callflow errors and unexpected errors
 *
 * @param error - The error that occurred
 * @param verbose - Whether to show verbose error output
 */
export function handleCommandError(error: unknown, verbose: boolean = false): void {
  const errorMessage = getErrorMessage(error);

  if (isCallflowError(error)) {
    console.error(chalk.red(`Error: ${errorMessage}`));

    if (error.context && verbose) {
      console.error(chalk.dim('Context:'));
      console.error(chalk.dim(JSON.stringify(error.context, null, 2)));
    }
  } else {
    console.error(chalk.red(`Unexpected error: ${errorMessage}`));

    const stack = getErrorStack(error);
    if (stack && verbose) {
      console.error(chalk.dim('Stack trace:'));
      console.error(chalk.dim(stack));
    }
  }
}

/**
 * Formats a file count with proper pluralization
 * @returns Formatted string (e.g., "1 file", "5 files")
 */
export function formatFileCount(count: number): string {
  return `${count} file${count === 1 ? '' : 's'}`;
}

/**
 * Formats a duration in milliseconds to a human-readable string
 * @returns Formatted duration string (e.g., "1.5s", "123ms")
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}
