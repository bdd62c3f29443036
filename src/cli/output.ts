/**
 * CLI output utilities
 * Handles formatted output, spinners, and the console logger
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { Logger } from '../compdb/logger.js';

/**
 * Output theme colors
 */
export const theme = {
  secondary: chalk.gray,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  dim: chalk.dim,
};

/**
 * Turn colours off for the rest of the process
 */
export function disableColor(): void {
  chalk.level = 0;
}

/**
 * Spinner instance for progress display
 */
let spinner: Ora | null = null;

/**
 * Start a spinner with a message
 *
 * @param message - Initial message
 * @returns Spinner instance
 */
export function startSpinner(message: string): Ora {
  if (spinner) {
    spinner.stop();
  }
  spinner = ora({
    text: message,
    spinner: 'dots',
  }).start();
  return spinner;
}

/**
 * Stop spinner with success
 *
 * @param message - Success message
 */
export function succeedSpinner(message?: string): void {
  if (spinner) {
    spinner.succeed(message);
    spinner = null;
  }
}

/**
 * Stop spinner with failure
 *
 * @param message - Failure message
 */
export function failSpinner(message?: string): void {
  if (spinner) {
    spinner.fail(message);
    spinner = null;
  }
}

/**
 * Print without tearing a running spinner
 */
function withSpinnerPaused(print: () => void): void {
  if (!spinner) {
    print();
    return;
  }
  spinner.clear();
  print();
  spinner.render();
}

/**
 * Print a success message
 *
 * @param message - Success message
 */
export function printSuccess(message: string): void {
  withSpinnerPaused(() => console.log(theme.success(message)));
}

/**
 * Print a warning message
 *
 * @param message - Warning message
 */
export function printWarning(message: string): void {
  withSpinnerPaused(() => console.error(theme.warning(`WARNING: ${message}`)));
}

/**
 * Print an error message
 *
 * @param message - Error message
 */
export function printError(message: string): void {
  withSpinnerPaused(() => console.error(theme.error(`ERROR: ${message}`)));
}

/**
 * Print a verbose-mode detail line
 *
 * @param message - Detail message
 */
export function printDebug(message: string): void {
  withSpinnerPaused(() => console.log(theme.dim(message)));
}

/**
 * Print a key-value pair
 *
 * @param key - Key
 * @param value - Value
 */
export function printKeyValue(key: string, value: string | number | boolean): void {
  console.log(`  ${theme.secondary(key + ':')} ${value}`);
}

/**
 * Create the console logger for a run. Verbosity is fixed here and the
 * logger cannot be reconfigured afterwards.
 */
export function createConsoleLogger(options: { verbose: boolean }): Logger {
  const { verbose } = options;
  return Object.freeze({
    debug(message: string): void {
      if (verbose) {
        printDebug(message);
      }
    },
    warn(message: string): void {
      printWarning(message);
    },
  });
}
