/**
 * Logging seam between the generator and whoever runs it
 */

export interface Logger {
  /** Progress detail, shown in verbose mode only */
  debug(message: string): void;
  warn(message: string): void;
}

export const silentLogger: Logger = Object.freeze({
  debug: () => undefined,
  warn: () => undefined,
});
