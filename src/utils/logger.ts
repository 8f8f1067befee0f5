/**
 * Logger utility with verbose mode support
 * - info(): always prints to stdout
 * - debug(): only prints with --verbose
 * - warn()/error(): stderr
 */

const PREFIX = '[pushover-notify]';

class Logger {
  private verbose: boolean = false;

  /**
   * Set verbose mode
   */
  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  /**
   * Always prints - used for confirmation lines
   */
  info(message: string): void {
    console.log(`${PREFIX} ${message}`);
  }

  /**
   * Only prints in verbose mode - used for request details
   */
  debug(message: string): void {
    if (this.verbose) {
      console.log(`${PREFIX} DEBUG: ${message}`);
    }
  }

  /**
   * Print a warning message
   */
  warn(message: string): void {
    console.warn(`${PREFIX} WARNING: ${message}`);
  }

  /**
   * Print an error message
   */
  error(message: string): void {
    console.error(`${PREFIX} ERROR: ${message}`);
  }

  /**
   * Print an error header followed by one bullet per item
   */
  errorList(header: string, items: readonly string[]): void {
    this.error(header);
    items.forEach((item) => console.error(`  - ${item}`));
  }
}

// Singleton instance
let loggerInstance: Logger | null = null;

/**
 * Get or create the logger singleton
 */
export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger();
  }
  return loggerInstance;
}

/**
 * Reset logger (useful for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}

export { Logger };
