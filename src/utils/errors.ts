/**
 * Error taxonomy with stable exit codes
 * Each error class extends Error and provides:
 * - code: stable exit code (1-3)
 * - message: user-facing message
 * - log(): writes the error through the logger
 */

import type { CommanderError } from 'commander';
import { getLogger } from './logger.js';

export const HELP_HINT = 'Run with --help for usage.';

/**
 * Base error class with exit code
 */
export abstract class NotifierError extends Error {
  abstract readonly code: number;
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
    Object.setPrototypeOf(this, NotifierError.prototype);
  }

  /**
   * Get the exit code for this error
   */
  getExitCode(): number {
    return this.code;
  }

  log(): void {
    const logger = getLogger();
    logger.error(this.message);
    if (this.details) {
      logger.debug(`Details: ${this.details}`);
    }
  }
}

/**
 * Argument error (exit code 1)
 * Triggered by: unknown flags, ill-typed flag values, stray arguments
 */
export class ArgumentError extends NotifierError {
  readonly code = 1;

  constructor(message: string, details?: string) {
    super(message, details);
    Object.setPrototypeOf(this, ArgumentError.prototype);
  }

  static fromCommander(error: CommanderError): ArgumentError {
    return new ArgumentError(error.message.replace(/^error:\s*/, ''), `commander code: ${error.code}`);
  }

  log(): void {
    super.log();
    getLogger().error(HELP_HINT);
  }
}

/**
 * Validation error (exit code 2)
 * Carries every problem found in one pass; never just the first
 */
export class ValidationError extends NotifierError {
  readonly code = 2;
  readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super(`Invalid parameters: ${errors.join('; ')}`);
    this.errors = errors;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  log(): void {
    const logger = getLogger();
    this.errors.forEach((error) => logger.error(error));
    logger.error(HELP_HINT);
  }
}

/**
 * Delivery error (exit code 3)
 * Triggered by: transport failure, non-2xx status, API error list in the body
 */
export class DeliveryError extends NotifierError {
  readonly code = 3;
  readonly reasons: readonly string[];

  constructor(reasons: readonly string[]) {
    super(`Failed to send notification: ${reasons.join('; ')}`);
    this.reasons = reasons;
    Object.setPrototypeOf(this, DeliveryError.prototype);
  }

  log(): void {
    getLogger().errorList('Failed to send notification:', this.reasons);
  }
}

function readMessage(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'message' in value) {
    const { message } = value;
    if (typeof message === 'string' && message.length > 0) {
      return message;
    }
  }
  if (typeof value === 'object' && value !== null && 'code' in value) {
    const { code } = value;
    if (typeof code === 'string') {
      return code;
    }
  }
  return undefined;
}

/**
 * Message of an error, or of its `cause` when it has one.
 * Duck-typed: errors raised inside fetch may come from another realm.
 */
export function describeError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'cause' in error) {
    const cause = readMessage(error.cause);
    if (cause !== undefined) {
      return cause;
    }
  }
  return readMessage(error) ?? String(error);
}

/**
 * Map error to exit code
 */
export function getExitCode(error: unknown): number {
  if (error instanceof NotifierError) {
    return error.getExitCode();
  }
  return 1;
}

/**
 * Log an error and return the exit code the process should end with
 */
export function handleError(error: unknown): number {
  if (error instanceof NotifierError) {
    error.log();
    return error.getExitCode();
  }

  const logger = getLogger();
  if (error instanceof Error) {
    logger.error(`Unexpected error: ${error.message}`);
    if (error.stack) {
      logger.debug(`Stack: ${error.stack}`);
    }
  } else {
    logger.error(`Unexpected error: ${String(error)}`);
  }
  return 1;
}
