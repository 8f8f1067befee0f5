/**
 * Turns validation results and delivery outcomes into user-facing
 * output and an exit code. Nothing here calls process.exit.
 */

import type { NotificationOutcome } from '../notify/types.js';
import { DeliveryError, ValidationError, handleError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface ReportOptions {
  quiet: boolean;
}

export const EXIT_SUCCESS = 0;

export function reportWarnings(warnings: readonly string[]): void {
  const logger = getLogger();
  warnings.forEach((warning) => logger.warn(warning));
}

/**
 * Log every validation error; the network is never reached after this
 */
export function reportValidationErrors(errors: readonly string[]): number {
  return handleError(new ValidationError(errors));
}

export function reportOutcome(outcome: NotificationOutcome, options: ReportOptions): number {
  if (outcome.kind === 'failure') {
    return handleError(new DeliveryError(outcome.reasons));
  }

  if (!options.quiet) {
    const ids = [
      outcome.request ? `request ${outcome.request}` : undefined,
      outcome.receipt ? `receipt ${outcome.receipt}` : undefined,
    ].filter((id): id is string => id !== undefined);
    getLogger().info(ids.length > 0 ? `Notification sent (${ids.join(', ')})` : 'Notification sent');
  }
  return EXIT_SUCCESS;
}
