/**
 * Option validation and normalization
 * - Every check runs; all problems are reported together
 * - Emergency priority fills in absent retry/expire, never explicit ones
 */

import {
  DEFAULT_PRIORITY,
  DEFAULT_SOUND,
  EMERGENCY_PRIORITY,
  MAX_EXPIRE,
  MAX_PRIORITY,
  MIN_PRIORITY,
  MIN_RETRY,
} from './constants.js';
import type { RawOptions, ValidationResult } from './types.js';

const REQUIRED_FIELDS = [
  { key: 'user', flag: '--user' },
  { key: 'token', flag: '--token' },
  { key: 'message', flag: '--msg' },
] as const;

function nonEmpty(value: string | undefined): value is string {
  return value !== undefined && value.length > 0;
}

export function validate(raw: RawOptions): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const { key, flag } of REQUIRED_FIELDS) {
    if (!nonEmpty(raw[key])) {
      errors.push(`Missing required parameter ${flag}`);
    }
  }

  const priority = raw.priority ?? DEFAULT_PRIORITY;
  if (priority < MIN_PRIORITY || priority > MAX_PRIORITY) {
    errors.push(
      `Invalid --priority ${priority}: must be between ${MIN_PRIORITY} and ${MAX_PRIORITY}`
    );
  }

  if (raw.retry !== undefined && raw.retry < MIN_RETRY) {
    errors.push(`Invalid --retry ${raw.retry}: must be at least ${MIN_RETRY} seconds`);
  }

  if (raw.expire !== undefined && raw.expire > MAX_EXPIRE) {
    errors.push(`Invalid --expire ${raw.expire}: must be at most ${MAX_EXPIRE} seconds`);
  }

  let { retry, expire } = raw;
  if (priority === EMERGENCY_PRIORITY) {
    expire ??= MAX_EXPIRE;
    retry ??= MIN_RETRY;
    if (raw.ttl !== undefined) {
      warnings.push(`--ttl is ignored when --priority is ${EMERGENCY_PRIORITY}`);
    }
  }

  const sound = raw.sound ?? DEFAULT_SOUND;

  const { user, token, message } = raw;
  if (errors.length > 0 || !nonEmpty(user) || !nonEmpty(token) || !nonEmpty(message)) {
    return { ok: false, errors, warnings };
  }

  return {
    ok: true,
    options: {
      user,
      token,
      message,
      sound,
      priority,
      retry,
      expire,
      ttl: raw.ttl,
      quiet: raw.quiet,
    },
    warnings,
  };
}
