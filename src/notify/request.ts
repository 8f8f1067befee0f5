/**
 * Projection of normalized options onto the messages endpoint's fields.
 * retry is always sent (0 when unset); expire and ttl only when set.
 */

import type { NormalizedOptions, RequestFields } from './types.js';

export function buildRequestFields(options: NormalizedOptions): RequestFields {
  const fields: RequestFields = {
    token: options.token,
    user: options.user,
    message: options.message,
    priority: options.priority,
    sound: options.sound,
    retry: options.retry ?? 0,
  };

  if (options.expire !== undefined) {
    fields.expire = options.expire;
  }
  if (options.ttl !== undefined) {
    fields.ttl = options.ttl;
  }

  return fields;
}

export function toFormBody(fields: RequestFields): URLSearchParams {
  const body = new URLSearchParams();
  for (const [name, value] of Object.entries(fields)) {
    if (value !== undefined) {
      body.append(name, String(value));
    }
  }
  return body;
}

/**
 * Fields with the application token masked, for verbose logging
 */
export function describeFields(fields: RequestFields): string {
  return Object.entries({ ...fields, token: '<redacted>' })
    .filter(([, value]) => value !== undefined)
    .map(([name, value]) => `${name}=${String(value)}`)
    .join(' ');
}
