/**
 * Response body decoding
 * A body that is not a JSON object decodes to undefined; that is not an
 * error of its own, since the HTTP status covers transport problems.
 */

import type { MessagesResponse } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function decodeResponseBody(body: string): MessagesResponse | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }

  if (!isRecord(parsed)) {
    return undefined;
  }

  const response: MessagesResponse = {};
  if (typeof parsed.status === 'number') {
    response.status = parsed.status;
  }
  if (typeof parsed.request === 'string') {
    response.request = parsed.request;
  }
  if (typeof parsed.receipt === 'string') {
    response.receipt = parsed.receipt;
  }
  if (Array.isArray(parsed.errors)) {
    response.errors = parsed.errors.filter((error): error is string => typeof error === 'string');
  }
  return response;
}
