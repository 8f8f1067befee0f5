/**
 * Notifier client
 * - One POST of the form-encoded fields, no retry
 * - Failure reasons come from two sources, in order:
 *   1. transport (connection failure or non-2xx status)
 *   2. the `errors` list of a decodable response body
 */

import { describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { resolveEndpoint } from './constants.js';
import { describeFields, toFormBody } from './request.js';
import { decodeResponseBody } from './response.js';
import { createFetchTransport } from './transport.js';
import type { NotificationOutcome, RequestFields, Transport, TransportResponse } from './types.js';

export interface SendOptions {
  transport?: Transport;
  endpoint?: string;
}

function statusLine(response: TransportResponse): string {
  return response.statusText
    ? `HTTP ${response.status} ${response.statusText}`
    : `HTTP ${response.status}`;
}

export async function sendNotification(
  fields: RequestFields,
  options?: SendOptions
): Promise<NotificationOutcome> {
  const logger = getLogger();
  const transport = options?.transport ?? createFetchTransport();
  const endpoint = options?.endpoint ?? resolveEndpoint();
  const reasons: string[] = [];

  logger.debug(`POST ${endpoint}`);
  logger.debug(`Fields: ${describeFields(fields)}`);

  let response: TransportResponse;
  try {
    response = await transport.post(endpoint, toFormBody(fields));
  } catch (error) {
    return { kind: 'failure', reasons: [`Request failed: ${describeError(error)}`] };
  }

  logger.debug(`Response: ${statusLine(response)}`);

  if (response.status < 200 || response.status >= 300) {
    reasons.push(statusLine(response));
  }

  const decoded = decodeResponseBody(response.body);
  if (decoded === undefined) {
    logger.debug('Response body is not a JSON object; ignoring it');
  } else {
    if (decoded.status !== undefined) {
      logger.debug(`API status: ${decoded.status}`);
    }
    if (decoded.errors) {
      reasons.push(...decoded.errors);
    }
  }

  if (reasons.length > 0) {
    return { kind: 'failure', reasons };
  }

  return { kind: 'success', request: decoded?.request, receipt: decoded?.receipt };
}
