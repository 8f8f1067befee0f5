/**
 * Validation, request building and delivery of Pushover messages
 */

export { validate } from './validate.js';
export { buildRequestFields, toFormBody, describeFields } from './request.js';
export { decodeResponseBody } from './response.js';
export { sendNotification } from './client.js';
export type { SendOptions } from './client.js';
export { createFetchTransport } from './transport.js';
export * from './constants.js';
export type {
  RawOptions,
  NormalizedOptions,
  ValidationResult,
  RequestFields,
  MessagesResponse,
  NotificationOutcome,
  Transport,
  TransportResponse,
} from './types.js';
