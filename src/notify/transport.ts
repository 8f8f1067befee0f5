import { describeError } from '../utils/errors.js';
import type { Transport, TransportResponse } from './types.js';

/**
 * Transport backed by the global fetch; no timeout beyond fetch's own.
 * A rejection is rethrown with the underlying cause (ECONNREFUSED, ENOTFOUND)
 * in its message, since fetch itself only says "fetch failed".
 */
export function createFetchTransport(): Transport {
  return {
    async post(url: string, body: URLSearchParams): Promise<TransportResponse> {
      const response = await fetch(url, { method: 'POST', body }).catch((error: unknown) => {
        throw new Error(`fetch failed: ${describeError(error)}`);
      });
      return {
        status: response.status,
        statusText: response.statusText,
        body: await response.text(),
      };
    },
  };
}
