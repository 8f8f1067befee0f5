/**
 * Types shared by the validator, request builder and notifier client
 */

/**
 * Flag values as parsed from the command line, before any validation
 */
export interface RawOptions {
  user?: string;
  token?: string;
  message?: string;
  sound?: string;
  priority?: number;
  retry?: number;
  expire?: number;
  ttl?: number;
  quiet: boolean;
}

/**
 * Validated and defaulted options, ready to be sent.
 * With priority 2, retry and expire are always set.
 */
export interface NormalizedOptions {
  readonly user: string;
  readonly token: string;
  readonly message: string;
  readonly sound: string;
  readonly priority: number;
  readonly retry?: number;
  readonly expire?: number;
  /** Kept even with priority 2, where the API ignores it */
  readonly ttl?: number;
  readonly quiet: boolean;
}

export type ValidationResult =
  | { ok: true; options: NormalizedOptions; warnings: string[] }
  | { ok: false; errors: string[]; warnings: string[] };

/**
 * Exact field set posted to the messages endpoint
 */
export interface RequestFields {
  token: string;
  user: string;
  message: string;
  priority: number;
  sound: string;
  retry: number;
  expire?: number;
  ttl?: number;
}

/**
 * Decoded response body; every field is optional since the
 * body may come from a proxy or an error page
 */
export interface MessagesResponse {
  status?: number;
  request?: string;
  receipt?: string;
  errors?: string[];
}

export type NotificationOutcome =
  | { kind: 'success'; request?: string; receipt?: string }
  | { kind: 'failure'; reasons: string[] };

export interface TransportResponse {
  status: number;
  statusText: string;
  body: string;
}

/**
 * HTTP capability: POST a form body, return status line and raw body.
 * Rejects only when no response was received.
 */
export interface Transport {
  post(url: string, body: URLSearchParams): Promise<TransportResponse>;
}
