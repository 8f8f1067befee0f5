export const PUSHOVER_API_URL = 'https://api.pushover.net/1/messages.json';

export const DEFAULT_SOUND = 'pushover';
export const DEFAULT_PRIORITY = 0;

export const MIN_PRIORITY = -2;
export const MAX_PRIORITY = 2;
export const EMERGENCY_PRIORITY = 2;

// Seconds
export const MIN_RETRY = 30;
export const MAX_EXPIRE = 10800;

/**
 * Resolve the messages endpoint, honouring PUSHOVER_API_URL when set
 */
export function resolveEndpoint(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.PUSHOVER_API_URL?.trim();
  return override ? override : PUSHOVER_API_URL;
}
