/**
 * CLI option types, as commander hands them over
 */

export type CliOptions = {
  user?: string;
  token?: string;
  msg?: string;
  sound?: string;
  priority?: number;
  retry?: number;
  expire?: number;
  ttl?: number;
  quiet: boolean;
  verbose: boolean;
};
