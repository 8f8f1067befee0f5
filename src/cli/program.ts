import { Command, InvalidArgumentError, Option } from 'commander';
import type { RawOptions } from '../notify/types.js';
import type { CliOptions } from './types.js';

export const VERSION = '0.1.0';

export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`Expected an integer, got: ${value}`);
  }
  return parseInt(value, 10);
}

/**
 * Flag schema. Required parameters are not marked mandatory here so the
 * validator can report every missing one at once.
 */
export function createProgram(): Command {
  return new Command()
    .name('pushover-notify')
    .description('Send a notification through the Pushover messages API')
    .version(VERSION)
    .addOption(
      new Option('--user <key>', 'Pushover user or group key (required)').env('PUSHOVER_USER')
    )
    .addOption(
      new Option('--token <key>', 'Pushover application token (required)').env('PUSHOVER_TOKEN')
    )
    .option('--msg <text>', 'Message body (required)')
    .option('--sound <name>', 'Notification sound (default: pushover)')
    .option('--priority <n>', 'Priority from -2 to 2 (default: 0)', parseInteger)
    .option('--retry <seconds>', 'Emergency re-delivery interval, at least 30 (default with --priority=2: 30)', parseInteger)
    .option('--expire <seconds>', 'Emergency retry limit, at most 10800 (default with --priority=2: 10800)', parseInteger)
    .option('--ttl <seconds>', 'Seconds until the message is deleted; ignored with --priority=2', parseInteger)
    .option('--quiet', 'Do not print a confirmation on success', false)
    .option('--verbose', 'Enable verbose logging', false)
    .allowExcessArguments(false)
    .exitOverride()
    // Parse errors are logged through ArgumentError instead
    .configureOutput({ outputError: () => undefined });
}

/**
 * True when -h/--help appears as a flag, not as the value of another flag
 */
export function isHelpRequested(program: Command, args: readonly string[]): boolean {
  const valueFlags = new Set(
    program.options
      .filter((option) => option.required)
      .flatMap((option) => [option.long, option.short])
      .filter((flag): flag is string => flag !== undefined)
  );

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--') {
      return false;
    }
    if (arg === '-h' || arg === '--help') {
      return true;
    }
    if (valueFlags.has(arg)) {
      i++;
    }
  }
  return false;
}

export function toRawOptions(options: CliOptions): RawOptions {
  return {
    user: options.user,
    token: options.token,
    message: options.msg,
    sound: options.sound,
    priority: options.priority,
    retry: options.retry,
    expire: options.expire,
    ttl: options.ttl,
    quiet: options.quiet,
  };
}
