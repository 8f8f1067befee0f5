import { CommanderError } from 'commander';
import type { OutputConfiguration } from 'commander';
import { buildRequestFields, sendNotification, validate } from '../notify/index.js';
import type { Transport } from '../notify/index.js';
import {
  EXIT_SUCCESS,
  reportOutcome,
  reportValidationErrors,
  reportWarnings,
} from '../report/reporter.js';
import { ArgumentError, handleError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { createProgram, isHelpRequested, toRawOptions } from './program.js';
import type { CliOptions } from './types.js';

export interface RunDependencies {
  transport?: Transport;
  endpoint?: string;
  output?: Pick<OutputConfiguration, 'writeOut' | 'writeErr'>;
}

/**
 * parse -> validate -> build -> send -> report.
 * Resolves with the process exit code.
 */
export async function run(args: readonly string[], deps: RunDependencies = {}): Promise<number> {
  const program = createProgram();
  if (deps.output) {
    program.configureOutput(deps.output);
  }

  if (isHelpRequested(program, args)) {
    program.outputHelp();
    return EXIT_SUCCESS;
  }

  try {
    program.parse([...args], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --version exits 0 after printing
      return error.exitCode === 0 ? EXIT_SUCCESS : handleError(ArgumentError.fromCommander(error));
    }
    throw error;
  }

  const cliOptions = program.opts<CliOptions>();
  getLogger().setVerbose(cliOptions.verbose);

  const validation = validate(toRawOptions(cliOptions));
  reportWarnings(validation.warnings);
  if (!validation.ok) {
    return reportValidationErrors(validation.errors);
  }

  const fields = buildRequestFields(validation.options);
  const outcome = await sendNotification(fields, {
    transport: deps.transport,
    endpoint: deps.endpoint,
  });
  return reportOutcome(outcome, { quiet: validation.options.quiet });
}
