#!/usr/bin/env node
import { handleError } from '../utils/errors.js';
import { run } from './run.js';

run(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    process.exitCode = handleError(error);
  });
