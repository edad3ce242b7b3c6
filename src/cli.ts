#!/usr/bin/env node
import { createProgram } from './program.js';
import { errorMessage } from './shared/errors.js';
import { Logger } from './shared/logger.js';

try {
  await createProgram().parseAsync(process.argv);
} catch (err: unknown) {
  Logger.error(errorMessage(err));
  process.exitCode = 1;
}
