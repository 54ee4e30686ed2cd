#!/usr/bin/env node

/**
 * CLI entry point for the research-desk command
 */

// Load environment variables from .env file
import 'dotenv/config';

import chalk from 'chalk';
import { main } from './cli/program.js';
import { formatCommandError } from './commands/errors.js';

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`${chalk.red(formatCommandError(error))}\n`);
    process.exitCode = 1;
  });
