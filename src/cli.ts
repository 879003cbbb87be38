#!/usr/bin/env node

/**
 * CLI entrypoint. Substantive logic resides in ./cli/commands.
 */
import { createCli } from './cli/program.js';
import { handleError } from './cli/utils/errors.js';

createCli()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    handleError(err);
    process.exit(1);
  });
