#!/usr/bin/env node
import { run } from './cli.js';
import { loggers } from './lib/logger.js';

run(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    loggers.cli.error('Unexpected failure', error instanceof Error ? error : new Error(String(error)));
    process.exitCode = 1;
  });
