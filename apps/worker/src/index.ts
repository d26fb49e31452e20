#!/usr/bin/env node
import { runCli, EXIT_FAILED } from './cli.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('Fatal error:', err);
    process.exitCode = EXIT_FAILED;
  });
