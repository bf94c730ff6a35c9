#!/usr/bin/env node
import { runCli } from './cli/run-cli.js';
import { CliUsageError, USAGE } from './cli/cli-args.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    if (e instanceof CliUsageError) {
      console.error(`${e.message}\n\n${USAGE}`);
    } else {
      console.error(e);
    }
    process.exitCode = 1;
  });
