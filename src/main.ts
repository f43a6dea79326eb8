#!/usr/bin/env node
import 'reflect-metadata';

import { EXIT_CODE } from './modules/app/ticket-runner.service';
import { CLI_NAME, runCli } from './modules/app/ticket-cli';

runCli(process.argv.slice(2)).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (err: unknown) => {
    process.stderr.write(`${CLI_NAME}: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = EXIT_CODE.FATAL;
  },
);
