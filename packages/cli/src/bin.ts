#!/usr/bin/env node
import { configureLogger } from '@wordseed/core';
import { runCli } from './cli.js';

// Library log lines go to stderr so stdout carries only command output
configureLogger({ output: process.stderr });

runCli(process.argv.slice(2), { stdout: process.stdout, stderr: process.stderr })
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
