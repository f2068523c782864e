#!/usr/bin/env node
import { defaultDeps, runCli } from './cli/program.js';

const controller = new AbortController();
process.once('SIGINT', () => {
  process.stderr.write('Cancelling...\n');
  controller.abort();
});

runCli(process.argv.slice(2), defaultDeps(controller.signal))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('Fatal error:', err);
    process.exitCode = 1;
  });
