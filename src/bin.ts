#!/usr/bin/env node
/**
 * Decimath – CLI executable
 *
 * License: Apache-2.0
 */

import { runCli } from './cli';
import { formatError } from './utils/inspect';

runCli(process.argv.slice(2), {
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    process.stderr.write(`decimath: ${formatError(err).summary}\n`);
    process.exitCode = 1;
  });
