#!/usr/bin/env node
/**
 * @fileoverview paperkit-mobility-install entry point
 */

import { formatError } from '@paperkit/core';
import { runCli } from './cli/run.js';

const controller = new AbortController();
for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  // A second signal gets the default handler
  process.once(signal, () => controller.abort(new Error(`Received ${signal}`)));
}

runCli(process.argv.slice(2), {
  platform: process.platform,
  env: process.env,
  signal: controller.signal,
  io: {
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
  },
})
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    console.error(formatError(error));
    process.exit(1);
  });
