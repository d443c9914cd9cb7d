#!/usr/bin/env node
import { runCli } from './index.js';
import { logError } from './utils/logging.js';

runCli()
  .then(() => {
    process.exit(0);
  })
  .catch((error: unknown) => {
    logError(error instanceof Error ? (error.stack ?? error.message) : String(error));
    process.exit(1);
  });
