#!/usr/bin/env node

import { runHook } from './hook.js';
import { createLogger } from './logger.js';

const log = createLogger('hook');

runHook(process.argv.slice(2)).then(
  () => {
    process.exitCode = 0;
  },
  (error: unknown) => {
    log.debug(`Unexpected error: ${String(error)}`);
    process.exitCode = 0;
  }
);
