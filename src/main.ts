#!/usr/bin/env node

import { createProgram, promptConfirm } from './cli.js';
import { logger } from './logger.js';

const program = createProgram({
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
  confirm: promptConfirm
});

void program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`filetwins: ${message}\n`);
  logger.debug('command failed', { error });
  process.exitCode = 1;
});
