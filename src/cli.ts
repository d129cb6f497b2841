#!/usr/bin/env node
import { runCli } from './index';
import { logger } from './logger';
import { errorMessage } from './errors';

runCli().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.error({ err: errorMessage(error) }, 'datesort failed.');
    process.exitCode = 1;
  }
);
