#!/usr/bin/env node
import 'dotenv/config';
import { runCli } from './run.js';
import { logger } from '../lib/logger.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
