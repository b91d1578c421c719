#!/usr/bin/env node
import 'dotenv/config';
import { logger } from '@workdrive-upload/sdk';
import { run } from './cli.ts';

try {
  process.exitCode = await run(process.argv.slice(2));
} catch (error) {
  logger.error(error instanceof Error ? (error.stack ?? error.message) : String(error));
  process.exitCode = 1;
}
