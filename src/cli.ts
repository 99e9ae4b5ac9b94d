#!/usr/bin/env node
import 'dotenv/config';
import { main } from './cli/program';
import { logger } from './utils/logger';

process.on('SIGINT', () => {
  logger.warn('Received SIGINT, stopping');
  process.exit(130);
});

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error(`Unhandled error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  });
