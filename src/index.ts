#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { runCli } from './cli';
import { loadConfig } from './config';
import { sleep } from './realtime';
import { createTimetableClient } from './timetable/client';
import { createLogger } from './utils/logger';

dotenv.config();

const config = loadConfig();
const logger = createLogger(config.logLevel);
const client = createTimetableClient(config, logger);

runCli(process.argv.slice(2), {
  config,
  client,
  logger,
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
  clear: () => console.clear(),
  sleep,
  now: () => new Date(),
})
  .then((exitCode) => {
    if (exitCode !== null) process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.error('Unexpected failure', { message: String(error) });
    process.exitCode = 1;
  });
