#!/usr/bin/env node

/**
 * bizcal command line entry point
 */

// Load environment variables from .env file
import 'dotenv/config';

import { CalendarHub } from '@bizcal/calendar-hub';
import { attachGlobalHandlers, createLogger } from '@bizcal/logger';
import { getConfigSummary, loadConfig } from './config/index.js';
import { run } from './program.js';

function main(): number {
  const config = loadConfig();

  // stdout carries command output; every log line goes to stderr
  const logger = createLogger({
    level: config.logging.level,
    json: config.logging.format === 'json',
    stderr: true,
    ...(config.logging.filePath ? { filePath: config.logging.filePath } : {}),
  });
  attachGlobalHandlers(logger);
  logger.debug('Configuration loaded', getConfigSummary(config));

  const hub = CalendarHub.default({ logger, searchHorizonDays: config.calendar.searchHorizonDays });

  return run(process.argv.slice(2), {
    hub,
    config,
    logger,
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
  });
}

try {
  process.exitCode = main();
} catch (error) {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
}
