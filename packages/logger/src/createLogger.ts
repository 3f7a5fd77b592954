/**
 * @fileoverview Main logger factory for bizcal.
 * Creates configured winston logger instances with structured fields and
 * flexible transports.
 */

import winston from 'winston';
import type { ChildLoggerContext, LoggerConfig, Logger } from './types.js';
import { standardFields, prettyPrint } from './formats.js';

const { format } = winston;

const ALL_LEVELS = ['error', 'warn', 'info', 'debug'];

/**
 * Creates a configured logger instance.
 *
 * - JSON in production, pretty lines otherwise (override with `json`)
 * - console, file and stream transports
 * - optional stderr routing so command output on stdout stays clean
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Hub ready', { sources: ['exchange', 'country', 'rfr'] });
 * ```
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', json: false, stderr: true });
 * const hubLogger = logger.child({ component: 'hub' });
 * hubLogger.debug('Calendar constructed', { kind: 'exchange', code: 'XPAR', cache: 'miss' });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    stderr = false,
    stream,
  } = config;

  const logFormat = format.combine(standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
        stderrLevels: stderr ? ALL_LEVELS : ['error'],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        // files are always JSON, whatever the console shows
        format: format.combine(standardFields, format.json()),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  if (stream) {
    transports.push(new winston.transports.Stream({ stream, level, format: logFormat }));
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    // errorHandler.ts owns process exit
    exitOnError: false,
    // a logger with every output disabled stays quiet instead of warning
    silent: transports.length === 0,
  });
}

/**
 * Creates a child logger whose entries all carry `context`.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * const providerLogger = createChildLogger(logger, { component: 'providers', kind: 'country' });
 * providerLogger.info('Holiday year loaded', { code: 'FR', year: 2026 });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
