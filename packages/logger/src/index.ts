/**
 * @fileoverview Public API exports for @bizcal/logger
 * Structured logging and process error handling for bizcal.
 */

export { createLogger, createChildLogger } from './createLogger.js';

export { attachGlobalHandlers } from './errorHandler.js';

export { standardFields, prettyPrint, renderPrettyLine } from './formats.js';

export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
