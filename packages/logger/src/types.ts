/**
 * @fileoverview Type definitions for the bizcal logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity that gets written.
 * - 'error': failures surfaced to the user
 * - 'warn': suspicious but recoverable conditions
 * - 'info': normal operations
 * - 'debug': cache hits/misses, adapter construction
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env['NODE_ENV'] === 'production',
 *   stderr: true,
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   */
  level: LogLevel;

  /**
   * Machine-readable JSON (true) or human-readable lines (false).
   * @default true in production, false otherwise
   */
  json?: boolean;

  /**
   * Also write to this file.
   */
  filePath?: string;

  /**
   * Write to the console.
   * @default true
   */
  console?: boolean;

  /**
   * Route every console level to stderr, keeping stdout for command output.
   * @default false
   */
  stderr?: boolean;

  /**
   * Extra destination stream (used by tests and embedding applications).
   */
  stream?: NodeJS.WritableStream;
}

/**
 * Context fields bound to a child logger.
 */
export interface ChildLoggerContext {
  component?: string;
  kind?: string;
  code?: string;
  calendar?: string;
  [key: string]: unknown;
}

export type Logger = WinstonLogger;
