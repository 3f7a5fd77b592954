/**
 * Configuration loading
 */

import { configSchema, envMapping, type Config } from './schema.js';
import type { Logger } from '@bizcal/logger';

export { configSchema, envMapping, type Config };

type RawConfig = Record<string, Record<string, unknown>>;

/**
 * Load configuration from environment variables and defaults.
 *
 * @throws {Error} listing every invalid setting
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger): Config {
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, parseEnvValue(value));
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  if (logger) {
    logger.debug('Configuration loaded', getConfigSummary(result.data));
  }

  return result.data;
}

/**
 * Flat view of the settings that shape command output.
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    logLevel: config.logging.level,
    logFormat: config.logging.format,
    searchHorizonDays: config.calendar.searchHorizonDays,
    dayFirst: config.calendar.dayFirst,
    combineMode: config.calendar.combineMode,
    color: config.output.color,
  };
}

function setNestedProperty(obj: RawConfig, path: string, value: unknown): void {
  const [section, key] = path.split('.');
  if (!section || !key) return;
  const target = (obj[section] ??= {});
  target[key] = value;
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;

  const num = Number(value);
  if (!isNaN(num)) return num;

  return value;
}
