/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

/**
 * CLI configuration schema
 */
export const configSchema = z.object({
  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('warn'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().optional(),
    })
    .default({}),

  calendar: z
    .object({
      searchHorizonDays: z.number().int().positive().default(3660),
      // 01/02/2026 reads as 1 February when true
      dayFirst: z.boolean().default(true),
      combineMode: z.enum(['intersection', 'union']).default('intersection'),
    })
    .default({}),

  output: z
    .object({
      color: z.boolean().default(true),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  BIZCAL_LOG_LEVEL: 'logging.level',
  BIZCAL_LOG_FORMAT: 'logging.format',
  BIZCAL_LOG_FILE: 'logging.filePath',
  BIZCAL_HORIZON_DAYS: 'calendar.searchHorizonDays',
  BIZCAL_DAY_FIRST: 'calendar.dayFirst',
  BIZCAL_COMBINE_MODE: 'calendar.combineMode',
  BIZCAL_COLOR: 'output.color',
};
