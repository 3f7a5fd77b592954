/**
 * @fileoverview Public API for @bizcal/cli.
 */

export { buildProgram, run } from './program.js';
export type { CliDeps } from './program.js';

export { renderMonth, concatMonths, monthSequence, renderExport, MONTH_WIDTH } from './render.js';
export type { RenderOptions } from './render.js';

export { loadConfig, getConfigSummary, configSchema, envMapping } from './config/index.js';
export type { Config } from './config/index.js';
