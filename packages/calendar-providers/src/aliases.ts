/**
 * Friendly calendar names such as PARIS, NYSE, UK or ESTR.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { CalendarKey } from '@bizcal/contracts';
import { normalizeTicker } from './codes.js';
import { parseTable } from './tables.js';

const aliasTableSchema = z.object({
  aliases: z.record(
    z.object({
      kind: z.enum(['exchange', 'country', 'rfr']),
      code: z.string().min(1),
    })
  ),
});

export const DEFAULT_ALIAS_TABLE = new URL('../data/aliases.json', import.meta.url);

/**
 * Alias keys are written with spaces: `_` and `-` read as a space, and the
 * euro sign as `E`.
 */
export function normalizeAlias(raw: string): string {
  return normalizeTicker(raw.replace(/[_-]/g, ' '));
}

/**
 * Friendly names mapped to calendar keys. Each hub owns its table.
 *
 * @example
 * ```typescript
 * const aliases = AliasTable.load();
 * aliases.resolve('paris');          // { kind: 'exchange', code: 'XPAR' }
 * aliases.resolve('United_Kingdom'); // { kind: 'country', code: 'GB' }
 * aliases.resolve('€STR');           // { kind: 'rfr', code: 'ESTR' }
 * ```
 */
export class AliasTable {
  private readonly entries = new Map<string, CalendarKey>();

  constructor(aliases: Record<string, CalendarKey> = {}) {
    for (const [alias, key] of Object.entries(aliases)) {
      this.entries.set(normalizeAlias(alias), { kind: key.kind, code: key.code });
    }
  }

  /**
   * Reads and validates an alias file, by default the bundled table.
   */
  static load(file: URL | string = DEFAULT_ALIAS_TABLE): AliasTable {
    const table = parseTable(aliasTableSchema, JSON.parse(readFileSync(file, 'utf8')), String(file));
    return new AliasTable(table.aliases);
  }

  /**
   * @returns a copy of the key, or null when the name is not an alias
   */
  resolve(raw: string): CalendarKey | null {
    if (!raw.trim()) {
      return null;
    }
    const key = this.entries.get(normalizeAlias(raw));
    return key ? { ...key } : null;
  }

  /** All aliases, sorted by name. */
  list(): Array<{ alias: string } & CalendarKey> {
    return [...this.entries.entries()]
      .map(([alias, key]) => ({ alias, ...key }))
      .sort((a, b) => a.alias.localeCompare(b.alias));
  }
}
