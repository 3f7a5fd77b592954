/**
 * Calendar code normalization.
 */

/**
 * Trims, upper-cases and collapses inner whitespace.
 *
 * @example
 * ```typescript
 * normalizeCode(' xpar ');        // 'XPAR'
 * normalizeCode('estron   index'); // 'ESTRON INDEX'
 * ```
 */
export function normalizeCode(code: string): string {
  return code.trim().toUpperCase().replace(/\s+/g, ' ');
}

/**
 * Rate tickers additionally spell the euro sign as `E` (`€STR` -> `ESTR`).
 */
export function normalizeTicker(ticker: string): string {
  return normalizeCode(ticker.replace(/€/g, 'E'));
}
