/**
 * Exchange aliases
 * Maps alternative exchange names to the suffix used in composite codes
 */

/**
 * Explicit exchange alias mappings
 */
const EXCHANGE_ALIASES: Record<string, string> = {
  SZSE: 'SZ',
  XSHE: 'SZ',
  SSE: 'SH',
  SHSE: 'SH',
  XSHG: 'SH',
  BSE: 'BJ',
};

/**
 * Exchanges recognised on either side of a qualified symbol
 */
const KNOWN_EXCHANGES = new Set(['SH', 'SZ', 'BJ', 'BINANCE', 'FX']);

/**
 * Resolve an exchange name to its canonical suffix
 *
 * @example
 * ```typescript
 * resolveExchange('szse')  // → 'SZ'
 * resolveExchange('SH')    // → 'SH'
 * ```
 */
export function resolveExchange(raw: string): string {
  const upper = raw.trim().toUpperCase();
  return EXCHANGE_ALIASES[upper] ?? upper;
}

/**
 * True for canonical exchanges and their aliases
 */
export function isKnownExchange(raw: string): boolean {
  return KNOWN_EXCHANGES.has(resolveExchange(raw));
}
