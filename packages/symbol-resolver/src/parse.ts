/**
 * Symbol shape parsing
 * Classifies raw user input before it is looked up in the directory
 */

import { isKnownExchange, resolveExchange } from './aliases.js';
import type { ParsedSymbol } from './types.js';

const DOTTED = /^([A-Za-z0-9]+)\.([A-Za-z0-9]+)$/;
const BARE_CODE = /^[A-Za-z0-9]+$/;
const ALPHA = /^[A-Za-z]+$/;

function qualified(code: string, exchange: string): ParsedSymbol {
  const upperCode = code.toUpperCase();
  const canonical = resolveExchange(exchange);
  return { kind: 'qualified', code: upperCode, exchange: canonical, fullCode: `${upperCode}.${canonical}` };
}

/**
 * Parse a raw symbol into its shape
 *
 * Dotted input is exchange-qualified in either order. A known exchange wins
 * the side it appears on; otherwise an alphabetic right-hand side is taken
 * as the exchange.
 *
 * @returns null for empty input
 *
 * @example
 * ```typescript
 * parseSymbol('000001.SZ');
 * // → { kind: 'qualified', code: '000001', exchange: 'SZ', fullCode: '000001.SZ' }
 *
 * parseSymbol('SZSE.000001');
 * // → { kind: 'qualified', code: '000001', exchange: 'SZ', fullCode: '000001.SZ' }
 *
 * parseSymbol('btcusdt');
 * // → { kind: 'code', code: 'BTCUSDT' }
 *
 * parseSymbol('Ping An');
 * // → { kind: 'name', fragment: 'Ping An' }
 * ```
 */
export function parseSymbol(raw: string): ParsedSymbol | null {
  const trimmed = raw.trim();
  if (!trimmed) {
    return null;
  }

  const dotted = DOTTED.exec(trimmed);
  if (dotted?.[1] && dotted[2]) {
    const left = dotted[1];
    const right = dotted[2];
    if (isKnownExchange(right)) {
      return qualified(left, right);
    }
    if (isKnownExchange(left)) {
      return qualified(right, left);
    }
    if (ALPHA.test(right)) {
      return qualified(left, right);
    }
  }

  if (BARE_CODE.test(trimmed)) {
    return { kind: 'code', code: trimmed.toUpperCase() };
  }

  return { kind: 'name', fragment: trimmed };
}
