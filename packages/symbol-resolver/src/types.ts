/**
 * Core types for symbol parsing and resolution
 */

import type { AssetType } from '@marketsync/contracts';
import type { LocalStore } from '@marketsync/local-store';

/**
 * Shape of a raw user-supplied symbol.
 *
 * Examples:
 * - `000001`, `BTCUSDT` → code
 * - `000001.SZ`, `SZSE.000001`, `sz.000001` → qualified
 * - `Ping An Bank` → name
 */
export type ParsedSymbol =
  | { kind: 'code'; code: string }
  | { kind: 'qualified'; code: string; exchange: string; fullCode: string }
  | { kind: 'name'; fragment: string };

/**
 * Directory lookups the resolver needs
 */
export type SymbolDirectory = Pick<LocalStore, 'getSymbol' | 'findByFullCode' | 'searchByName'>;

/**
 * Outcome of {@link SymbolResolver.isValid}. Not found and inactive both give
 * `valid: false` with empty fields.
 */
export interface ValidityResult {
  valid: boolean;
  code: string;
  name: string;
  assetType: AssetType | null;
  listingDate: string | null;
}

