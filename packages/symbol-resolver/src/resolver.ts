/**
 * Resolves user input to a directory record of one asset class
 */

import { SymbolValidationError, type SymbolRecord } from '@marketsync/contracts';
import { createNullLogger, type Logger } from '@marketsync/logger';
import { parseSymbol } from './parse.js';
import type { SymbolDirectory, ValidityResult } from './types.js';

const INVALID: ValidityResult = {
  valid: false,
  code: '',
  name: '',
  assetType: null,
  listingDate: null,
};

export interface SymbolResolverOptions {
  logger?: Logger;
}

/**
 * Symbol resolver over a local directory
 *
 * Lookup order:
 * 1. Exact code (as given, then upper-cased)
 * 2. Exchange-qualified code, matched on the composite code
 * 3. Case-insensitive substring of the display name, first by code
 *
 * @example
 * ```typescript
 * const resolver = new SymbolResolver(store);
 * await resolver.resolve('000001.SZ');   // Ping An Bank
 * await resolver.resolve('ping an');     // Ping An Bank
 * ```
 */
export class SymbolResolver {
  private readonly directory: SymbolDirectory;
  private readonly logger: Logger;

  constructor(directory: SymbolDirectory, options: SymbolResolverOptions = {}) {
    this.directory = directory;
    this.logger = (options.logger ?? createNullLogger()).child({ component: 'symbol-resolver' });
  }

  async resolve(raw: string): Promise<SymbolRecord | null> {
    const parsed = parseSymbol(raw);
    if (!parsed) {
      return null;
    }

    const trimmed = raw.trim();
    const exact = await this.directory.getSymbol(trimmed);
    if (exact) {
      return exact;
    }
    const upper = trimmed.toUpperCase();
    if (upper !== trimmed) {
      const upperMatch = await this.directory.getSymbol(upper);
      if (upperMatch) {
        return upperMatch;
      }
    }

    if (parsed.kind === 'qualified') {
      const byFullCode = await this.directory.findByFullCode(parsed.fullCode);
      if (byFullCode) {
        return byFullCode;
      }
    }

    const matches = await this.directory.searchByName(trimmed);
    const [first] = matches;
    if (matches.length > 1 && first) {
      this.logger.debug('Ambiguous name match', { symbol: trimmed, matches: matches.length, chosen: first.code });
    }
    return first ?? null;
  }

  /**
   * Validity check. Unknown and inactive symbols are both invalid.
   */
  async isValid(raw: string): Promise<ValidityResult> {
    const record = await this.resolve(raw);
    if (!record || !record.isActive) {
      return { ...INVALID };
    }
    return {
      valid: true,
      code: record.code,
      name: record.displayName,
      assetType: record.assetType,
      listingDate: record.listingDate,
    };
  }

  /**
   * Resolve to an active record.
   *
   * @throws SymbolValidationError when the symbol is unknown or inactive
   */
  async resolveActive(raw: string): Promise<SymbolRecord> {
    const record = await this.resolve(raw);
    if (!record) {
      throw new SymbolValidationError(`Unknown symbol "${raw}"`, { symbol: raw });
    }
    if (!record.isActive) {
      throw new SymbolValidationError(`Symbol "${raw}" is inactive`, { symbol: raw, code: record.code });
    }
    return record;
  }
}
