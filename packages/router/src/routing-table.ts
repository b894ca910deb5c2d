/**
 * Symbol → asset class routing.
 *
 * A table holds explicit symbol entries and, optionally, exchange suffixes
 * that route any `CODE.SUFFIX` symbol without its own entry. Keys are
 * trimmed and upper-cased.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { isAssetType, type AssetClass, type AssetType } from '@marketsync/contracts';
import type { RouteTarget } from './types.js';

const AssetClassSchema = z.enum(['equity', 'bond', 'crypto', 'fx']);

const AssetTypeSchema = z.custom<AssetType>((value) => isAssetType(value), { message: 'Unknown asset type' });

/**
 * Routing file layout.
 *
 * @example
 * ```json
 * {
 *   "symbols": {
 *     "000001.SZ": { "assetClass": "equity", "kind": "equity" },
 *     "BTCUSDT": { "assetClass": "crypto" }
 *   },
 *   "suffixes": { "SH": "equity", "BINANCE": "crypto" }
 * }
 * ```
 */
export const RoutingTableSchema = z.object({
  symbols: z
    .record(
      z.object({
        assetClass: AssetClassSchema,
        kind: AssetTypeSchema.optional(),
      })
    )
    .default({}),
  suffixes: z.record(AssetClassSchema).default({}),
});

export type RoutingTableData = z.input<typeof RoutingTableSchema>;

function normalizeKey(symbol: string): string {
  return symbol.trim().toUpperCase();
}

export class RoutingTable {
  private symbols = new Map<string, RouteTarget>();
  private suffixes = new Map<string, AssetClass>();

  constructor(data: RoutingTableData = {}) {
    const parsed = RoutingTableSchema.parse(data);
    for (const [symbol, entry] of Object.entries(parsed.symbols)) {
      this.symbols.set(normalizeKey(symbol), { assetClass: entry.assetClass, kind: entry.kind ?? null });
    }
    for (const [suffix, assetClass] of Object.entries(parsed.suffixes)) {
      this.suffixes.set(normalizeKey(suffix), assetClass);
    }
  }

  /**
   * Explicit entry first, then the exchange suffix.
   */
  route(symbol: string): RouteTarget | null {
    const key = normalizeKey(symbol);
    const explicit = this.symbols.get(key);
    if (explicit) {
      return explicit;
    }

    const dot = key.lastIndexOf('.');
    if (dot > 0) {
      const assetClass = this.suffixes.get(key.slice(dot + 1));
      if (assetClass) {
        return { assetClass, kind: null };
      }
    }
    return null;
  }

  /**
   * Explicit symbols routed to `assetClass`, sorted.
   */
  symbolsFor(assetClass: AssetClass): string[] {
    return [...this.symbols.entries()]
      .filter(([, target]) => target.assetClass === assetClass)
      .map(([symbol]) => symbol)
      .sort();
  }

  get size(): number {
    return this.symbols.size;
  }
}

/**
 * Validate an in-memory routing document.
 *
 * @throws Error listing every schema issue
 */
export function parseRoutingTable(data: unknown, source = 'routing table'): RoutingTable {
  const result = RoutingTableSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new Error(`Invalid ${source}:\n${issues.join('\n')}`);
  }
  return new RoutingTable(result.data);
}

/**
 * Read and validate a routing table from a JSON file.
 */
export async function loadRoutingTable(filePath: string): Promise<RoutingTable> {
  const text = await readFile(filePath, 'utf8');

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new Error(`Routing table ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }
  return parseRoutingTable(data, `routing table ${filePath}`);
}
