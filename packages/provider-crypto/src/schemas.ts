/**
 * Zod schemas for spot-exchange REST responses.
 *
 * Responses are validated before use; a payload that does not match is a
 * standardization failure, not a transport one.
 */

import { z } from "zod";

/** Prices and quantities arrive as decimal strings */
const decimal = z
  .union([z.string(), z.number()])
  .transform((value) => Number(value))
  .refine((value) => Number.isFinite(value), { message: "Expected a finite decimal" });

// ============================================================================
// Exchange info
// ============================================================================

export const ExchangeSymbolSchema = z.object({
  symbol: z.string(),
  status: z.string(),
  baseAsset: z.string(),
  quoteAsset: z.string(),
});

export type ExchangeSymbol = z.infer<typeof ExchangeSymbolSchema>;

export const ExchangeInfoSchema = z.object({
  symbols: z.array(ExchangeSymbolSchema),
});

// ============================================================================
// Klines
// ============================================================================

/**
 * `[openTime, open, high, low, close, volume, closeTime, quoteVolume, trades, ...]`
 */
export const KlineSchema = z
  .tuple([z.number(), decimal, decimal, decimal, decimal, decimal, z.number(), decimal, z.number()])
  .rest(z.unknown());

export type Kline = z.infer<typeof KlineSchema>;

export const KlinesSchema = z.array(KlineSchema);

// ============================================================================
// 24h ticker
// ============================================================================

export const Ticker24hSchema = z.object({
  symbol: z.string(),
  lastPrice: decimal,
  openPrice: decimal,
  highPrice: decimal,
  lowPrice: decimal,
  prevClosePrice: decimal,
  volume: decimal,
  closeTime: z.number(),
});

export type Ticker24h = z.infer<typeof Ticker24hSchema>;
