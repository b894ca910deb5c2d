/**
 * @marketsync/provider-crypto
 *
 * Spot-exchange adapter for cryptocurrency pairs over the resilient
 * transport.
 *
 * @packageDocumentation
 */

export { CryptoDataSource } from "./crypto-source.js";
export type { CryptoDataSourceConfig } from "./crypto-source.js";
export { ExchangeInfoSchema, KlinesSchema, Ticker24hSchema } from "./schemas.js";
export type { ExchangeSymbol, Kline, Ticker24h } from "./schemas.js";
