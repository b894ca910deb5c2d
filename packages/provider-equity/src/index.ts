/**
 * @marketsync/provider-equity
 *
 * Adapter for the session-based upstream serving exchange-listed
 * securities, with a convertible-bond variant over the same upstream.
 *
 * @example
 * ```typescript
 * import { EquityDataSource } from "@marketsync/provider-equity";
 *
 * const source = new EquityDataSource({ upstream, logger });
 * const metadata = await source.getAssetMetadata("000001.SZ");
 * ```
 *
 * @packageDocumentation
 */

export { EquityDataSource, BondDataSource, disambiguateCodes } from "./equity-source.js";
export { FixtureEquityUpstream } from "./fixture-upstream.js";
export type { FixtureInstrument, FixtureRow, FixtureCall } from "./fixture-upstream.js";
export {
  parseUpstreamCode,
  parseQualifiedCode,
  toUpstreamCode,
  toQualifiedCode,
  inferExchange,
} from "./codes.js";
export type { Exchange, InstrumentCode } from "./codes.js";
export { TYPE_CODES, assetTypeFromCode } from "./parse.js";
export { BASIC_FIELDS, DAILY_FIELDS, INTRADAY_FIELDS } from "./types.js";
export type { EquityUpstream, EquityDataSourceConfig, ResultSet, KFrequency } from "./types.js";
