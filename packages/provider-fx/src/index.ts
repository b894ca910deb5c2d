/**
 * @marketsync/provider-fx
 *
 * Reference-rate adapter for foreign-exchange pairs.
 *
 * @packageDocumentation
 */

export { FxDataSource } from "./fx-source.js";
export type { FxDataSourceConfig, CurrencyPair } from "./fx-source.js";
export { CurrenciesSchema, TimeSeriesSchema, LatestSchema } from "./schemas.js";
export type { TimeSeries, Latest } from "./schemas.js";
