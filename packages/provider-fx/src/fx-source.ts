/**
 * Data source over a reference-rate REST API.
 *
 * The upstream publishes one rate per currency pair per business day, so a
 * daily bar carries the rate as open, high, low and close with zero volume.
 * There is no intraday data.
 */

import type { z } from "zod";
import {
  DataStandardizationError,
  NotSupportedError,
  SymbolValidationError,
  addDays,
  assertIntervalSupported,
  isSymbolValidationError,
  normalizeDate,
  projectBars,
} from "@marketsync/contracts";
import type {
  AssetClass,
  AssetMetadata,
  BarField,
  BarRow,
  DataSource,
  DataSourceCapabilities,
  HistoricalBar,
  IntradayBar,
  Interval,
  Quote,
  SymbolListing,
} from "@marketsync/contracts";
import { createNullLogger, type Logger } from "@marketsync/logger";
import type { ResilientTransport } from "@marketsync/transport";
import { CurrenciesSchema, LatestSchema, TimeSeriesSchema } from "./schemas.js";

/** Days fetched before the range so the first bar has a previous rate */
const LOOKBACK_DAYS = 7;

export interface FxDataSourceConfig {
  transport: ResilientTransport;

  /** Pairs making up the directory, e.g. `["USDCNY", "EURUSD"]` */
  pairs: string[];

  logger?: Logger;

  /** Provider id. Defaults to "frankfurter". */
  id?: string;

  /** Suffix of the composite code. Defaults to "FX". */
  exchange?: string;
}

export interface CurrencyPair {
  code: string;
  base: string;
  quote: string;
}

/**
 * Foreign-exchange reference rates.
 *
 * @example
 * ```typescript
 * const source = new FxDataSource({ transport, pairs: ['USDCNY'] });
 * const bars = await source.fetchDailyBars('USD/CNY', '2024-01-02', '2024-01-05');
 * ```
 */
export class FxDataSource implements DataSource {
  readonly id: string;
  readonly assetClass: AssetClass = "fx";
  readonly capabilities: DataSourceCapabilities = {
    intraday: [],
    realtimeQuote: true,
    session: false,
  };

  private readonly transport: ResilientTransport;
  private readonly logger: Logger;
  private readonly exchange: string;
  private readonly pairs: string[];
  private currencies: Promise<Record<string, string>> | null = null;

  constructor(config: FxDataSourceConfig) {
    this.transport = config.transport;
    this.id = config.id ?? "frankfurter";
    this.exchange = (config.exchange ?? "FX").toUpperCase();
    this.pairs = config.pairs;
    this.logger = (config.logger ?? createNullLogger()).child({ component: "provider", provider: this.id });
  }

  /**
   * Accepts `USDCNY`, `usd/cny`, `USD-CNY` and `USDCNY.FX`.
   *
   * @throws SymbolValidationError for anything else
   */
  parsePair(raw: string): CurrencyPair {
    let symbol = raw.trim().toUpperCase();
    const suffix = `.${this.exchange}`;
    if (symbol.endsWith(suffix)) {
      symbol = symbol.slice(0, -suffix.length);
    }
    symbol = symbol.replace(/[/\-_]/g, "");

    const match = /^([A-Z]{3})([A-Z]{3})$/.exec(symbol);
    if (!match?.[1] || !match[2] || match[1] === match[2]) {
      throw new SymbolValidationError(`"${raw}" is not a currency pair`, { symbol: raw });
    }
    return { code: symbol, base: match[1], quote: match[2] };
  }

  private parse<S extends z.ZodTypeAny>(schema: S, payload: unknown, what: string): z.output<S> {
    const result = schema.safeParse(payload);
    if (!result.success) {
      throw new DataStandardizationError(`${this.id} returned an unexpected ${what} payload`, {
        provider: this.id,
        issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
    }
    return result.data;
  }

  /**
   * Currency list, fetched once per instance. A failed fetch is retried on
   * the next call.
   */
  private async getCurrencies(): Promise<Record<string, string>> {
    let currencies = this.currencies;
    if (!currencies) {
      currencies = this.transport.get<unknown>("/currencies").then(
        (payload) => this.parse(CurrenciesSchema, payload, "currencies"),
        (error: unknown) => {
          this.currencies = null;
          throw error;
        }
      );
      this.currencies = currencies;
    }
    return currencies;
  }

  private toListing(pair: CurrencyPair): SymbolListing {
    return {
      code: pair.code,
      displayName: `${pair.base}/${pair.quote}`,
      fullCode: `${pair.code}.${this.exchange}`,
      exchange: this.exchange,
      assetType: "fx",
      listingDate: null,
      isActive: true,
    };
  }

  /**
   * The configured pairs whose currencies the upstream publishes.
   */
  async listSymbols(): Promise<SymbolListing[]> {
    this.currencies = null;
    const currencies = await this.getCurrencies();

    const listings: SymbolListing[] = [];
    for (const raw of this.pairs) {
      const pair = this.parsePair(raw);
      if (currencies[pair.base] === undefined || currencies[pair.quote] === undefined) {
        this.logger.warn("Configured pair not published upstream", { symbol: pair.code });
        continue;
      }
      listings.push(this.toListing(pair));
    }

    this.logger.info("Directory pulled", { count: listings.length, currencies: Object.keys(currencies).length });
    return listings;
  }

  async fetchDailyBars(code: string, startDate: string, endDate: string): Promise<HistoricalBar[]> {
    const pair = this.parsePair(code);
    const start = normalizeDate(startDate);
    const end = normalizeDate(endDate);
    if (start > end) {
      return [];
    }

    const payload = await this.transport.get<unknown>(`/${addDays(start, -LOOKBACK_DAYS)}..${end}`, {
      from: pair.base,
      to: pair.quote,
    });
    const series = this.parse(TimeSeriesSchema, payload, "time series");

    const bars: HistoricalBar[] = [];
    let previous: number | null = null;
    for (const date of Object.keys(series.rates).sort()) {
      const rate = series.rates[date]?.[pair.quote];
      if (rate === undefined) {
        continue;
      }
      if (date >= start && date <= end) {
        bars.push({
          code: pair.code,
          name: `${pair.base}/${pair.quote}`,
          assetType: "fx",
          date,
          open: rate,
          high: rate,
          low: rate,
          close: rate,
          volume: 0,
          turnover: null,
          pctChange: previous === null || previous === 0 ? null : Math.round(((rate - previous) / previous) * 1e6) / 1e4,
        });
      }
      previous = rate;
    }

    this.logger.debug("Daily bars fetched", { symbol: pair.code, start, end, count: bars.length });
    return bars;
  }

  async getDailyBars(
    symbol: string,
    startDate: string,
    endDate: string,
    fields?: readonly BarField[]
  ): Promise<BarRow[]> {
    return projectBars(await this.fetchDailyBars(symbol, startDate, endDate), fields);
  }

  async getIntradayBars(symbol: string, interval: Interval, startDate: string, endDate: string): Promise<IntradayBar[]> {
    assertIntervalSupported(this, interval);
    throw new NotSupportedError(`${this.id} does not serve intraday bars`, {
      provider: this.id,
      capability: `intraday:${interval}`,
      symbol,
      startDate,
      endDate,
    });
  }

  async getRealtimeQuote(symbol: string): Promise<Quote> {
    const pair = this.parsePair(symbol);
    const latest = this.parse(
      LatestSchema,
      await this.transport.get<unknown>("/latest", { from: pair.base, to: pair.quote }),
      "latest"
    );

    const rate = latest.rates[pair.quote];
    if (rate === undefined) {
      throw new DataStandardizationError(`${this.id} returned no ${pair.quote} rate`, {
        provider: this.id,
        symbol: pair.code,
      });
    }

    return {
      code: pair.code,
      price: rate,
      open: null,
      high: null,
      low: null,
      previousClose: null,
      volume: null,
      timestamp: `${normalizeDate(latest.date)}T00:00:00.000Z`,
    };
  }

  async validateSymbol(symbol: string): Promise<boolean> {
    try {
      await this.getAssetMetadata(symbol);
      return true;
    } catch (error) {
      if (isSymbolValidationError(error)) {
        return false;
      }
      throw error;
    }
  }

  async getAssetMetadata(symbol: string): Promise<AssetMetadata> {
    const pair = this.parsePair(symbol);
    const currencies = await this.getCurrencies();
    if (currencies[pair.base] === undefined || currencies[pair.quote] === undefined) {
      throw new SymbolValidationError(`Pair "${pair.code}" is not published by ${this.id}`, { symbol });
    }

    const listing = this.toListing(pair);
    return {
      fullCode: listing.fullCode,
      name: listing.displayName,
      assetType: listing.assetType,
      listingDate: listing.listingDate,
    };
  }
}
