/**
 * Data source over a spot exchange's public REST API.
 *
 * Directory from `exchangeInfo`, daily and intraday bars from `klines`
 * (paged), quotes from the 24h ticker. All requests go through the shared
 * resilient transport.
 */

import type { z } from "zod";
import {
  DataStandardizationError,
  SymbolValidationError,
  addDays,
  assertIntervalSupported,
  formatDate,
  isDataRetrievalError,
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
import {
  ExchangeInfoSchema,
  KlinesSchema,
  Ticker24hSchema,
  type ExchangeSymbol,
  type Kline,
} from "./schemas.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CryptoDataSourceConfig {
  transport: ResilientTransport;
  logger?: Logger;

  /** Provider id. Defaults to "binance". */
  id?: string;

  /** Suffix of the composite code, e.g. `BTCUSDT.BINANCE`. Defaults to "BINANCE". */
  exchange?: string;

  /** Keep only pairs quoted in these assets. All pairs when omitted. */
  quoteAssets?: string[];

  /** Klines per request. Defaults to 1000, the exchange maximum. */
  pageSize?: number;
}

function utcMidnight(date: string): number {
  return Date.parse(`${date}T00:00:00.000Z`);
}

/**
 * Cryptocurrency spot pairs.
 *
 * @example
 * ```typescript
 * const transport = new ResilientTransport({ provider: 'binance', baseUrl: 'https://api.binance.com' });
 * const source = new CryptoDataSource({ transport, quoteAssets: ['USDT'] });
 *
 * const bars = await source.fetchDailyBars('BTCUSDT', '2024-01-01', '2024-01-31');
 * ```
 */
export class CryptoDataSource implements DataSource {
  readonly id: string;
  readonly assetClass: AssetClass = "crypto";
  readonly capabilities: DataSourceCapabilities = {
    intraday: ["1m", "5m", "15m", "30m", "1h", "4h"],
    realtimeQuote: true,
    session: false,
  };

  private readonly transport: ResilientTransport;
  private readonly logger: Logger;
  private readonly exchange: string;
  private readonly quoteAssets: Set<string> | null;
  private readonly pageSize: number;

  /** symbol → display name, filled from directory pulls and lookups */
  private readonly names = new Map<string, string>();

  constructor(config: CryptoDataSourceConfig) {
    this.transport = config.transport;
    this.id = config.id ?? "binance";
    this.exchange = (config.exchange ?? "BINANCE").toUpperCase();
    this.quoteAssets =
      config.quoteAssets && config.quoteAssets.length > 0
        ? new Set(config.quoteAssets.map((asset) => asset.toUpperCase()))
        : null;
    this.pageSize = config.pageSize ?? 1000;
    this.logger = (config.logger ?? createNullLogger()).child({ component: "provider", provider: this.id });
  }

  /**
   * Accepts `BTCUSDT`, `btcusdt`, `BTC/USDT`, `BTC-USDT` and
   * `BTCUSDT.BINANCE`.
   *
   * @throws SymbolValidationError for anything else
   */
  normalizeSymbol(raw: string): string {
    let symbol = raw.trim().toUpperCase();
    const suffix = `.${this.exchange}`;
    if (symbol.endsWith(suffix)) {
      symbol = symbol.slice(0, -suffix.length);
    }
    symbol = symbol.replace(/[/\-_]/g, "");

    if (!/^[A-Z0-9]{2,30}$/.test(symbol)) {
      throw new SymbolValidationError(`"${raw}" is not a valid trading pair`, { symbol: raw });
    }
    return symbol;
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

  private toListing(entry: ExchangeSymbol): SymbolListing {
    return {
      code: entry.symbol,
      displayName: `${entry.baseAsset}/${entry.quoteAsset}`,
      fullCode: `${entry.symbol}.${this.exchange}`,
      exchange: this.exchange,
      assetType: "crypto",
      listingDate: null,
      isActive: entry.status === "TRADING",
    };
  }

  async listSymbols(): Promise<SymbolListing[]> {
    const info = this.parse(ExchangeInfoSchema, await this.transport.get<unknown>("/api/v3/exchangeInfo"), "exchangeInfo");

    const listings = info.symbols
      .filter((entry) => this.quoteAssets === null || this.quoteAssets.has(entry.quoteAsset.toUpperCase()))
      .map((entry) => this.toListing(entry));

    for (const listing of listings) {
      this.names.set(listing.code, listing.displayName);
    }

    this.logger.info("Directory pulled", { count: listings.length, total: info.symbols.length });
    return listings;
  }

  /**
   * The exchange answers 400 for unknown symbols.
   */
  private async findListing(symbol: string): Promise<SymbolListing | null> {
    let payload: unknown;
    try {
      payload = await this.transport.get<unknown>("/api/v3/exchangeInfo", { symbol });
    } catch (error) {
      if (isDataRetrievalError(error) && error.statusCode === 400) {
        return null;
      }
      throw error;
    }

    const entry = this.parse(ExchangeInfoSchema, payload, "exchangeInfo").symbols.find((s) => s.symbol === symbol);
    if (!entry) {
      return null;
    }
    const listing = this.toListing(entry);
    this.names.set(listing.code, listing.displayName);
    return listing;
  }

  private async nameOf(symbol: string): Promise<string> {
    const cached = this.names.get(symbol);
    if (cached) {
      return cached;
    }
    const listing = await this.findListing(symbol);
    if (!listing) {
      throw new SymbolValidationError(`Symbol "${symbol}" is not listed on ${this.exchange}`, { symbol });
    }
    return listing.displayName;
  }

  /**
   * Fetches klines in `[startMs, endMs]`, following pages until a short one.
   */
  private async fetchKlines(symbol: string, interval: string, startMs: number, endMs: number): Promise<Kline[]> {
    const klines: Kline[] = [];
    let from = startMs;

    for (;;) {
      const payload = await this.transport.get<unknown>("/api/v3/klines", {
        symbol,
        interval,
        startTime: from,
        endTime: endMs,
        limit: this.pageSize,
      });
      const page = this.parse(KlinesSchema, payload, "klines");
      klines.push(...page);

      const last = page[page.length - 1];
      if (page.length < this.pageSize || !last) {
        break;
      }
      from = last[0] + 1;
    }

    return klines;
  }

  /**
   * One extra day before `startDate` is requested so the first bar's
   * percent change has a previous close.
   */
  async fetchDailyBars(code: string, startDate: string, endDate: string): Promise<HistoricalBar[]> {
    const symbol = this.normalizeSymbol(code);
    const start = normalizeDate(startDate);
    const end = normalizeDate(endDate);
    if (start > end) {
      return [];
    }

    const name = await this.nameOf(symbol);
    const klines = await this.fetchKlines(symbol, "1d", utcMidnight(addDays(start, -1)), utcMidnight(end) + DAY_MS - 1);

    const bars: HistoricalBar[] = [];
    let previousClose: number | null = null;
    for (const [openTime, open, high, low, close, volume, , quoteVolume, trades] of klines) {
      const date = formatDate(new Date(openTime));
      if (date >= start && date <= end) {
        bars.push({
          code: symbol,
          name,
          assetType: "crypto",
          date,
          open,
          high,
          low,
          close,
          volume,
          turnover: quoteVolume,
          pctChange:
            previousClose === null || previousClose === 0
              ? null
              : Math.round(((close - previousClose) / previousClose) * 1e6) / 1e4,
          extras: { trades },
        });
      }
      previousClose = close;
    }

    this.logger.debug("Daily bars fetched", { symbol, start, end, count: bars.length });
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
    const code = this.normalizeSymbol(symbol);
    const start = normalizeDate(startDate);
    const end = normalizeDate(endDate);

    const klines = await this.fetchKlines(code, interval, utcMidnight(start), utcMidnight(end) + DAY_MS - 1);
    return klines.map(([openTime, open, high, low, close, volume]) => ({
      code,
      timestamp: new Date(openTime).toISOString(),
      open,
      high,
      low,
      close,
      volume,
    }));
  }

  async getRealtimeQuote(symbol: string): Promise<Quote> {
    const code = this.normalizeSymbol(symbol);
    const ticker = this.parse(
      Ticker24hSchema,
      await this.transport.get<unknown>("/api/v3/ticker/24hr", { symbol: code }),
      "ticker"
    );

    return {
      code,
      price: ticker.lastPrice,
      open: ticker.openPrice,
      high: ticker.highPrice,
      low: ticker.lowPrice,
      previousClose: ticker.prevClosePrice,
      volume: ticker.volume,
      timestamp: new Date(ticker.closeTime).toISOString(),
    };
  }

  async validateSymbol(symbol: string): Promise<boolean> {
    try {
      return (await this.findListing(this.normalizeSymbol(symbol))) !== null;
    } catch (error) {
      if (isSymbolValidationError(error)) {
        return false;
      }
      throw error;
    }
  }

  async getAssetMetadata(symbol: string): Promise<AssetMetadata> {
    const code = this.normalizeSymbol(symbol);
    const listing = await this.findListing(code);
    if (!listing) {
      throw new SymbolValidationError(`Symbol "${symbol}" is not listed on ${this.exchange}`, { symbol });
    }
    return {
      fullCode: listing.fullCode,
      name: listing.displayName,
      assetType: listing.assetType,
      listingDate: listing.listingDate,
    };
  }
}
