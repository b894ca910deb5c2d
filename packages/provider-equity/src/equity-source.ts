/**
 * Data source over the session-based equity upstream.
 *
 * Every upstream call runs inside a login session. Callers that batch many
 * calls (the sync engine) open one session around the batch with
 * {@link EquityDataSource.openSession}; isolated calls open and close their
 * own.
 */

import {
  DataRetrievalError,
  NotSupportedError,
  SymbolValidationError,
  assertIntervalSupported,
  isMarketDataError,
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
  ProviderSession,
  Quote,
  SymbolListing,
} from "@marketsync/contracts";
import { createNullLogger, type Logger } from "@marketsync/logger";
import {
  BASIC_FIELDS,
  DAILY_FIELDS,
  INTRADAY_FIELDS,
  type EquityDataSourceConfig,
  type EquityUpstream,
  type KFrequency,
  type ResultSet,
} from "./types.js";
import { inferExchange, parseQualifiedCode, parseUpstreamCode, toUpstreamCode } from "./codes.js";
import { Columns, parseDailyRow, parseIntradayRow, parseListing, type BarIdentity } from "./parse.js";

const INTERVAL_FREQUENCY: Partial<Record<Interval, KFrequency>> = {
  "5m": "5",
  "15m": "15",
  "30m": "30",
  "1h": "60",
};

interface ResolvedCode {
  /** Code as held in the local store */
  code: string;
  upstreamCode: string;
}

/**
 * Gives every listing a code unique within the result. An equity keeps its
 * bare code; any other instrument sharing that bare code is keyed by its
 * qualified code instead (e.g. the SSE index `000001.SH` next to the
 * equity `000001`).
 */
export function disambiguateCodes(listings: readonly SymbolListing[]): SymbolListing[] {
  const owner = new Map<string, string>();
  for (const listing of listings) {
    if (listing.assetType === "equity" && !owner.has(listing.code)) {
      owner.set(listing.code, listing.fullCode);
    }
  }
  for (const listing of listings) {
    if (!owner.has(listing.code)) {
      owner.set(listing.code, listing.fullCode);
    }
  }
  return listings.map((listing) =>
    owner.get(listing.code) === listing.fullCode ? listing : { ...listing, code: listing.fullCode }
  );
}

/**
 * Exchange-listed securities (equities, indices, funds).
 *
 * @example
 * ```typescript
 * const source = new EquityDataSource({ upstream, logger });
 * const session = await source.openSession();
 * try {
 *   const listings = await source.listSymbols();
 *   const bars = await source.fetchDailyBars('000001', '2024-01-02', '2024-01-05');
 * } finally {
 *   await session.close();
 * }
 * ```
 */
export class EquityDataSource implements DataSource {
  readonly id: string;
  readonly assetClass: AssetClass = "equity";
  readonly capabilities: DataSourceCapabilities = {
    intraday: ["5m", "15m", "30m", "1h"],
    realtimeQuote: false,
    session: true,
  };

  protected readonly upstream: EquityUpstream;
  protected readonly logger: Logger;
  private readonly timezone: string;

  private sessionRefs = 0;
  private loginPromise: Promise<void> | null = null;

  /** local code → upstream code, filled from directory pulls */
  private readonly upstreamCodes = new Map<string, string>();
  private readonly localCodes = new Map<string, string>();
  private readonly identities = new Map<string, BarIdentity>();
  private directoryLoad: Promise<void> | null = null;

  constructor(config: EquityDataSourceConfig) {
    this.upstream = config.upstream;
    this.id = config.id ?? "equity-upstream";
    this.timezone = config.timezone ?? "Asia/Shanghai";
    this.logger = (config.logger ?? createNullLogger()).child({ component: "provider", provider: this.id });
  }

  /**
   * Whether a directory listing belongs to this source's asset class.
   */
  protected includes(listing: SymbolListing): boolean {
    return listing.assetType !== "convertible-bond";
  }

  // ---------------------------------------------------------------------------
  // Sessions
  // ---------------------------------------------------------------------------

  /**
   * Log in, or join the session already open. The upstream is logged out
   * when the last handle closes. Closing a handle twice is a no-op.
   */
  async openSession(): Promise<ProviderSession> {
    this.sessionRefs += 1;
    try {
      if (!this.loginPromise) {
        this.loginPromise = this.call("login", () => this.upstream.login());
        this.logger.debug("Upstream session opened");
      }
      await this.loginPromise;
    } catch (error) {
      this.sessionRefs -= 1;
      this.loginPromise = null;
      throw error;
    }

    let closed = false;
    return {
      close: async () => {
        if (closed) {
          return;
        }
        closed = true;
        this.sessionRefs -= 1;
        if (this.sessionRefs === 0) {
          this.loginPromise = null;
          await this.call("logout", () => this.upstream.logout());
          this.logger.debug("Upstream session closed");
        }
      },
    };
  }

  private async withUpstream<T>(fn: () => Promise<T>): Promise<T> {
    const session = await this.openSession();
    try {
      return await fn();
    } finally {
      await session.close();
    }
  }

  /**
   * Runs one upstream call, translating thrown failures into
   * DataRetrievalError.
   */
  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    let result: T;
    try {
      result = await fn();
    } catch (error) {
      if (isMarketDataError(error)) {
        throw error;
      }
      throw new DataRetrievalError(
        `${this.id} ${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
        { provider: this.id, operation },
        { cause: error }
      );
    }
    return result;
  }

  private async query(operation: string, fn: () => Promise<ResultSet>): Promise<ResultSet> {
    const resultSet = await this.call(operation, fn);
    if (resultSet.errorCode !== "0") {
      throw new DataRetrievalError(`${this.id} ${operation} returned ${resultSet.errorCode}: ${resultSet.errorMessage}`, {
        provider: this.id,
        operation,
        errorCode: resultSet.errorCode,
      });
    }
    return resultSet;
  }

  // ---------------------------------------------------------------------------
  // Directory
  // ---------------------------------------------------------------------------

  async listSymbols(): Promise<SymbolListing[]> {
    const resultSet = await this.withUpstream(() => this.query("queryStockBasic", () => this.upstream.queryStockBasic()));
    const columns = new Columns(this.id, resultSet, BASIC_FIELDS);

    const parsed = resultSet.rows.map((row) => parseListing(this.id, columns, row)).filter((l) => this.includes(l));
    const listings = disambiguateCodes(parsed);

    for (const listing of listings) {
      this.remember(listing);
    }
    this.directoryLoad = Promise.resolve();

    this.logger.info("Directory pulled", { count: listings.length, rows: resultSet.rows.length });
    return listings;
  }

  private remember(listing: SymbolListing): void {
    const instrument = parseQualifiedCode(listing.fullCode);
    if (!instrument) {
      return;
    }
    const upstreamCode = toUpstreamCode(instrument);
    this.upstreamCodes.set(listing.code, upstreamCode);
    this.localCodes.set(upstreamCode, listing.code);
    this.identities.set(listing.code, {
      code: listing.code,
      name: listing.displayName,
      assetType: listing.assetType,
    });
  }

  /**
   * Pulls the directory once per instance so bare codes map to the right
   * exchange.
   */
  private async ensureDirectory(): Promise<void> {
    if (!this.directoryLoad) {
      this.directoryLoad = this.listSymbols().then(
        () => undefined,
        (error: unknown) => {
          this.directoryLoad = null;
          throw error;
        }
      );
    }
    await this.directoryLoad;
  }

  /**
   * Maps any accepted symbol form to the local and upstream codes.
   *
   * @throws SymbolValidationError for unrecognised shapes
   */
  private async resolve(symbol: string): Promise<ResolvedCode> {
    const trimmed = symbol.trim();
    await this.ensureDirectory();

    const known = this.upstreamCodes.get(trimmed);
    if (known) {
      return { code: trimmed, upstreamCode: known };
    }

    const explicit = parseUpstreamCode(trimmed) ?? parseQualifiedCode(trimmed);
    if (explicit) {
      const upstreamCode = toUpstreamCode(explicit);
      return { code: this.localCodes.get(upstreamCode) ?? explicit.code, upstreamCode };
    }

    if (/^\d{6}$/.test(trimmed)) {
      return { code: trimmed, upstreamCode: toUpstreamCode({ code: trimmed, exchange: inferExchange(trimmed) }) };
    }

    throw new SymbolValidationError(`Symbol "${symbol}" is not a known ${this.assetClass} code`, { symbol });
  }

  private async lookup(target: ResolvedCode): Promise<SymbolListing> {
    const resultSet = await this.query("queryStockBasic", () => this.upstream.queryStockBasic(target.upstreamCode));
    const columns = new Columns(this.id, resultSet, BASIC_FIELDS);
    const row = resultSet.rows[0];
    if (!row) {
      throw new SymbolValidationError(`Symbol "${target.code}" not found upstream`, { symbol: target.code });
    }

    const listing = { ...parseListing(this.id, columns, row), code: target.code };
    if (!this.includes(listing)) {
      throw new SymbolValidationError(`Symbol "${target.code}" is not a ${this.assetClass} instrument`, {
        symbol: target.code,
        assetType: listing.assetType,
      });
    }
    return listing;
  }

  private async identityFor(target: ResolvedCode): Promise<BarIdentity> {
    const cached = this.identities.get(target.code);
    if (cached) {
      return cached;
    }
    const listing = await this.lookup(target);
    const identity = { code: target.code, name: listing.displayName, assetType: listing.assetType };
    this.identities.set(target.code, identity);
    return identity;
  }

  // ---------------------------------------------------------------------------
  // Bars and metadata
  // ---------------------------------------------------------------------------

  async fetchDailyBars(code: string, startDate: string, endDate: string): Promise<HistoricalBar[]> {
    const start = normalizeDate(startDate);
    const end = normalizeDate(endDate);
    if (start > end) {
      return [];
    }

    return this.withUpstream(async () => {
      const target = await this.resolve(code);
      const identity = await this.identityFor(target);
      const resultSet = await this.query("queryHistoryKData", () =>
        this.upstream.queryHistoryKData(target.upstreamCode, DAILY_FIELDS, start, end, "d")
      );
      const columns = new Columns(this.id, resultSet, ["date", "open", "high", "low", "close"]);

      const bars = resultSet.rows.map((row) => parseDailyRow(columns, row, identity));
      bars.sort((a, b) => a.date.localeCompare(b.date));

      this.logger.debug("Daily bars fetched", { symbol: target.code, start, end, count: bars.length });
      return bars;
    });
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
    const frequency = INTERVAL_FREQUENCY[interval];
    if (!frequency) {
      throw new NotSupportedError(`${this.id} has no frequency for ${interval}`, {
        provider: this.id,
        capability: `intraday:${interval}`,
      });
    }
    const start = normalizeDate(startDate);
    const end = normalizeDate(endDate);

    return this.withUpstream(async () => {
      const target = await this.resolve(symbol);
      const resultSet = await this.query("queryHistoryKData", () =>
        this.upstream.queryHistoryKData(target.upstreamCode, INTRADAY_FIELDS, start, end, frequency)
      );
      const columns = new Columns(this.id, resultSet, ["time", "open", "high", "low", "close"]);

      const bars = resultSet.rows.map((row) => parseIntradayRow(this.id, columns, row, target.code, this.timezone));
      bars.sort((a, b) => a.timestamp.localeCompare(b.timestamp));
      return bars;
    });
  }

  async getRealtimeQuote(symbol: string): Promise<Quote> {
    throw new NotSupportedError(`${this.id} does not serve realtime quotes`, {
      provider: this.id,
      capability: "realtimeQuote",
      symbol,
    });
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
    return this.withUpstream(async () => {
      const listing = await this.lookup(await this.resolve(symbol));
      return {
        fullCode: listing.fullCode,
        name: listing.displayName,
        assetType: listing.assetType,
        listingDate: listing.listingDate,
      };
    });
  }
}

/**
 * Convertible bonds from the same upstream, stored as their own asset class.
 */
export class BondDataSource extends EquityDataSource {
  override readonly assetClass: AssetClass = "bond";
  override readonly capabilities: DataSourceCapabilities = {
    intraday: [],
    realtimeQuote: false,
    session: true,
  };

  constructor(config: EquityDataSourceConfig) {
    super({ ...config, id: config.id ?? "equity-upstream-bonds" });
  }

  protected override includes(listing: SymbolListing): boolean {
    return listing.assetType === "convertible-bond";
  }
}
