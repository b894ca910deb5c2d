/**
 * Type definitions for the session-based equity upstream.
 *
 * The upstream speaks in result sets: a list of column names and rows of
 * string values in that column order. Its wire protocol and login mechanics
 * live behind {@link EquityUpstream}.
 */

import type { Logger } from "@marketsync/logger";

/**
 * Tabular response returned by every upstream query.
 */
export interface ResultSet {
  /** "0" on success */
  errorCode: string;
  errorMessage: string;
  fields: string[];
  rows: string[][];
}

/**
 * K-line frequency codes understood by the upstream: daily, or minutes.
 */
export type KFrequency = "d" | "5" | "15" | "30" | "60";

/**
 * Boundary to the session-based upstream.
 *
 * Codes are exchange-prefixed and lower-case, e.g. `sz.000001`. Dates are
 * `YYYY-MM-DD`.
 */
export interface EquityUpstream {
  login(): Promise<void>;
  logout(): Promise<void>;

  /**
   * Directory query. With `code`, only that instrument; without, every
   * instrument the upstream knows.
   *
   * Columns: code, code_name, ipoDate, outDate, type, status
   */
  queryStockBasic(code?: string): Promise<ResultSet>;

  queryHistoryKData(
    code: string,
    fields: readonly string[],
    startDate: string,
    endDate: string,
    frequency: KFrequency
  ): Promise<ResultSet>;
}

export interface EquityDataSourceConfig {
  upstream: EquityUpstream;

  logger?: Logger;

  /** Provider id used in logs and errors. Defaults to "equity-upstream". */
  id?: string;

  /** Timezone intraday bar times are reported in. Defaults to "Asia/Shanghai". */
  timezone?: string;
}

/** Daily k-line columns requested from the upstream, in order */
export const DAILY_FIELDS = [
  "date",
  "code",
  "open",
  "high",
  "low",
  "close",
  "preclose",
  "volume",
  "amount",
  "adjustflag",
  "turn",
  "tradestatus",
  "pctChg",
  "isST",
] as const;

/** Minute k-line columns requested from the upstream, in order */
export const INTRADAY_FIELDS = ["date", "time", "code", "open", "high", "low", "close", "volume", "amount"] as const;

/** Directory columns */
export const BASIC_FIELDS = ["code", "code_name", "ipoDate", "outDate", "type", "status"] as const;
