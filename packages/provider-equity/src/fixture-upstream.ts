/**
 * In-memory equity upstream for deterministic testing
 */

import type { EquityUpstream, KFrequency, ResultSet } from "./types.js";
import { BASIC_FIELDS } from "./types.js";

export type FixtureRow = Record<string, string | number>;

export interface FixtureInstrument {
  /** Upstream code, e.g. `sz.000001` */
  code: string;
  name: string;
  ipoDate: string;
  outDate?: string;
  /** Directory type code: 1 equity, 2 index, 3 other, 4 convertible bond, 5 fund */
  type: string;
  /** "1" listed, "0" delisted */
  status?: string;
}

export interface FixtureCall {
  method: keyof EquityUpstream;
  args: unknown[];
}

const NOT_LOGGED_IN = "10001001";

function ok(fields: readonly string[], rows: string[][]): ResultSet {
  return { errorCode: "0", errorMessage: "success", fields: [...fields], rows };
}

function toRow(fields: readonly string[], record: FixtureRow): string[] {
  return fields.map((field) => {
    const value = record[field];
    return value === undefined ? "" : String(value);
  });
}

/**
 * Equity upstream serving fixture data.
 *
 * Requires a login before queries, like the real upstream, and records every
 * call. Failures can be injected per operation with {@link failWith}; keys
 * are a method name, or `queryHistoryKData:<code>` for one instrument.
 */
export class FixtureEquityUpstream implements EquityUpstream {
  readonly calls: FixtureCall[] = [];
  logins = 0;
  logouts = 0;

  private loggedIn = false;
  private instruments: FixtureInstrument[] = [];
  private daily = new Map<string, FixtureRow[]>();
  private minute = new Map<string, FixtureRow[]>();
  private failures = new Map<string, Error>();

  constructor(instruments: FixtureInstrument[] = []) {
    this.instruments = [...instruments];
  }

  get isLoggedIn(): boolean {
    return this.loggedIn;
  }

  setInstruments(instruments: FixtureInstrument[]): void {
    this.instruments = [...instruments];
  }

  /**
   * Rows replace any existing row of the same date, the way an upstream
   * revises a bar.
   */
  addDailyBars(code: string, rows: FixtureRow[]): void {
    const dates = new Set(rows.map((row) => row["date"]));
    const existing = (this.daily.get(code) ?? []).filter((row) => !dates.has(row["date"]));
    this.daily.set(code, [...existing, ...rows.map((row) => ({ ...row, code }))]);
  }

  addMinuteBars(code: string, frequency: Exclude<KFrequency, "d">, rows: FixtureRow[]): void {
    const key = `${code}|${frequency}`;
    const existing = this.minute.get(key) ?? [];
    this.minute.set(key, [...existing, ...rows.map((row) => ({ ...row, code }))]);
  }

  failWith(key: string, error: Error | null): void {
    if (error) {
      this.failures.set(key, error);
    } else {
      this.failures.delete(key);
    }
  }

  callsTo(method: keyof EquityUpstream): FixtureCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  private checkFailure(key: string): void {
    const error = this.failures.get(key);
    if (error) {
      throw error;
    }
  }

  private notLoggedIn(): ResultSet {
    return { errorCode: NOT_LOGGED_IN, errorMessage: "user not logged in", fields: [], rows: [] };
  }

  async login(): Promise<void> {
    this.calls.push({ method: "login", args: [] });
    this.checkFailure("login");
    this.loggedIn = true;
    this.logins += 1;
  }

  async logout(): Promise<void> {
    this.calls.push({ method: "logout", args: [] });
    this.checkFailure("logout");
    this.loggedIn = false;
    this.logouts += 1;
  }

  async queryStockBasic(code?: string): Promise<ResultSet> {
    this.calls.push({ method: "queryStockBasic", args: code === undefined ? [] : [code] });
    this.checkFailure("queryStockBasic");
    if (!this.loggedIn) {
      return this.notLoggedIn();
    }

    const selected = code === undefined ? this.instruments : this.instruments.filter((i) => i.code === code);
    const rows = selected.map((instrument) =>
      toRow(BASIC_FIELDS, {
        code: instrument.code,
        code_name: instrument.name,
        ipoDate: instrument.ipoDate,
        outDate: instrument.outDate ?? "",
        type: instrument.type,
        status: instrument.status ?? "1",
      })
    );
    return ok(BASIC_FIELDS, rows);
  }

  async queryHistoryKData(
    code: string,
    fields: readonly string[],
    startDate: string,
    endDate: string,
    frequency: KFrequency
  ): Promise<ResultSet> {
    this.calls.push({ method: "queryHistoryKData", args: [code, fields, startDate, endDate, frequency] });
    this.checkFailure("queryHistoryKData");
    this.checkFailure(`queryHistoryKData:${code}`);
    if (!this.loggedIn) {
      return this.notLoggedIn();
    }

    const source = frequency === "d" ? this.daily.get(code) : this.minute.get(`${code}|${frequency}`);
    const rows = (source ?? [])
      .filter((row) => {
        const date = String(row["date"] ?? "");
        return date >= startDate && date <= endDate;
      })
      .map((row) => toRow(fields, row));
    return ok(fields, rows);
  }
}
