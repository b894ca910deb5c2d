/**
 * Mapping of upstream result sets to the standard shapes.
 */

import moment from "moment-timezone";
import { DataStandardizationError } from "@marketsync/contracts";
import type { AssetType, HistoricalBar, IntradayBar, SymbolListing } from "@marketsync/contracts";
import type { ResultSet } from "./types.js";
import { parseUpstreamCode, toQualifiedCode } from "./codes.js";

/**
 * Directory `type` column → asset type. Unknown codes map to "other".
 */
export const TYPE_CODES: Readonly<Record<string, AssetType>> = {
  "1": "equity",
  "2": "index",
  "3": "other",
  "4": "convertible-bond",
  "5": "fund",
};

export function assetTypeFromCode(typeCode: string): AssetType {
  return TYPE_CODES[typeCode] ?? "other";
}

/**
 * Row accessor bound to the column order of one result set.
 */
export class Columns {
  private readonly index = new Map<string, number>();

  constructor(
    private readonly provider: string,
    resultSet: ResultSet,
    required: readonly string[]
  ) {
    resultSet.fields.forEach((field, i) => this.index.set(field, i));

    const missing = required.filter((field) => !this.index.has(field));
    if (missing.length > 0) {
      throw new DataStandardizationError(`Result set is missing columns: ${missing.join(", ")}`, {
        provider,
        fields: resultSet.fields,
      });
    }
  }

  text(row: readonly string[], field: string): string {
    const i = this.index.get(field);
    return i === undefined ? "" : (row[i] ?? "").trim();
  }

  number(row: readonly string[], field: string): number {
    const raw = this.text(row, field);
    const value = Number(raw);
    if (raw === "" || !Number.isFinite(value)) {
      throw new DataStandardizationError(`Column "${field}" is not numeric: "${raw}"`, {
        provider: this.provider,
        field,
        value: raw,
      });
    }
    return value;
  }

  optionalNumber(row: readonly string[], field: string): number | null {
    const raw = this.text(row, field);
    if (raw === "") {
      return null;
    }
    const value = Number(raw);
    return Number.isFinite(value) ? value : null;
  }
}

export function parseListing(provider: string, columns: Columns, row: readonly string[]): SymbolListing {
  const upstreamCode = columns.text(row, "code");
  const instrument = parseUpstreamCode(upstreamCode);
  if (!instrument) {
    throw new DataStandardizationError(`Unrecognised instrument code "${upstreamCode}"`, { provider });
  }

  const ipoDate = columns.text(row, "ipoDate");
  return {
    code: instrument.code,
    displayName: columns.text(row, "code_name"),
    fullCode: toQualifiedCode(instrument),
    exchange: instrument.exchange,
    assetType: assetTypeFromCode(columns.text(row, "type")),
    listingDate: ipoDate === "" ? null : ipoDate,
    isActive: columns.text(row, "status") === "1",
  };
}

export interface BarIdentity {
  code: string;
  name: string;
  assetType: AssetType;
}

export function parseDailyRow(columns: Columns, row: readonly string[], identity: BarIdentity): HistoricalBar {
  return {
    code: identity.code,
    name: identity.name,
    assetType: identity.assetType,
    date: columns.text(row, "date"),
    open: columns.number(row, "open"),
    high: columns.number(row, "high"),
    low: columns.number(row, "low"),
    close: columns.number(row, "close"),
    // Suspended sessions report an empty volume
    volume: columns.optionalNumber(row, "volume") ?? 0,
    turnover: columns.optionalNumber(row, "amount"),
    pctChange: columns.optionalNumber(row, "pctChg"),
    extras: {
      preClose: columns.optionalNumber(row, "preclose"),
      adjustFlag: columns.text(row, "adjustflag"),
      turnoverRate: columns.optionalNumber(row, "turn"),
      tradeStatus: columns.text(row, "tradestatus"),
      isST: columns.text(row, "isST"),
    },
  };
}

/**
 * Upstream minute times look like `20240102093500000` in market local time.
 */
export function parseIntradayRow(
  provider: string,
  columns: Columns,
  row: readonly string[],
  code: string,
  timezone: string
): IntradayBar {
  const time = columns.text(row, "time");
  const at = moment.tz(time, "YYYYMMDDHHmmssSSS", true, timezone);
  if (!at.isValid()) {
    throw new DataStandardizationError(`Unparseable bar time "${time}"`, { provider, code });
  }

  return {
    code,
    timestamp: at.toISOString(),
    open: columns.number(row, "open"),
    high: columns.number(row, "high"),
    low: columns.number(row, "low"),
    close: columns.number(row, "close"),
    volume: columns.optionalNumber(row, "volume") ?? 0,
  };
}
