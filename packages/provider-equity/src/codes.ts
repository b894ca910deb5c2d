/**
 * Conversions between local and upstream instrument codes.
 *
 * Local:    `000001` (bare) or `000001.SZ` (qualified)
 * Upstream: `sz.000001`
 */

export type Exchange = "SH" | "SZ" | "BJ";

export interface InstrumentCode {
  code: string;
  exchange: Exchange;
}

function toExchange(value: string): Exchange | null {
  switch (value.toUpperCase()) {
    case "SH":
      return "SH";
    case "SZ":
      return "SZ";
    case "BJ":
      return "BJ";
    default:
      return null;
  }
}

/**
 * Parses `sz.000001`.
 */
export function parseUpstreamCode(value: string): InstrumentCode | null {
  const match = /^([a-z]{2})\.(\d{6})$/i.exec(value.trim());
  if (!match?.[1] || !match[2]) {
    return null;
  }
  const exchange = toExchange(match[1]);
  return exchange ? { code: match[2], exchange } : null;
}

/**
 * Parses `000001.SZ`.
 */
export function parseQualifiedCode(value: string): InstrumentCode | null {
  const match = /^(\d{6})\.([a-z]{2})$/i.exec(value.trim());
  if (!match?.[1] || !match[2]) {
    return null;
  }
  const exchange = toExchange(match[2]);
  return exchange ? { code: match[1], exchange } : null;
}

export function toUpstreamCode(instrument: InstrumentCode): string {
  return `${instrument.exchange.toLowerCase()}.${instrument.code}`;
}

export function toQualifiedCode(instrument: InstrumentCode): string {
  return `${instrument.code}.${instrument.exchange}`;
}

/**
 * Best guess of the listing exchange from a bare six-digit code's prefix.
 * Used only when the directory has not told us.
 */
export function inferExchange(code: string): Exchange {
  if (/^(4|8|92)/.test(code)) {
    return "BJ";
  }
  if (/^(5|6|9|11)/.test(code)) {
    return "SH";
  }
  return "SZ";
}
