/**
 * Tests for @marketsync/provider-fx
 */

import { describe, it, expect, beforeEach } from "vitest";
import axios, { type AxiosAdapter } from "axios";
import { DataStandardizationError, NotSupportedError, SymbolValidationError } from "@marketsync/contracts";
import { ResilientTransport } from "@marketsync/transport";
import { FxDataSource } from "../src/index.js";

interface Request {
  url: string;
  params: Record<string, unknown>;
}

type Handler = (request: Request) => { status: number; data: unknown };

const CURRENCIES = { USD: "United States Dollar", CNY: "Chinese Renminbi Yuan", EUR: "Euro" };

const referenceRates: Handler = ({ url }) => {
  if (url === "/currencies") {
    return { status: 200, data: CURRENCIES };
  }
  if (url === "/latest") {
    return { status: 200, data: { amount: 1, base: "USD", date: "2024-01-05", rates: { CNY: 7.1 } } };
  }
  if (url.includes("..")) {
    return {
      status: 200,
      data: {
        amount: 1,
        base: "USD",
        start_date: "2023-12-26",
        end_date: "2024-01-04",
        rates: {
          "2024-01-03": { CNY: 7.171 },
          "2023-12-29": { CNY: 7.1 },
          "2024-01-02": { CNY: 7.1 },
          "2024-01-04": { CNY: 7.15 },
        },
      },
    };
  }
  return { status: 404, data: null };
};

function buildSource(handler: Handler, pairs: string[] = ["USDCNY", "EURUSD", "USDJPY"]) {
  const requests: Request[] = [];
  const adapter: AxiosAdapter = async (config) => {
    const request: Request = { url: config.url ?? "", params: { ...config.params } };
    requests.push(request);
    const reply = handler(request);
    return { data: reply.data, status: reply.status, statusText: "", headers: {}, config, request: {} };
  };
  const transport = new ResilientTransport({
    provider: "frankfurter",
    httpClient: axios.create({ adapter }),
    maxRetries: 0,
  });
  return { source: new FxDataSource({ transport, pairs }), requests };
}

describe("FxDataSource", () => {
  let source: FxDataSource;
  let requests: Request[];

  beforeEach(() => {
    ({ source, requests } = buildSource(referenceRates));
  });

  it("should list configured pairs the upstream publishes", async () => {
    const listings = await source.listSymbols();

    expect(listings).toEqual([
      {
        code: "USDCNY",
        displayName: "USD/CNY",
        fullCode: "USDCNY.FX",
        exchange: "FX",
        assetType: "fx",
        listingDate: null,
        isActive: true,
      },
      {
        code: "EURUSD",
        displayName: "EUR/USD",
        fullCode: "EURUSD.FX",
        exchange: "FX",
        assetType: "fx",
        listingDate: null,
        isActive: true,
      },
    ]);
  });

  it("should build flat daily bars from the rate series", async () => {
    const bars = await source.fetchDailyBars("usd/cny", "2024-01-02", "2024-01-03");

    expect(bars).toEqual([
      {
        code: "USDCNY",
        name: "USD/CNY",
        assetType: "fx",
        date: "2024-01-02",
        open: 7.1,
        high: 7.1,
        low: 7.1,
        close: 7.1,
        volume: 0,
        turnover: null,
        pctChange: 0,
      },
      {
        code: "USDCNY",
        name: "USD/CNY",
        assetType: "fx",
        date: "2024-01-03",
        open: 7.171,
        high: 7.171,
        low: 7.171,
        close: 7.171,
        volume: 0,
        turnover: null,
        pctChange: 1,
      },
    ]);
    expect(requests[0]).toEqual({ url: "/2023-12-26..2024-01-03", params: { from: "USD", to: "CNY" } });
  });

  it("should reject a malformed series", async () => {
    ({ source } = buildSource((request) =>
      request.url.includes("..") ? { status: 200, data: { base: "USD", rates: { "2024-01-02": "7.1" } } } : referenceRates(request)
    ));

    await expect(source.fetchDailyBars("USDCNY", "2024-01-02", "2024-01-03")).rejects.toBeInstanceOf(
      DataStandardizationError
    );
  });

  it("should not serve intraday bars", async () => {
    expect(source.capabilities.intraday).toEqual([]);
    await expect(source.getIntradayBars("USDCNY", "1h", "2024-01-02", "2024-01-02")).rejects.toBeInstanceOf(
      NotSupportedError
    );
  });

  it("should quote the latest reference rate", async () => {
    expect(await source.getRealtimeQuote("USDCNY.FX")).toEqual({
      code: "USDCNY",
      price: 7.1,
      open: null,
      high: null,
      low: null,
      previousClose: null,
      volume: null,
      timestamp: "2024-01-05T00:00:00.000Z",
    });
  });

  it("should validate pairs against the published currencies", async () => {
    expect(await source.validateSymbol("USDCNY")).toBe(true);
    expect(await source.validateSymbol("USDJPY")).toBe(false);
    expect(await source.validateSymbol("USDUSD")).toBe(false);
    expect(requests.filter((r) => r.url === "/currencies")).toHaveLength(1);
  });

  it("should describe a published pair", async () => {
    expect(await source.getAssetMetadata("EUR-USD")).toEqual({
      fullCode: "EURUSD.FX",
      name: "EUR/USD",
      assetType: "fx",
      listingDate: null,
    });
    await expect(source.getAssetMetadata("USDJPY")).rejects.toBeInstanceOf(SymbolValidationError);
  });
});
