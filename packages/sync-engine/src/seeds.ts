/**
 * Built-in directories written when a bootstrap pull fails, so a fresh
 * install can still serve the best-known symbols of each asset class.
 */

import type { AssetClass, SymbolListing } from '@marketsync/contracts'

function pair(code: string, base: string, quote: string, exchange: string, assetType: 'crypto' | 'fx'): SymbolListing {
  return {
    code,
    displayName: `${base}/${quote}`,
    fullCode: `${code}.${exchange}`,
    exchange,
    assetType,
    listingDate: null,
    isActive: true,
  }
}

function listed(code: string, displayName: string, exchange: string, listingDate: string | null): SymbolListing {
  return {
    code,
    displayName,
    fullCode: `${code}.${exchange}`,
    exchange,
    assetType: 'equity',
    listingDate,
    isActive: true,
  }
}

export const DEFAULT_SEEDS: Record<AssetClass, readonly SymbolListing[]> = {
  equity: [
    listed('000001', 'Ping An Bank', 'SZ', '1991-04-03'),
    listed('000858', 'Wuliangye Yibin', 'SZ', '1998-04-27'),
    listed('600000', 'Shanghai Pudong Development Bank', 'SH', '1999-11-10'),
    listed('600519', 'Kweichow Moutai', 'SH', '2001-08-27'),
    listed('601318', 'Ping An Insurance', 'SH', '2007-03-01'),
  ],
  bond: [
    {
      code: '110059',
      displayName: 'SPD Bank Convertible',
      fullCode: '110059.SH',
      exchange: 'SH',
      assetType: 'convertible-bond',
      listingDate: null,
      isActive: true,
    },
  ],
  crypto: [
    pair('BTCUSDT', 'BTC', 'USDT', 'BINANCE', 'crypto'),
    pair('ETHUSDT', 'ETH', 'USDT', 'BINANCE', 'crypto'),
    pair('BNBUSDT', 'BNB', 'USDT', 'BINANCE', 'crypto'),
  ],
  fx: [
    pair('USDCNY', 'USD', 'CNY', 'FX', 'fx'),
    pair('EURUSD', 'EUR', 'USD', 'FX', 'fx'),
    pair('USDJPY', 'USD', 'JPY', 'FX', 'fx'),
    pair('GBPUSD', 'GBP', 'USD', 'FX', 'fx'),
  ],
}
