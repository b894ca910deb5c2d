/**
 * Database row shapes and their mapping to contract types.
 */

import { isAssetType } from '@marketsync/contracts'
import type { AssetType, BarExtras, HistoricalBar, SymbolListing, SymbolRecord } from '@marketsync/contracts'

export interface SymbolRow {
  code: string
  display_name: string
  full_code: string
  exchange: string
  asset_type: string
  listing_date: string | null
  is_active: number
  last_updated: string
}

export interface DailyBarRow {
  code: string
  date: string
  name: string
  asset_type: string
  open: number
  high: number
  low: number
  close: number
  volume: number
  turnover: number | null
  pct_change: number | null
  extras: string | null
}

export interface SyncStateRow {
  scope: string
  synced_through: string
  updated_at: string
}

function toAssetType(value: string): AssetType {
  if (!isAssetType(value)) {
    throw new Error(`Unknown asset type in store: ${value}`)
  }
  return value
}

function toNullableNumber(value: number | null): number | null {
  return value === null ? null : Number(value)
}

export function symbolFromRow(row: SymbolRow): SymbolRecord {
  return {
    code: row.code,
    displayName: row.display_name,
    fullCode: row.full_code,
    exchange: row.exchange,
    assetType: toAssetType(row.asset_type),
    listingDate: row.listing_date,
    isActive: Number(row.is_active) === 1,
    lastUpdated: row.last_updated,
  }
}

export function symbolParams(listing: SymbolListing, seenAt: string): unknown[] {
  return [
    listing.code,
    listing.displayName,
    listing.fullCode,
    listing.exchange,
    listing.assetType,
    listing.listingDate,
    listing.isActive ? 1 : 0,
    seenAt,
  ]
}

export function parseExtras(text: string | null): BarExtras | undefined {
  if (text === null || text === '') {
    return undefined
  }

  const parsed: unknown = JSON.parse(text)
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return undefined
  }

  const extras: BarExtras = {}
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string' || typeof value === 'number' || value === null) {
      extras[key] = value
    }
  }
  return extras
}

export function barFromRow(row: DailyBarRow): HistoricalBar {
  const bar: HistoricalBar = {
    code: row.code,
    name: row.name,
    assetType: toAssetType(row.asset_type),
    date: row.date,
    open: Number(row.open),
    high: Number(row.high),
    low: Number(row.low),
    close: Number(row.close),
    volume: Number(row.volume),
    turnover: toNullableNumber(row.turnover),
    pctChange: toNullableNumber(row.pct_change),
  }

  const extras = parseExtras(row.extras)
  if (extras !== undefined) {
    bar.extras = extras
  }
  return bar
}

export function barParams(code: string, bar: HistoricalBar): unknown[] {
  return [
    code,
    bar.date,
    bar.name,
    bar.assetType,
    bar.open,
    bar.high,
    bar.low,
    bar.close,
    bar.volume,
    bar.turnover,
    bar.pctChange,
    bar.extras === undefined ? null : JSON.stringify(bar.extras),
  ]
}
