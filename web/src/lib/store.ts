import { z } from 'zod'
import type { MacroSnapshot, MarketDailyRow } from '../types'
import { env } from './config'
import { StoreError } from './errors'

export interface MetricsStore {
  upsertMarketDaily(rows: MarketDailyRow[]): Promise<void>
  upsertMacro(rows: MacroSnapshot[]): Promise<void>
  fetchMarketDaily(tickers: string[], start?: string): Promise<MarketDailyRow[]>
  fetchMacro(start?: string): Promise<MacroSnapshot[]>
}

export const MARKET_TABLE = 'market_daily_metrics'
export const MACRO_TABLE = 'macro_indicators'

// PostgREST may serialise NUMERIC as a string
const numeric = z.preprocess(v => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v), z.number().finite())
const nullableNumeric = numeric.nullable().optional().transform(v => v ?? null)

const MarketRowSchema = z.object({
  date: z.string(),
  ticker: z.string(),
  close: numeric,
  rsi_14: nullableNumeric,
  ma200_dist_pct: nullableNumeric,
  created_at: z.string().optional(),
})

const MacroRowSchema = z.object({
  date: z.string(),
  vix_close: nullableNumeric,
  fear_greed_index: nullableNumeric,
  us10y_yield: nullableNumeric,
  soxx_qqq_ratio: nullableNumeric,
  xlp_xly_ratio: nullableNumeric,
})

type FetchFn = typeof fetch

// Supabase's default `max-rows`; reads page through results at this size
export const PAGE_SIZE = 1000

export class SupabaseStore implements MetricsStore {
  private readonly base: string
  private readonly key: string
  private readonly fetchImpl: FetchFn

  constructor(url: string, key: string, fetchImpl: FetchFn = fetch) {
    this.base = `${url.replace(/\/$/, '')}/rest/v1`
    this.key = key
    this.fetchImpl = fetchImpl
  }

  private headers(extra?: Record<string, string>) {
    return { apikey: this.key, Authorization: `Bearer ${this.key}`, ...extra }
  }

  private async upsert(table: string, onConflict: string, rows: object[]) {
    if (!rows.length) return
    const res = await this.fetchImpl(`${this.base}/${table}?on_conflict=${onConflict}`, {
      method: 'POST',
      headers: this.headers({
        Prefer: 'resolution=merge-duplicates',
        'Content-Type': 'application/json',
      }),
      body: JSON.stringify(rows),
      cache: 'no-store',
    })
    if (res.status >= 300) {
      throw new StoreError(`upsert ${table} failed`, res.status, await res.text().catch(() => undefined))
    }
    console.info('store: upserted', { table, rows: rows.length })
  }

  private async select(table: string, params: URLSearchParams): Promise<unknown[]> {
    const res = await this.fetchImpl(`${this.base}/${table}?${params.toString()}`, {
      headers: this.headers(),
      cache: 'no-store',
    })
    if (!res.ok) throw new StoreError(`select ${table} failed`, res.status, await res.text().catch(() => undefined))
    const body: unknown = await res.json()
    return Array.isArray(body) ? body : []
  }

  /** Every row matching `params`, one `limit`/`offset` page at a time until a short page. */
  private async selectAll(table: string, params: URLSearchParams): Promise<unknown[]> {
    const out: unknown[] = []
    for (let offset = 0; ; offset += PAGE_SIZE) {
      const page = new URLSearchParams(params)
      page.set('limit', String(PAGE_SIZE))
      page.set('offset', String(offset))
      const rows = await this.select(table, page)
      out.push(...rows)
      if (rows.length < PAGE_SIZE) return out
    }
  }

  async upsertMarketDaily(rows: MarketDailyRow[]) {
    await this.upsert(MARKET_TABLE, 'date,ticker', rows.map(r => ({
      date: r.date,
      ticker: r.ticker,
      close: r.close,
      rsi_14: r.rsi_14,
      ma200_dist_pct: r.ma200_dist_pct,
    })))
  }

  async upsertMacro(rows: MacroSnapshot[]) {
    await this.upsert(MACRO_TABLE, 'date', rows)
  }

  async fetchMarketDaily(tickers: string[], start?: string): Promise<MarketDailyRow[]> {
    if (!tickers.length) return []
    const params = new URLSearchParams({ select: '*' })
    params.set('ticker', `in.(${tickers.map(t => `"${t}"`).join(',')})`)
    if (start) params.set('date', `gte.${start}`)
    params.set('order', 'date.asc,ticker.asc')
    const raw = await this.selectAll(MARKET_TABLE, params)
    return z.array(MarketRowSchema).parse(raw)
  }

  async fetchMacro(start?: string): Promise<MacroSnapshot[]> {
    const params = new URLSearchParams({ select: '*' })
    if (start) params.set('date', `gte.${start}`)
    params.set('order', 'date.asc')
    const raw = await this.selectAll(MACRO_TABLE, params)
    return z.array(MacroRowSchema).parse(raw)
  }
}

/** Null when Supabase is not configured; callers fall back to the gateway. */
export function createStoreFromEnv(): SupabaseStore | null {
  const url = env('SUPABASE_URL', false)
  const key = env('SUPABASE_SERVICE_ROLE', false) || env('SUPABASE_KEY', false)
  if (!url || !key) return null
  return new SupabaseStore(url, key)
}
