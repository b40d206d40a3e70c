import type { MacroSnapshot, MarketDailyRow, PriceBar } from '../types'
import { chunk } from './async'
import { ALL_TICKERS } from './config'
import { DataUnavailableError } from './errors'
import { MACRO_LEGS, type MarketDataGateway } from './gateway'
import { ma200DistSeries, rsi14 } from './indicators'
import { buildMacroSnapshot } from './macro'
import type { MetricsStore } from './store'

export type BackfillWindow = {
  gateway: MarketDataGateway
  store: MetricsStore
  start: string
  end: string
}

/** Every bar becomes a row; indicator columns stay null until their window is full. */
export function barsToRows(bars: PriceBar[]): MarketDailyRow[] {
  const closes = bars.map(b => b.close)
  const rsi = rsi14(closes, 14)
  const dist = ma200DistSeries(closes, 200)
  return bars.map((b, i) => ({ date: b.date, ticker: b.ticker, close: b.close, rsi_14: rsi[i], ma200_dist_pct: dist[i] }))
}

export async function backfillMarket(opts: BackfillWindow & { tickers?: string[]; batchSize?: number }) {
  const tickers = opts.tickers ?? ALL_TICKERS
  const rows: MarketDailyRow[] = []
  const skipped: string[] = []
  for (const t of tickers) {
    try {
      const bars = await opts.gateway.fetchPriceHistory(t, opts.start, opts.end)
      rows.push(...barsToRows(bars))
      console.info('backfill: fetched', { ticker: t, bars: bars.length })
    } catch (e) {
      if (!(e instanceof DataUnavailableError)) throw e
      console.warn('backfill: no data, skipping', { ticker: t, reason: e.message })
      skipped.push(t)
    }
  }
  const batches = chunk(rows, opts.batchSize ?? 500)
  for (let i = 0; i < batches.length; i++) {
    await opts.store.upsertMarketDaily(batches[i])
    console.info('backfill: market batch', { batch: i + 1, of: batches.length })
  }
  return { rows: rows.length, skipped }
}

/**
 * One macro row per VIX trading day. Fear & Greed has no history and stays
 * null; ratios need both legs on the same date.
 */
export async function backfillMacro(opts: BackfillWindow & { batchSize?: number }) {
  const legs = await Promise.allSettled(MACRO_LEGS.map(t => opts.gateway.fetchPriceHistory(t, opts.start, opts.end)))
  const byTicker: Record<string, Map<string, number>> = {}
  legs.forEach((res, i) => {
    const t = MACRO_LEGS[i]
    if (res.status === 'fulfilled') byTicker[t] = new Map(res.value.map(b => [b.date, b.close]))
    else console.warn('backfill: macro leg unavailable', { ticker: t, reason: String(res.reason) })
  })
  const vix = byTicker['^VIX']
  if (!vix) throw new DataUnavailableError('backfill', 'VIX history unavailable, macro rows need its calendar')

  const rows: MacroSnapshot[] = Array.from(vix.keys()).map(date => {
    const closes: Record<string, number | undefined> = {}
    for (const t of MACRO_LEGS) closes[t] = byTicker[t]?.get(date)
    return buildMacroSnapshot(date, closes, null)
  })
  const batches = chunk(rows, opts.batchSize ?? 200)
  for (let i = 0; i < batches.length; i++) {
    await opts.store.upsertMacro(batches[i])
    console.info('backfill: macro batch', { batch: i + 1, of: batches.length })
  }
  return { rows: rows.length }
}
