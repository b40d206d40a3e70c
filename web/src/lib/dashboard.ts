import type { AssetHealthRow, FearGreedReading, MacroSnapshot, MarketDailyRow, MarketData, MetricPoint, PriceBar, TimeRange } from '../types'
import { pLimit } from './async'
import { L1_TICKERS, TARGET_ETFS, THRESHOLDS, addDays, daysBetween, rangeDays } from './config'
import { DataUnavailableError, StoreError } from './errors'
import type { MarketDataGateway } from './gateway'
import { bollinger, ma200DistSeries, macd, rsi14, sma } from './indicators'
import { correlationMatrix, divergenceMetrics, infraMonitor, relativeStrength, riskOffRadar, type ClosePoint } from './insights'
import { latestMacro, readFearGreed, readUs10y, readVix, type Reading } from './macro'
import { classify } from './signals'
import type { MetricsStore } from './store'

export const DASHBOARD_TICKERS: string[] = Array.from(new Set<string>([...TARGET_ETFS, ...L1_TICKERS])).sort()

// calendar days fetched before the range so MA200 and the RSI span are full at its start
const WARMUP_DAYS = 400

type LoadOpts = {
  store: MetricsStore | null
  gateway: MarketDataGateway
  range: TimeRange
  today: string
  tickers?: string[]
}

export function groupRows(rows: MarketDailyRow[]) {
  const series: Record<string, MetricPoint[]> = {}
  for (const r of rows) {
    (series[r.ticker] ??= []).push({ date: r.date, close: r.close, rsi_14: r.rsi_14, ma200_dist_pct: r.ma200_dist_pct })
  }
  for (const points of Object.values(series)) points.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))
  return series
}

export function barsToPoints(bars: PriceBar[], from: string): MetricPoint[] {
  const closes = bars.map(b => b.close)
  const rsi = rsi14(closes, 14)
  const dist = ma200DistSeries(closes, 200)
  const out: MetricPoint[] = []
  bars.forEach((b, i) => {
    if (b.date >= from) out.push({ date: b.date, close: b.close, rsi_14: rsi[i], ma200_dist_pct: dist[i] })
  })
  return out
}

function latestDate(series: Record<string, MetricPoint[]>) {
  let latest: string | null = null
  for (const points of Object.values(series)) {
    const last = points[points.length - 1]
    if (last && (latest == null || last.date > latest)) latest = last.date
  }
  return latest
}

async function fromStore(store: MetricsStore, tickers: string[], start: string, today: string) {
  let rows: MarketDailyRow[]
  try {
    rows = await store.fetchMarketDaily(tickers, start)
  } catch (e) {
    if (!(e instanceof StoreError)) throw e
    console.warn('dashboard: store read failed, using live data', e.message)
    return null
  }
  const series = groupRows(rows)
  const latest = latestDate(series)
  if (latest == null) return null
  if (daysBetween(latest, today) > THRESHOLDS.staleDays) {
    console.info('dashboard: store is stale, using live data', { latest, today })
    return null
  }
  return series
}

async function fromGateway(gateway: MarketDataGateway, tickers: string[], start: string, today: string) {
  const fetchFrom = addDays(start, -WARMUP_DAYS)
  const results = await pLimit(4, tickers.map(t => async () => {
    try {
      return { ticker: t, points: barsToPoints(await gateway.fetchPriceHistory(t, fetchFrom, today), start) }
    } catch (e) {
      if (!(e instanceof DataUnavailableError)) throw e
      console.warn('dashboard: ticker unavailable', { ticker: t, reason: e.message })
      return { ticker: t, points: [] }
    }
  }))
  const series: Record<string, MetricPoint[]> = {}
  for (const r of results) if (r.points.length) series[r.ticker] = r.points
  return series
}

/**
 * Metric series for the dashboard. Reads the store first and falls back to
 * live prices when it is unconfigured, empty, unreachable or more than
 * `staleDays` behind.
 */
export async function loadMarketData(opts: LoadOpts): Promise<MarketData> {
  const tickers = opts.tickers ?? DASHBOARD_TICKERS
  const start = addDays(opts.today, -rangeDays(opts.range))
  if (opts.store) {
    const series = await fromStore(opts.store, tickers, start, opts.today)
    if (series) return { source: 'db', series }
  }
  const series = await fromGateway(opts.gateway, tickers, start, opts.today)
  if (!Object.keys(series).length) throw new DataUnavailableError('dashboard', 'no market data from store or provider')
  return { source: 'api', series }
}

/** Latest row per target ETF with its DCA signal. */
export function assetHealth(series: Record<string, MetricPoint[]>, tickers: readonly string[] = TARGET_ETFS): AssetHealthRow[] {
  const rows: AssetHealthRow[] = []
  for (const t of tickers) {
    const points = series[t]
    const last = points?.[points.length - 1]
    if (!last) continue
    const signal = last.rsi_14 != null && last.ma200_dist_pct != null ? classify(last.rsi_14, last.ma200_dist_pct) : null
    rows.push({ ticker: t, date: last.date, close: last.close, rsi_14: last.rsi_14, ma200_dist_pct: last.ma200_dist_pct, signal })
  }
  return rows
}

function closes(series: Record<string, MetricPoint[]>, t: string): ClosePoint[] {
  return (series[t] ?? []).map(p => ({ date: p.date, close: p.close }))
}

export function buildInsights(series: Record<string, MetricPoint[]>) {
  const divergence = divergenceMetrics(closes(series, 'QQQ'), closes(series, 'SOXX'))
  return {
    relativeStrength: relativeStrength(closes(series, 'SMH'), closes(series, 'QQQ')),
    infra: infraMonitor(closes(series, 'QQQ'), closes(series, 'SOXX')),
    divergence: { points: divergence, latest: divergence[divergence.length - 1] ?? null },
    riskOff: riskOffRadar(closes(series, 'XLP'), closes(series, 'XLY')),
    correlation: correlationMatrix({
      VOO: closes(series, 'VOO'),
      QQQ: closes(series, 'QQQ'),
      SMH: closes(series, 'SMH'),
      TLT: closes(series, 'TLT'),
    }),
  }
}

export type Insights = ReturnType<typeof buildInsights>

export type MacroView = {
  source: 'db' | 'api'
  snapshot: MacroSnapshot
  fearGreed: Reading
  vix: Reading
  us10y: Reading
}

/**
 * Latest macro row from the store, else a live snapshot. A stored row without
 * a Fear & Greed reading is topped up live when `fearGreed` is given.
 */
export async function loadMacro(opts: {
  store: MetricsStore | null
  gateway: MarketDataGateway
  today: string
  fearGreed?: () => Promise<FearGreedReading>
}): Promise<MacroView> {
  let snapshot: MacroSnapshot | null = null
  let source: MacroView['source'] = 'db'
  if (opts.store) {
    try {
      snapshot = latestMacro(await opts.store.fetchMacro(addDays(opts.today, -14)))
    } catch (e) {
      if (!(e instanceof StoreError)) throw e
      console.warn('dashboard: macro read failed, using live data', e.message)
    }
  }
  if (!snapshot) {
    snapshot = await opts.gateway.fetchMacro(opts.today)
    source = 'api'
  }
  let rating: string | undefined
  if (snapshot.fear_greed_index == null && opts.fearGreed) {
    try {
      const live = await opts.fearGreed()
      snapshot = { ...snapshot, fear_greed_index: Math.trunc(live.score) }
      rating = live.rating
    } catch (e) {
      if (!(e instanceof DataUnavailableError)) throw e
      console.warn('dashboard: fear & greed unavailable', e.message)
    }
  }
  return {
    source,
    snapshot,
    fearGreed: readFearGreed(snapshot.fear_greed_index, rating),
    vix: readVix(snapshot.vix_close),
    us10y: readUs10y(snapshot.us10y_yield),
  }
}

export type TickerHistory = {
  ticker: string
  dates: string[]
  close: number[]
  sma20: (number | null)[]
  sma200: (number | null)[]
  bbUpper: (number | null)[]
  bbLower: (number | null)[]
  rsi: (number | null)[]
  macd: number[]
  macdSignal: number[]
  macdHist: number[]
  volume: (number | null)[]
  // close at or below the open
  down: boolean[]
}

/** Chart series for one ticker, computed over warm-up history and cut to the range. */
export async function tickerHistory(gateway: MarketDataGateway, ticker: string, range: TimeRange, today: string): Promise<TickerHistory> {
  const start = addDays(today, -rangeDays(range))
  const bars = await gateway.fetchPriceHistory(ticker, addDays(start, -WARMUP_DAYS), today)
  const c = bars.map(b => b.close)
  const from = Math.max(0, bars.findIndex(b => b.date >= start))
  const bb = bollinger(c, 20, 2)
  const m = macd(c)
  const cut = <T>(xs: T[]) => xs.slice(from)
  return {
    ticker,
    dates: cut(bars.map(b => b.date)),
    close: cut(c),
    sma20: cut(sma(c, 20)),
    sma200: cut(sma(c, 200)),
    bbUpper: cut(bb.upper),
    bbLower: cut(bb.lower),
    rsi: cut(rsi14(c, 14)),
    macd: cut(m.macd),
    macdSignal: cut(m.signal),
    macdHist: cut(m.hist),
    volume: cut(bars.map(b => b.volume ?? null)),
    down: cut(bars.map(b => b.open != null && b.close <= b.open)),
  }
}
