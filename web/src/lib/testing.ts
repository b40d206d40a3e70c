// In-process stand-ins for the gateway, store and notifier used by the tests.
import type { MacroSnapshot, MarketDailyRow, PriceBar } from '../types'
import { addDays } from './config'
import { DataUnavailableError, StoreError } from './errors'
import type { MarketDataGateway } from './gateway'
import type { Delivery, Notifier } from './notify'
import type { MetricsStore } from './store'

/** One bar per calendar day starting at `start`. */
export function makeBars(ticker: string, closes: number[], start = '2024-01-01'): PriceBar[] {
  return closes.map((close, i) => ({ date: addDays(start, i), ticker, close }))
}

/** Bars whose last date is `end`. */
export function barsEndingOn(ticker: string, closes: number[], end: string): PriceBar[] {
  return makeBars(ticker, closes, addDays(end, -(closes.length - 1)))
}

export class FakeGateway implements MarketDataGateway {
  readonly priceCalls: { ticker: string; start: string; end: string }[] = []
  macroCalls = 0

  constructor(
    private readonly history: Record<string, PriceBar[]>,
    private readonly macro: MacroSnapshot | Error = new DataUnavailableError('macro', 'not configured'),
  ) {}

  async fetchPriceHistory(ticker: string, start: string, end: string) {
    this.priceCalls.push({ ticker, start, end })
    const bars = (this.history[ticker] ?? []).filter(b => b.date >= start && b.date <= end)
    if (!bars.length) throw new DataUnavailableError(`fake:${ticker}`, 'no data')
    return bars
  }

  async fetchMacro(date: string) {
    this.macroCalls++
    if (this.macro instanceof Error) throw this.macro
    return { ...this.macro, date }
  }
}

export class MemoryStore implements MetricsStore {
  readonly market = new Map<string, MarketDailyRow>()
  readonly macro = new Map<string, MacroSnapshot>()
  readonly marketBatches: number[] = []
  readonly macroBatches: number[] = []
  failReads = false

  async upsertMarketDaily(rows: MarketDailyRow[]) {
    this.marketBatches.push(rows.length)
    for (const r of rows) this.market.set(`${r.date}|${r.ticker}`, { ...r })
  }

  async upsertMacro(rows: MacroSnapshot[]) {
    this.macroBatches.push(rows.length)
    for (const r of rows) this.macro.set(r.date, { ...r })
  }

  async fetchMarketDaily(tickers: string[], start?: string) {
    if (this.failReads) throw new StoreError('select market_daily_metrics failed', 503)
    return Array.from(this.market.values())
      .filter(r => tickers.includes(r.ticker) && (start == null || r.date >= start))
      .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))
  }

  async fetchMacro(start?: string) {
    if (this.failReads) throw new StoreError('select macro_indicators failed', 503)
    return Array.from(this.macro.values())
      .filter(r => start == null || r.date >= start)
      .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))
  }
}

export class RecordingNotifier implements Notifier {
  readonly sent: { title: string; content: string }[] = []

  async deliver(title: string, content: string): Promise<Delivery> {
    this.sent.push({ title, content })
    return { delivered: true, channel: 'log' }
  }
}

export type RecordedRequest = { url: string; init?: RequestInit }

/** fetch double answering each call from `respond`, recording the requests. */
export function fakeFetch(respond: (url: string, init?: RequestInit) => Response | Promise<Response>) {
  const calls: RecordedRequest[] = []
  const impl: typeof fetch = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url
    calls.push({ url, init })
    return respond(url, init)
  }
  return { impl, calls }
}

export function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } })
}
