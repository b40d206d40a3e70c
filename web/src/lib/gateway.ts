import yahooFinance from 'yahoo-finance2'
import type { FearGreedReading, MacroSnapshot, PriceBar } from '../types'
import { addDays, isoDate } from './config'
import { DataUnavailableError, errorMessage } from './errors'
import { fetchFearGreed } from './fearGreed'
import { buildMacroSnapshot } from './macro'

export interface MarketDataGateway {
  /** Daily closes in [start, end], ascending. */
  fetchPriceHistory(ticker: string, start: string, end: string): Promise<PriceBar[]>
  fetchMacro(date: string): Promise<MacroSnapshot>
}

export type ChartQuote = { date: Date; close: number | null; open?: number | null; volume?: number | null }
export type ChartFn = (symbol: string, opts: { period1: Date; period2: Date; interval: '1d' }) => Promise<{ quotes: ChartQuote[] }>

export const MACRO_LEGS = ['^VIX', '^TNX', 'SOXX', 'QQQ', 'XLP', 'XLY'] as const

const yahooChart: ChartFn = (symbol, opts) => yahooFinance.chart(symbol, opts)

// Drops empty closes and keeps the last quote of a day (Yahoo repeats the live bar)
export function quotesToBars(ticker: string, quotes: ChartQuote[]): PriceBar[] {
  const byDate = new Map<string, PriceBar>()
  for (const q of quotes) {
    const close = q.close
    if (close == null || !Number.isFinite(close) || close <= 0) continue
    if (!(q.date instanceof Date) || Number.isNaN(q.date.getTime())) continue
    const date = isoDate(q.date)
    const bar: PriceBar = { date, ticker, close }
    if (q.open != null && Number.isFinite(q.open)) bar.open = q.open
    if (q.volume != null && Number.isFinite(q.volume)) bar.volume = q.volume
    byDate.set(date, bar)
  }
  return Array.from(byDate.values()).sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))
}

export class YahooGateway implements MarketDataGateway {
  private readonly chart: ChartFn
  private readonly fearGreed: () => Promise<FearGreedReading>
  private readonly now: () => Date

  constructor(opts?: { chart?: ChartFn; fearGreed?: () => Promise<FearGreedReading>; now?: () => Date }) {
    this.chart = opts?.chart ?? yahooChart
    this.fearGreed = opts?.fearGreed ?? (() => fetchFearGreed())
    this.now = opts?.now ?? (() => new Date())
  }

  async fetchPriceHistory(ticker: string, start: string, end: string): Promise<PriceBar[]> {
    let quotes: ChartQuote[]
    try {
      const res = await this.chart(ticker, {
        period1: new Date(`${start}T00:00:00Z`),
        // period2 is exclusive
        period2: new Date(`${addDays(end, 1)}T00:00:00Z`),
        interval: '1d',
      })
      quotes = Array.isArray(res?.quotes) ? res.quotes : []
    } catch (e) {
      throw new DataUnavailableError(`yahoo:${ticker}`, errorMessage(e), { cause: e })
    }
    const bars = quotesToBars(ticker, quotes).filter(b => b.date >= start && b.date <= end)
    if (!bars.length) throw new DataUnavailableError(`yahoo:${ticker}`, `no price data between ${start} and ${end}`)
    return bars
  }

  /**
   * Macro snapshot as of `date`: last close on or before it for each leg.
   * Fear & Greed has no history, so it is only read when `date` is today.
   */
  async fetchMacro(date: string): Promise<MacroSnapshot> {
    const start = addDays(date, -10)
    const legs = await Promise.allSettled(MACRO_LEGS.map(t => this.fetchPriceHistory(t, start, date)))
    const closes: Record<string, number | null> = {}
    const failures: string[] = []
    legs.forEach((res, i) => {
      const t = MACRO_LEGS[i]
      if (res.status === 'fulfilled') {
        closes[t] = res.value[res.value.length - 1].close
      } else {
        closes[t] = null
        failures.push(errorMessage(res.reason))
      }
    })

    let fng: number | null = null
    const today = isoDate(this.now())
    if (date === today) {
      try {
        fng = (await this.fearGreed()).score
      } catch (e) {
        failures.push(errorMessage(e))
      }
    }

    if (failures.length) console.warn('gateway: macro legs unavailable', { date, failures })
    const gotAny = Object.values(closes).some(v => v != null) || fng != null
    if (!gotAny) throw new DataUnavailableError('macro', `no macro source answered for ${date}`)
    return buildMacroSnapshot(date, closes, fng)
  }
}
