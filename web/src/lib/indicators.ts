import type { IndicatorSnapshot, PriceBar } from '../types'
import { InsufficientHistoryError, InvalidInputError } from './errors'

export type IndicatorOptions = {
  rsiWindow?: number
  maWindow?: number
}

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/

function windows(opts?: IndicatorOptions) {
  const rsiWindow = opts?.rsiWindow ?? 14
  const maWindow = opts?.maWindow ?? 200
  if (!Number.isInteger(rsiWindow) || rsiWindow < 1) throw new InvalidInputError(`rsiWindow must be a positive integer, got ${rsiWindow}`)
  if (!Number.isInteger(maWindow) || maWindow < 1) throw new InvalidInputError(`maWindow must be a positive integer, got ${maWindow}`)
  return { rsiWindow, maWindow }
}

function checkBar(bar: PriceBar, ticker: string, prevDate: string | null) {
  if (bar.ticker !== ticker) throw new InvalidInputError(`mixed tickers in one series: ${ticker} and ${bar.ticker}`)
  if (!DATE_RE.test(bar.date)) throw new InvalidInputError(`${ticker}: bad date "${bar.date}"`)
  if (prevDate != null && bar.date <= prevDate) throw new InvalidInputError(`${ticker}: dates must be strictly ascending (${prevDate} then ${bar.date})`)
  if (typeof bar.close !== 'number' || !Number.isFinite(bar.close) || bar.close <= 0) {
    throw new InvalidInputError(`${ticker} ${bar.date}: close must be a positive number, got ${bar.close}`)
  }
}

function validateBars(bars: PriceBar[]): number[] {
  if (!Array.isArray(bars) || !bars.length) return []
  const ticker = bars[0].ticker
  let prev: string | null = null
  for (const b of bars) {
    checkBar(b, ticker, prev)
    prev = b.date
  }
  return bars.map(b => b.close)
}

function mean(values: number[]) {
  let sum = 0
  for (const v of values) sum += v
  return sum / values.length
}

function distPct(close: number, ma: number) {
  return (close - ma) / ma * 100
}

// Flat series has neither gains nor losses: neutral 50
function rsiFromAverages(avgGain: number, avgLoss: number) {
  if (avgGain === 0 && avgLoss === 0) return 50
  if (avgLoss === 0) return 100
  return 100 - 100 / (1 + avgGain / avgLoss)
}

export function sma(values: number[], period: number) {
  if (!Array.isArray(values) || period <= 0) return Array<number | null>(values?.length || 0).fill(null)
  if (values.length < period) return Array<number | null>(values.length).fill(null)
  const out = Array<number | null>(values.length).fill(null)
  let sum = 0
  for (let i = 0; i < values.length; i++) {
    sum += values[i]
    if (i >= period) sum -= values[i - period]
    if (i >= period - 1) out[i] = sum / period
  }
  return out
}

/** Exponential moving average seeded with the first value (no bias adjustment). */
export function ema(values: number[], span: number) {
  const alpha = 2 / (span + 1)
  const out: number[] = []
  for (let i = 0; i < values.length; i++) {
    out.push(i === 0 ? values[0] : alpha * values[i] + (1 - alpha) * out[i - 1])
  }
  return out
}

// Wilder averages see at most this many closes: a date's RSI does not
// depend on how much earlier history was fetched.
export const RSI_SPAN = 250

/** Wilder RSI over closes[from..to]; writes every defined value into `out` when given. */
function wilder(closes: number[], from: number, to: number, period: number, out?: (number | null)[]) {
  if (to - from < period) return null
  let gains = 0, losses = 0
  for (let i = from + 1; i <= from + period; i++) {
    const ch = closes[i] - closes[i - 1]
    if (ch >= 0) gains += ch; else losses -= ch
  }
  let avgG = gains / period, avgL = losses / period
  let rsi = rsiFromAverages(avgG, avgL)
  if (out) out[from + period] = rsi
  for (let i = from + period + 1; i <= to; i++) {
    const ch = closes[i] - closes[i - 1]
    const g = ch > 0 ? ch : 0
    const l = ch < 0 ? -ch : 0
    avgG = (avgG * (period - 1) + g) / period
    avgL = (avgL * (period - 1) + l) / period
    rsi = rsiFromAverages(avgG, avgL)
    if (out) out[i] = rsi
  }
  return rsi
}

/**
 * Wilder RSI: seeded with the simple mean of the first `period` gains and
 * losses, then smoothed with (avg * (period - 1) + x) / period. Each value
 * uses at most the trailing `span` closes.
 */
export function rsi14(closes: number[], period = 14, span = RSI_SPAN) {
  const n = closes.length
  const rsi = Array<number | null>(n).fill(null)
  const s = Math.max(span, period + 1)
  wilder(closes, 0, Math.min(n, s) - 1, period, rsi)
  for (let i = s; i < n; i++) rsi[i] = wilder(closes, i - s + 1, i, period)
  return rsi
}

/** Percentage distance of each close from the trailing `period` mean. */
export function ma200DistSeries(closes: number[], period = 200) {
  const out = Array<number | null>(closes.length).fill(null)
  for (let i = period - 1; i < closes.length; i++) {
    out[i] = distPct(closes[i], mean(closes.slice(i - period + 1, i + 1)))
  }
  return out
}

export function macd(closes: number[], fast = 12, slow = 26, signal = 9) {
  const emaFast = ema(closes, fast)
  const emaSlow = ema(closes, slow)
  const line = closes.map((_, i) => emaFast[i] - emaSlow[i])
  const sig = ema(line, signal)
  return { macd: line, signal: sig, hist: line.map((v, i) => v - sig[i]) }
}

export function bollinger(closes: number[], period = 20, k = 2) {
  const middle = Array<number | null>(closes.length).fill(null)
  const upper = Array<number | null>(closes.length).fill(null)
  const lower = Array<number | null>(closes.length).fill(null)
  if (period < 2) return { middle, upper, lower }
  for (let i = period - 1; i < closes.length; i++) {
    const win = closes.slice(i - period + 1, i + 1)
    const m = mean(win)
    let ss = 0
    for (const v of win) ss += (v - m) ** 2
    const sd = Math.sqrt(ss / (period - 1))
    middle[i] = m
    upper[i] = m + k * sd
    lower[i] = m - k * sd
  }
  return { middle, upper, lower }
}

function requireHistory(n: number, rsiWindow: number, maWindow: number) {
  if (n < rsiWindow + 1) throw new InsufficientHistoryError(`RSI(${rsiWindow})`, rsiWindow + 1, n)
  if (n < maWindow) throw new InsufficientHistoryError(`MA${maWindow}`, maWindow, n)
}

/** Snapshot for the latest bar of an ordered single-ticker series. */
export function computeIndicators(bars: PriceBar[], opts?: IndicatorOptions): IndicatorSnapshot {
  const { rsiWindow, maWindow } = windows(opts)
  const closes = validateBars(bars)
  requireHistory(closes.length, rsiWindow, maWindow)
  const last = closes.length - 1
  const rsi = rsi14(closes, rsiWindow)[last]
  if (rsi == null) throw new InsufficientHistoryError(`RSI(${rsiWindow})`, rsiWindow + 1, closes.length)
  const ma = mean(closes.slice(last - maWindow + 1))
  return {
    date: bars[last].date,
    ticker: bars[last].ticker,
    close: closes[last],
    rsi_14: rsi,
    ma200_dist_pct: distPct(closes[last], ma),
  }
}

/** One snapshot per date that has a full RSI and MA window behind it. */
export function computeIndicatorSeries(bars: PriceBar[], opts?: IndicatorOptions): IndicatorSnapshot[] {
  const { rsiWindow, maWindow } = windows(opts)
  const closes = validateBars(bars)
  requireHistory(closes.length, rsiWindow, maWindow)
  const rsi = rsi14(closes, rsiWindow)
  const out: IndicatorSnapshot[] = []
  for (let i = Math.max(maWindow - 1, rsiWindow); i < closes.length; i++) {
    const r = rsi[i]
    if (r == null) continue
    out.push({
      date: bars[i].date,
      ticker: bars[i].ticker,
      close: closes[i],
      rsi_14: r,
      ma200_dist_pct: distPct(closes[i], mean(closes.slice(i - maWindow + 1, i + 1))),
    })
  }
  return out
}

/**
 * Incremental counterpart of computeIndicatorSeries for one ticker. Every
 * snapshot it returns equals the batch result for the same date.
 */
export class IndicatorStream {
  readonly ticker: string
  private readonly rsiWindow: number
  private readonly maWindow: number
  private readonly span: number
  private readonly window: number[] = []
  private readonly recent: number[] = []
  private prevDate: string | null = null

  constructor(ticker: string, opts?: IndicatorOptions) {
    const w = windows(opts)
    this.ticker = ticker
    this.rsiWindow = w.rsiWindow
    this.maWindow = w.maWindow
    this.span = Math.max(RSI_SPAN, w.rsiWindow + 1)
  }

  push(bar: PriceBar): IndicatorSnapshot | null {
    checkBar(bar, this.ticker, this.prevDate)
    this.prevDate = bar.date
    this.recent.push(bar.close)
    if (this.recent.length > this.span) this.recent.shift()
    this.window.push(bar.close)
    if (this.window.length > this.maWindow) this.window.shift()

    const rsi = wilder(this.recent, 0, this.recent.length - 1, this.rsiWindow)
    if (rsi == null || this.window.length < this.maWindow) return null
    return {
      date: bar.date,
      ticker: bar.ticker,
      close: bar.close,
      rsi_14: rsi,
      ma200_dist_pct: distPct(bar.close, mean(this.window)),
    }
  }
}
