import { sma } from './indicators'

export type ClosePoint = { date: string; close: number }

export type Aligned = { dates: string[]; a: number[]; b: number[] }

export function align(a: ClosePoint[], b: ClosePoint[]): Aligned {
  const bMap = new Map(b.map(p => [p.date, p.close]))
  const out: Aligned = { dates: [], a: [], b: [] }
  for (const p of a) {
    const other = bMap.get(p.date)
    if (other == null) continue
    out.dates.push(p.date)
    out.a.push(p.close)
    out.b.push(other)
  }
  return out
}

function maxOf(values: number[]) {
  return values.reduce((m, v) => (v > m ? v : m), -Infinity)
}

export type RelativeStrength = {
  points: { date: string; ratio: number; normalized: number }[]
  divergence: boolean
}

/**
 * lead/bench ratio (e.g. SMH/QQQ). Flags a divergence when the benchmark
 * closes at a new `window`-day high, the lead does not, and the ratio's last
 * three changes average below zero.
 */
export function relativeStrength(lead: ClosePoint[], bench: ClosePoint[], window = 20): RelativeStrength | null {
  const { dates, a, b } = align(lead, bench)
  if (dates.length < 25 || dates.length <= window) return null
  const ratio = a.map((v, i) => v / b[i])
  const points = dates.map((date, i) => ({ date, ratio: ratio[i], normalized: ratio[i] / ratio[0] }))

  const n = dates.length
  const benchNewHigh = b[n - 1] > maxOf(b.slice(n - window - 1, n - 1))
  const leadNewHigh = a[n - 1] > maxOf(a.slice(n - window - 1, n - 1))
  const diffs = [ratio[n - 1] - ratio[n - 2], ratio[n - 2] - ratio[n - 3], ratio[n - 3] - ratio[n - 4]]
  const turningDown = (diffs[0] + diffs[1] + diffs[2]) / 3 < 0

  return { points, divergence: benchNewHigh && !leadNewHigh && turningDown }
}

export type DivergenceSignal = 'SEVERE' | 'MILD' | 'HEALTHY'

export type DivergencePoint = {
  date: string
  qqq_drawdown: number // fraction of rolling max, <= 0
  soxx_drawdown: number
  signal: DivergenceSignal
}

export const DIVERGENCE = {
  benchNearHigh: -0.03,
  severe: -0.08,
  mild: -0.05,
} as const

function divergenceSignal(qqqDd: number, soxxDd: number): DivergenceSignal {
  // only meaningful while the index itself is close to its high
  if (qqqDd < DIVERGENCE.benchNearHigh) return 'HEALTHY'
  if (soxxDd <= DIVERGENCE.severe) return 'SEVERE'
  if (soxxDd <= DIVERGENCE.mild) return 'MILD'
  return 'HEALTHY'
}

/** Semiconductor lag behind the index, from drawdowns off rolling `window` highs. */
export function divergenceMetrics(qqq: ClosePoint[], soxx: ClosePoint[], window = 60): DivergencePoint[] {
  const { dates, a, b } = align(qqq, soxx)
  const out: DivergencePoint[] = []
  for (let i = window - 1; i < dates.length; i++) {
    const qMax = maxOf(a.slice(i - window + 1, i + 1))
    const sMax = maxOf(b.slice(i - window + 1, i + 1))
    const qDd = (a[i] - qMax) / qMax
    const sDd = (b[i] - sMax) / sMax
    out.push({ date: dates[i], qqq_drawdown: qDd, soxx_drawdown: sDd, signal: divergenceSignal(qDd, sDd) })
  }
  return out
}

export type InfraMonitor = {
  points: { date: string; qqq: number; ratio: number }[]
  exhaustion: boolean
}

/**
 * QQQ against the SOXX/QQQ ratio. Hardware momentum reads as exhausted when
 * QQQ closes above its previous `window` closes while the ratio stays below
 * its previous `window`-day high.
 */
export function infraMonitor(qqq: ClosePoint[], soxx: ClosePoint[], window = 20): InfraMonitor | null {
  const { dates, a, b } = align(qqq, soxx)
  if (!dates.length) return null
  const ratio = b.map((v, i) => v / a[i])
  const points = dates.map((date, i) => ({ date, qqq: a[i], ratio: ratio[i] }))
  const n = dates.length
  if (n <= window) return { points, exhaustion: false }
  const qqqHigh = a[n - 1] > maxOf(a.slice(n - window - 1, n - 1))
  const ratioLag = ratio[n - 1] < maxOf(ratio.slice(n - window - 1, n - 1))
  return { points, exhaustion: qqqHigh && ratioLag }
}

export type RiskOff = {
  points: { date: string; ratio: number; ma20: number | null }[]
  warning: boolean
}

/** Staples/discretionary (XLP/XLY) ratio; a fast rise of its 20-day mean reads as risk-off. */
export function riskOffRadar(xlp: ClosePoint[], xly: ClosePoint[]): RiskOff | null {
  const { dates, a, b } = align(xlp, xly)
  if (!dates.length) return null
  const ratio = a.map((v, i) => v / b[i])
  const ma20 = sma(ratio, 20)
  const valid = ma20.filter((v): v is number => v != null)
  let warning = false
  if (valid.length > 5) {
    const last5 = valid.slice(-5)
    warning = valid[valid.length - 1] > Math.min(...last5) * 1.05
  }
  return { points: dates.map((date, i) => ({ date, ratio: ratio[i], ma20: ma20[i] })), warning }
}

export function pearson(x: number[], y: number[]): number | null {
  const n = Math.min(x.length, y.length)
  if (n < 2) return null
  let mx = 0, my = 0
  for (let i = 0; i < n; i++) { mx += x[i]; my += y[i] }
  mx /= n; my /= n
  let sxy = 0, sxx = 0, syy = 0
  for (let i = 0; i < n; i++) {
    const dx = x[i] - mx, dy = y[i] - my
    sxy += dx * dy; sxx += dx * dx; syy += dy * dy
  }
  if (sxx === 0 || syy === 0) return null
  return sxy / Math.sqrt(sxx * syy)
}

export type Correlation = {
  tickers: string[]
  matrix: (number | null)[][]
  liquidityWarning: boolean
}

/**
 * Pearson correlation of closes over the last `lookback` common dates.
 * TLT moving with QQQ (positive correlation) is flagged as liquidity risk.
 */
export function correlationMatrix(series: Record<string, ClosePoint[]>, lookback = 90, minPoints = 30): Correlation | null {
  const tickers = Object.keys(series).filter(t => series[t]?.length)
  if (tickers.length < 2) return null
  const maps = tickers.map(t => new Map(series[t].map(p => [p.date, p.close])))
  const common = series[tickers[0]].map(p => p.date).filter(d => maps.every(m => m.has(d)))
  if (common.length < minPoints) return null
  const dates = common.slice(-lookback)
  const cols = maps.map(m => dates.map(d => m.get(d) ?? NaN))
  const matrix = cols.map((x, i) => cols.map((y, j) => (i === j ? 1 : pearson(x, y))))

  const tlt = tickers.indexOf('TLT'), qqq = tickers.indexOf('QQQ')
  const tq = tlt >= 0 && qqq >= 0 ? matrix[tlt][qqq] : null
  return { tickers, matrix, liquidityWarning: tq != null && tq > 0 }
}
