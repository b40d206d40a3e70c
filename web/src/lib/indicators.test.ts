import { describe, expect, it } from 'vitest'
import { InsufficientHistoryError, InvalidInputError } from './errors'
import {
  IndicatorStream,
  bollinger,
  computeIndicatorSeries,
  computeIndicators,
  ma200DistSeries,
  macd,
  RSI_SPAN,
  rsi14,
  sma,
} from './indicators'
import { classifySnapshot } from './signals'
import { makeBars } from './testing'

// 100, 102, 101, 103, 102, ... : seven +2 and seven -1 moves over 15 closes
function zigzag(n: number) {
  const out = [100]
  for (let i = 1; i < n; i++) out.push(out[i - 1] + (i % 2 === 1 ? 2 : -1))
  return out
}

function wave(n: number) {
  return Array.from({ length: n }, (_, i) => 100 + 10 * Math.sin(i / 7) + i * 0.05)
}

describe('rsi14', () => {
  it('seeds with the mean gain and loss of the first 14 changes', () => {
    const rsi = rsi14(zigzag(15))
    expect(rsi.slice(0, 14).every(v => v === null)).toBe(true)
    // avg gain 1, avg loss 0.5
    expect(rsi[14]).toBeCloseTo(66.666667, 5)
  })

  it('applies Wilder smoothing after the seed', () => {
    const closes = [...zigzag(15)]
    closes.push(closes[14] + 1)
    // avgGain (13 + 1) / 14 = 1, avgLoss 6.5 / 14
    expect(rsi14(closes)[15]).toBeCloseTo(68.292683, 5)
  })

  it('is 50 on a flat series and 100 without losses', () => {
    expect(rsi14(Array(20).fill(10))[19]).toBe(50)
    expect(rsi14(Array.from({ length: 20 }, (_, i) => 10 + i))[19]).toBe(100)
    expect(rsi14(Array.from({ length: 20 }, (_, i) => 30 - i))[19]).toBe(0)
  })

  it('depends only on the trailing span of closes', () => {
    const closes = wave(400)
    const full = rsi14(closes)
    const trimmed = rsi14(closes.slice(-(RSI_SPAN + 10)))
    expect(trimmed[trimmed.length - 1]).toBe(full[399])
    expect(trimmed[RSI_SPAN - 1]).toBe(full[400 - 11])
    // below the span every value comes from one run seeded at the first close
    expect(rsi14(closes.slice(0, RSI_SPAN)).slice(0, 100)).toEqual(rsi14(closes.slice(0, 100)))
  })

  it('returns all nulls when history is shorter than period + 1', () => {
    expect(rsi14([1, 2, 3])).toEqual([null, null, null])
  })
})

describe('series helpers', () => {
  it('sma uses a trailing window', () => {
    expect(sma([1, 2, 3, 4], 2)).toEqual([null, 1.5, 2.5, 3.5])
    expect(sma([1, 2], 3)).toEqual([null, null])
  })

  it('ma200DistSeries measures percent distance from the trailing mean', () => {
    const closes = [...Array(100).fill(90), ...Array(100).fill(110)]
    const dist = ma200DistSeries(closes)
    expect(dist[198]).toBeNull()
    expect(dist[199]).toBe(10)
  })

  it('bollinger bands collapse on a constant series', () => {
    const bb = bollinger(Array(25).fill(42))
    expect(bb.middle[24]).toBe(42)
    expect(bb.upper[24]).toBe(42)
    expect(bb.lower[24]).toBe(42)
    expect(bb.middle[18]).toBeNull()
  })

  it('macd is flat on a constant series', () => {
    const m = macd(Array(40).fill(5))
    expect(m.macd.every(v => v === 0)).toBe(true)
    expect(m.hist.every(v => v === 0)).toBe(true)
  })
})

describe('computeIndicators', () => {
  it('reads 10% above MA200 and RSI 100 after a step up', () => {
    const snap = computeIndicators(makeBars('QQQ', [...Array(100).fill(90), ...Array(100).fill(110)]))
    expect(snap).toEqual({ date: '2024-07-18', ticker: 'QQQ', close: 110, rsi_14: 100, ma200_dist_pct: 10 })
    expect(classifySnapshot(snap).code).toBe('SEVERE_OVERBOUGHT')
  })

  it('classifies a steady decline below MA200 as a great buy', () => {
    const closes = [...Array(200).fill(100), ...Array.from({ length: 20 }, (_, i) => 99 - i)]
    const snap = computeIndicators(makeBars('VOO', closes))
    expect(snap.close).toBe(80)
    expect(snap.rsi_14).toBe(0)
    expect(snap.ma200_dist_pct).toBeLessThan(0)
    expect(classifySnapshot(snap).code).toBe('GREAT_BUY')
  })

  it('gives RSI 50 and zero deviation on a flat series', () => {
    const snap = computeIndicators(makeBars('TLT', Array(200).fill(90)))
    expect(snap.rsi_14).toBe(50)
    expect(snap.ma200_dist_pct).toBe(0)
    expect(classifySnapshot(snap).code).toBe('NORMAL_DCA')
  })

  it('reports the RSI shortfall before the MA shortfall', () => {
    expect(() => computeIndicators(makeBars('SMH', Array(10).fill(1)))).toThrowError(
      new InsufficientHistoryError('RSI(14)', 15, 10),
    )
    try {
      computeIndicators(makeBars('SMH', Array(199).fill(1)))
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(InsufficientHistoryError)
      if (e instanceof InsufficientHistoryError) {
        expect(e.indicator).toBe('MA200')
        expect(e.required).toBe(200)
        expect(e.actual).toBe(199)
      }
    }
  })

  it('needs one more close than the RSI window', () => {
    expect(() => computeIndicators(makeBars('QQQ', Array<number>(14).fill(100)))).toThrowError(
      new InsufficientHistoryError('RSI(14)', 15, 14),
    )
    // 15 closes satisfy RSI(14) and fall through to the MA200 check
    expect(() => computeIndicators(makeBars('QQQ', Array<number>(15).fill(100)))).toThrowError(
      new InsufficientHistoryError('MA200', 200, 15),
    )
  })

  it('honours custom windows', () => {
    const snap = computeIndicators(makeBars('QQQ', [1, 2, 3, 4, 5]), { rsiWindow: 2, maWindow: 4 })
    expect(snap.rsi_14).toBe(100)
    // mean of 2..5 is 3.5
    expect(snap.ma200_dist_pct).toBeCloseTo(42.857143, 5)
  })

  it('rejects malformed series', () => {
    const bars = makeBars('QQQ', Array(200).fill(1))
    expect(() => computeIndicators([bars[1], bars[0], ...bars.slice(2)])).toThrow(InvalidInputError)
    expect(() => computeIndicators([...bars.slice(0, 199), { ...bars[199], close: Number.NaN }])).toThrow(InvalidInputError)
    expect(() => computeIndicators([...bars.slice(0, 199), { ...bars[199], ticker: 'VOO' }])).toThrow(InvalidInputError)
    expect(() => computeIndicators([...bars.slice(0, 199), { ...bars[199], close: 0 }])).toThrow(InvalidInputError)
    expect(() => computeIndicators(bars, { rsiWindow: 0 })).toThrow(InvalidInputError)
  })

  it('only depends on the bars it is given', () => {
    const bars = makeBars('QQQ', wave(260))
    expect(computeIndicators(bars)).toEqual(computeIndicators(bars.map(b => ({ ...b }))))
  })
})

describe('computeIndicatorSeries', () => {
  it('starts at the first date with a full MA window and ends at the latest snapshot', () => {
    const bars = makeBars('QQQ', wave(260))
    const series = computeIndicatorSeries(bars)
    expect(series).toHaveLength(61)
    expect(series[0].date).toBe(bars[199].date)
    expect(series[series.length - 1]).toEqual(computeIndicators(bars))
  })
})

describe('IndicatorStream', () => {
  it('matches the batch series value for value', () => {
    const bars = makeBars('SMH', wave(RSI_SPAN + 60))
    const stream = new IndicatorStream('SMH')
    const out = bars.map(b => stream.push(b))
    expect(out.slice(0, 199).every(s => s === null)).toBe(true)
    expect(out.slice(199)).toEqual(computeIndicatorSeries(bars))
  })

  it('rejects out-of-order and foreign bars', () => {
    const stream = new IndicatorStream('SMH')
    stream.push({ date: '2024-01-02', ticker: 'SMH', close: 10 })
    expect(() => stream.push({ date: '2024-01-02', ticker: 'SMH', close: 11 })).toThrow(InvalidInputError)
    expect(() => stream.push({ date: '2024-01-03', ticker: 'QQQ', close: 11 })).toThrow(InvalidInputError)
  })
})
