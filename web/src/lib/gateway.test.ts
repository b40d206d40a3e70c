import { describe, expect, it, vi } from 'vitest'
import { DataUnavailableError } from './errors'
import { YahooGateway, quotesToBars, type ChartFn, type ChartQuote } from './gateway'

const q = (iso: string, close: number | null): ChartQuote => ({ date: new Date(iso), close })

describe('quotesToBars', () => {
  it('drops empty closes, keeps the last quote per day and sorts', () => {
    const bars = quotesToBars('QQQ', [
      q('2024-03-04T14:30:00Z', 101),
      q('2024-03-01T14:30:00Z', 100),
      q('2024-03-05T14:30:00Z', null),
      q('2024-03-04T20:00:00Z', 102),
      q('2024-03-06T14:30:00Z', 0),
    ])
    expect(bars).toEqual([
      { date: '2024-03-01', ticker: 'QQQ', close: 100 },
      { date: '2024-03-04', ticker: 'QQQ', close: 102 },
    ])
  })

  it('keeps open and volume when the quote has them', () => {
    const bars = quotesToBars('SOXX', [
      { date: new Date('2024-03-04T20:00:00Z'), close: 210, open: 205, volume: 1_200_000 },
      { date: new Date('2024-03-05T20:00:00Z'), close: 212, open: null, volume: null },
    ])
    expect(bars).toEqual([
      { date: '2024-03-04', ticker: 'SOXX', close: 210, open: 205, volume: 1_200_000 },
      { date: '2024-03-05', ticker: 'SOXX', close: 212 },
    ])
  })
})

describe('YahooGateway.fetchPriceHistory', () => {
  it('asks for an inclusive end date and trims to the window', async () => {
    const chart = vi.fn<ChartFn>(async () => ({
      quotes: [q('2024-02-28T14:30:00Z', 1), q('2024-03-01T14:30:00Z', 2), q('2024-03-02T14:30:00Z', 3)],
    }))
    const gw = new YahooGateway({ chart })
    const bars = await gw.fetchPriceHistory('SMH', '2024-02-29', '2024-03-01')
    expect(bars).toEqual([{ date: '2024-03-01', ticker: 'SMH', close: 2 }])
    expect(chart).toHaveBeenCalledWith('SMH', {
      period1: new Date('2024-02-29T00:00:00Z'),
      period2: new Date('2024-03-02T00:00:00Z'),
      interval: '1d',
    })
  })

  it('maps provider failures to DataUnavailableError', async () => {
    const gw = new YahooGateway({ chart: async () => { throw new Error('429 Too Many Requests') } })
    const err = await gw.fetchPriceHistory('TQQQ', '2024-01-01', '2024-02-01').catch((e: unknown) => e)
    expect(err).toBeInstanceOf(DataUnavailableError)
    expect(err instanceof Error && err.message).toBe('yahoo:TQQQ: 429 Too Many Requests')
  })

  it('treats an empty answer as unavailable', async () => {
    const gw = new YahooGateway({ chart: async () => ({ quotes: [] }) })
    await expect(gw.fetchPriceHistory('QLD', '2024-01-01', '2024-02-01')).rejects.toThrow(DataUnavailableError)
  })
})

describe('YahooGateway.fetchMacro', () => {
  const closes: Record<string, number> = { '^VIX': 18.5, '^TNX': 4.2, SOXX: 220, QQQ: 440, XLP: 80, XLY: 160 }
  const chart: ChartFn = async (symbol) => ({ quotes: [q('2024-06-03T20:00:00Z', closes[symbol] ?? null)] })

  it('builds the snapshot with a live Fear & Greed score on the current day', async () => {
    const fearGreed = vi.fn(async () => ({ score: 33.8, rating: 'fear', source: 'cnn' as const }))
    const gw = new YahooGateway({ chart, fearGreed, now: () => new Date('2024-06-03T21:00:00Z') })
    await expect(gw.fetchMacro('2024-06-03')).resolves.toEqual({
      date: '2024-06-03',
      vix_close: 18.5,
      fear_greed_index: 33,
      us10y_yield: 4.2,
      soxx_qqq_ratio: 0.5,
      xlp_xly_ratio: 0.5,
    })
    expect(fearGreed).toHaveBeenCalledOnce()
  })

  it('skips Fear & Greed for past dates', async () => {
    const fearGreed = vi.fn(async () => ({ score: 50, rating: 'neutral', source: 'cnn' as const }))
    const gw = new YahooGateway({ chart, fearGreed, now: () => new Date('2024-06-10T12:00:00Z') })
    const snap = await gw.fetchMacro('2024-06-03')
    expect(snap.fear_greed_index).toBeNull()
    expect(fearGreed).not.toHaveBeenCalled()
  })

  it('fails only when no source answers', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const gw = new YahooGateway({
      chart: async () => { throw new Error('offline') },
      now: () => new Date('2024-06-10T12:00:00Z'),
    })
    await expect(gw.fetchMacro('2024-06-03')).rejects.toThrow(DataUnavailableError)
  })
})
