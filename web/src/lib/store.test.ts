import { describe, expect, it, vi } from 'vitest'
import { StoreError } from './errors'
import { PAGE_SIZE, SupabaseStore, createStoreFromEnv } from './store'
import { fakeFetch, jsonResponse } from './testing'

const URL_BASE = 'https://example.supabase.co'

describe('SupabaseStore', () => {
  it('upserts market rows keyed on (date, ticker)', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {})
    const { impl, calls } = fakeFetch(() => new Response(null, { status: 201 }))
    const store = new SupabaseStore(`${URL_BASE}/`, 'test-secret', impl)
    await store.upsertMarketDaily([
      { date: '2024-05-01', ticker: 'QQQ', close: 440.1, rsi_14: 55.5, ma200_dist_pct: 7.25, created_at: '2024-05-01T21:00:00Z' },
    ])
    expect(calls).toHaveLength(1)
    const { url, init } = calls[0]
    expect(url).toBe(`${URL_BASE}/rest/v1/market_daily_metrics?on_conflict=date,ticker`)
    expect(init?.method).toBe('POST')
    const headers = new Headers(init?.headers)
    expect(headers.get('apikey')).toBe('test-secret')
    expect(headers.get('Authorization')).toBe('Bearer test-secret')
    expect(headers.get('Prefer')).toBe('resolution=merge-duplicates')
    expect(JSON.parse(String(init?.body))).toEqual([
      { date: '2024-05-01', ticker: 'QQQ', close: 440.1, rsi_14: 55.5, ma200_dist_pct: 7.25 },
    ])
  })

  it('upserts macro rows keyed on date and skips empty batches', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {})
    const { impl, calls } = fakeFetch(() => new Response(null, { status: 204 }))
    const store = new SupabaseStore(URL_BASE, 'test-secret', impl)
    await store.upsertMacro([])
    expect(calls).toHaveLength(0)
    await store.upsertMacro([
      { date: '2024-05-01', vix_close: 13, fear_greed_index: null, us10y_yield: 4.5, soxx_qqq_ratio: null, xlp_xly_ratio: 0.48 },
    ])
    expect(calls[0].url).toBe(`${URL_BASE}/rest/v1/macro_indicators?on_conflict=date`)
  })

  it('raises StoreError on a rejected write', async () => {
    const { impl } = fakeFetch(() => new Response('duplicate key', { status: 409 }))
    const store = new SupabaseStore(URL_BASE, 'test-secret', impl)
    const err = await store.upsertMarketDaily([{ date: '2024-05-01', ticker: 'QQQ', close: 1, rsi_14: null, ma200_dist_pct: null }])
      .catch((e: unknown) => e)
    expect(err).toBeInstanceOf(StoreError)
    expect(err instanceof StoreError && [err.status, err.body]).toEqual([409, 'duplicate key'])
  })

  it('reads rows in date order and parses numeric strings', async () => {
    const { impl, calls } = fakeFetch(() => jsonResponse([
      { date: '2024-05-01', ticker: 'VOO', close: '470.5', rsi_14: '48.2', ma200_dist_pct: null, created_at: '2024-05-01T21:00:00Z' },
    ]))
    const store = new SupabaseStore(URL_BASE, 'test-secret', impl)
    const rows = await store.fetchMarketDaily(['VOO', 'QQQ'], '2024-01-01')
    expect(rows).toEqual([
      { date: '2024-05-01', ticker: 'VOO', close: 470.5, rsi_14: 48.2, ma200_dist_pct: null, created_at: '2024-05-01T21:00:00Z' },
    ])
    const url = new URL(calls[0].url)
    expect(url.pathname).toBe('/rest/v1/market_daily_metrics')
    expect(url.searchParams.get('ticker')).toBe('in.("VOO","QQQ")')
    expect(url.searchParams.get('date')).toBe('gte.2024-01-01')
    expect(url.searchParams.get('order')).toBe('date.asc,ticker.asc')
    expect(url.searchParams.get('limit')).toBe('1000')
    expect(url.searchParams.get('offset')).toBe('0')
  })

  it('pages past the server row cap', async () => {
    const all = Array.from({ length: 2 * PAGE_SIZE + 300 }, (_, i) => ({
      date: `2024-${String(1 + Math.floor(i / 300)).padStart(2, '0')}-01`,
      ticker: `T${i % 300}`,
      close: i,
      rsi_14: null,
      ma200_dist_pct: null,
    }))
    const { impl, calls } = fakeFetch(url => {
      const q = new URL(url).searchParams
      const offset = Number(q.get('offset') ?? 0)
      const limit = Math.min(Number(q.get('limit') ?? PAGE_SIZE), PAGE_SIZE)
      return jsonResponse(all.slice(offset, offset + limit))
    })
    const rows = await new SupabaseStore(URL_BASE, 'test-secret', impl).fetchMarketDaily(['QQQ'], '2024-01-01')
    expect(rows).toHaveLength(2300)
    expect(rows[2299].close).toBe(2299)
    expect(calls.map(c => new URL(c.url).searchParams.get('offset'))).toEqual(['0', '1000', '2000'])
  })

  it('stops after an exactly full last page', async () => {
    const all = Array.from({ length: PAGE_SIZE }, (_, i) => ({ date: '2024-01-01', vix_close: i }))
    const { impl, calls } = fakeFetch(url => {
      const offset = Number(new URL(url).searchParams.get('offset') ?? 0)
      return jsonResponse(all.slice(offset, offset + PAGE_SIZE))
    })
    const rows = await new SupabaseStore(URL_BASE, 'test-secret', impl).fetchMacro()
    expect(rows).toHaveLength(PAGE_SIZE)
    expect(calls).toHaveLength(2)
  })

  it('does not query for an empty ticker list', async () => {
    const { impl, calls } = fakeFetch(() => jsonResponse([]))
    await expect(new SupabaseStore(URL_BASE, 'test-secret', impl).fetchMarketDaily([])).resolves.toEqual([])
    expect(calls).toHaveLength(0)
  })

  it('raises StoreError on a failed read', async () => {
    const { impl } = fakeFetch(() => jsonResponse({ message: 'bad key' }, 401))
    await expect(new SupabaseStore(URL_BASE, 'test-secret', impl).fetchMacro()).rejects.toThrow(StoreError)
  })
})

describe('createStoreFromEnv', () => {
  it('is null without credentials', () => {
    vi.stubEnv('SUPABASE_URL', '')
    vi.stubEnv('SUPABASE_KEY', '')
    vi.stubEnv('SUPABASE_SERVICE_ROLE', '')
    expect(createStoreFromEnv()).toBeNull()
  })

  it('prefers the service role key', () => {
    vi.stubEnv('SUPABASE_URL', URL_BASE)
    vi.stubEnv('SUPABASE_SERVICE_ROLE', 'test-service-role')
    vi.stubEnv('SUPABASE_KEY', 'test-anon')
    expect(createStoreFromEnv()).toBeInstanceOf(SupabaseStore)
  })
})
