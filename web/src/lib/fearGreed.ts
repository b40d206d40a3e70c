import { z } from 'zod'
import type { FearGreedReading } from '../types'
import { DataUnavailableError, errorMessage } from './errors'

const USER_AGENT = 'Mozilla/5.0'
const TIMEOUT_MS = 15_000

export const CNN_URLS = [
  'https://production.dataviz.cnn.io/index/fearandgreed/graphdata',
  'https://production.dataviz.cnn.io/index/fearandgreed/current',
]
export const ALTERNATIVE_URL = 'https://api.alternative.me/fng/?limit=1'

const CnnGraphSchema = z.object({
  fear_and_greed: z.object({ score: z.number(), rating: z.string() }),
})

const CnnCurrentSchema = z.object({
  score: z.number(),
  rating: z.string().optional(),
})

const AlternativeSchema = z.object({
  data: z.array(z.object({
    value: z.coerce.number(),
    value_classification: z.string(),
  })).min(1),
})

type FetchFn = typeof fetch

async function getJson(fetchImpl: FetchFn, url: string, headers: Record<string, string>): Promise<unknown> {
  const r = await fetchImpl(url, { headers, cache: 'no-store', signal: AbortSignal.timeout(TIMEOUT_MS) })
  if (!r.ok) throw new Error(`HTTP ${r.status}`)
  return r.json()
}

function parseCnn(body: unknown): { score: number; rating: string } | null {
  const graph = CnnGraphSchema.safeParse(body)
  if (graph.success) return graph.data.fear_and_greed
  const current = CnnCurrentSchema.safeParse(body)
  if (current.success) return { score: current.data.score, rating: current.data.rating ?? 'Unknown' }
  return null
}

/**
 * Current CNN Fear & Greed score. Falls back to alternative.me's crypto index
 * when both CNN endpoints fail.
 */
export async function fetchFearGreed(fetchImpl: FetchFn = fetch): Promise<FearGreedReading> {
  const failures: string[] = []
  const cnnHeaders = {
    'User-Agent': USER_AGENT,
    Accept: 'application/json',
    Referer: 'https://www.cnn.com/markets/fear-and-greed',
  }
  for (const url of CNN_URLS) {
    try {
      const parsed = parseCnn(await getJson(fetchImpl, url, cnnHeaders))
      if (parsed) return { score: parsed.score, rating: parsed.rating, source: 'cnn' }
      failures.push(`${url}: unexpected body`)
    } catch (e) {
      failures.push(`${url}: ${errorMessage(e)}`)
    }
  }
  try {
    const body = AlternativeSchema.parse(await getJson(fetchImpl, ALTERNATIVE_URL, { 'User-Agent': USER_AGENT }))
    const first = body.data[0]
    return { score: first.value, rating: first.value_classification, source: 'alternative.me' }
  } catch (e) {
    failures.push(`${ALTERNATIVE_URL}: ${errorMessage(e)}`)
  }
  console.warn('fear-greed: all sources failed', failures)
  throw new DataUnavailableError('fear-greed', failures.join('; '))
}
