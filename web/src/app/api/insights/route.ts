import { buildInsights, loadMarketData } from '../../../lib/dashboard'
import { createGateway, errorResponse, json, rangeParam, today } from '../../../lib/http'
import { createStoreFromEnv } from '../../../lib/store'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

export async function GET(req: Request) {
  try {
    const range = rangeParam(new URL(req.url))
    const data = await loadMarketData({ store: createStoreFromEnv(), gateway: createGateway(), range, today: today() })
    return json({ source: data.source, range, ...buildInsights(data.series) })
  } catch (e) {
    return errorResponse('insights', e)
  }
}
