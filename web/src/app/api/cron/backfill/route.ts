import { addDays, rangeDays } from '../../../../lib/config'
import { backfillMacro, backfillMarket } from '../../../../lib/backfill'
import { cronAuthorized, createGateway, errorResponse, json, rangeParam, today } from '../../../../lib/http'
import { createStoreFromEnv } from '../../../../lib/store'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'
export const maxDuration = 300

export async function GET(req: Request) {
  if (!cronAuthorized(req)) return json({ error: 'unauthorized' }, 401)
  const store = createStoreFromEnv()
  if (!store) return json({ error: 'SUPABASE_URL and SUPABASE_KEY must be set' }, 500)
  try {
    const range = rangeParam(new URL(req.url))
    const end = today()
    const window = { gateway: createGateway(), store, start: addDays(end, -rangeDays(range)), end }
    const market = await backfillMarket(window)
    const macro = await backfillMacro(window)
    return json({ ok: true, range, market, macro })
  } catch (e) {
    return errorResponse('cron/backfill', e)
  }
}
