import { env, parseIntSafe } from '../../../../lib/config'
import { runDaily } from '../../../../lib/daily'
import { cronAuthorized, createGateway, errorResponse, json, today } from '../../../../lib/http'
import { createNotifier } from '../../../../lib/notify'
import { createStoreFromEnv } from '../../../../lib/store'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

export async function GET(req: Request) {
  if (!cronAuthorized(req)) return json({ error: 'unauthorized' }, 401)
  const store = createStoreFromEnv()
  if (!store) return json({ error: 'SUPABASE_URL and SUPABASE_KEY must be set' }, 500)
  try {
    const result = await runDaily({
      gateway: createGateway(),
      store,
      notifier: createNotifier(),
      today: today(),
      concurrency: Math.max(1, parseIntSafe(env('GATEWAY_CONCURRENCY', false), 4)),
    })
    return json({ ok: true, ...result })
  } catch (e) {
    return errorResponse('cron/daily', e)
  }
}
