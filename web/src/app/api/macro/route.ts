import { loadMacro } from '../../../lib/dashboard'
import { fetchFearGreed } from '../../../lib/fearGreed'
import { createGateway, errorResponse, json, today } from '../../../lib/http'
import { createStoreFromEnv } from '../../../lib/store'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

export async function GET() {
  try {
    const view = await loadMacro({
      store: createStoreFromEnv(),
      gateway: createGateway(),
      today: today(),
      fearGreed: () => fetchFearGreed(),
    })
    return json(view)
  } catch (e) {
    return errorResponse('macro', e)
  }
}
