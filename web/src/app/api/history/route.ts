import { tickerHistory } from '../../../lib/dashboard'
import { BadRequestError, createGateway, errorResponse, json, rangeParam, today } from '../../../lib/http'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

const TICKER_RE = /^\^?[A-Z0-9.\-]{1,12}$/

export async function GET(req: Request) {
  const url = new URL(req.url)
  const ticker = (url.searchParams.get('ticker') || '').trim().toUpperCase()
  try {
    const range = rangeParam(url)
    if (!TICKER_RE.test(ticker)) throw new BadRequestError(`invalid ticker "${ticker}"`)
    return json(await tickerHistory(createGateway(), ticker, range, today()))
  } catch (e) {
    return errorResponse('history', e)
  }
}
