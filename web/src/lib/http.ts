import type { TimeRange } from '../types'
import { TIME_RANGES, env, isoDate } from './config'
import { DataUnavailableError, InsufficientHistoryError, InvalidInputError, errorMessage } from './errors'
import { YahooGateway } from './gateway'

export class BadRequestError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'BadRequestError'
  }
}

export function json(obj: unknown, status = 200) {
  return new Response(JSON.stringify(obj), {
    status,
    headers: { 'content-type': 'application/json; charset=utf-8' },
  })
}

export function errorStatus(e: unknown) {
  if (e instanceof BadRequestError || e instanceof InvalidInputError) return 400
  if (e instanceof DataUnavailableError || e instanceof InsufficientHistoryError) return 502
  return 500
}

/** Logs and maps a thrown error to `{ error }` JSON. */
export function errorResponse(area: string, e: unknown) {
  const status = errorStatus(e)
  const log = status >= 500 ? console.error : console.warn
  log(`${area}: failed`, { status, error: errorMessage(e) })
  return json({ error: errorMessage(e) }, status)
}

// Vercel cron (web/vercel.json) sends `Authorization: Bearer $CRON_SECRET`
export function cronAuthorized(req: Request) {
  const secret = env('CRON_SECRET', false)
  if (!secret) return true
  return req.headers.get('authorization') === `Bearer ${secret}`
}

export function today() {
  return isoDate(new Date())
}

export function createGateway() {
  return new YahooGateway()
}

/** `?range=` with a 2y default; unknown values are a client error. */
export function rangeParam(url: URL): TimeRange {
  const v = url.searchParams.get('range')
  if (v == null || v === '') return '2y'
  const range = TIME_RANGES.find(r => r === v)
  if (!range) throw new BadRequestError(`range must be one of ${TIME_RANGES.join(', ')}`)
  return range
}
