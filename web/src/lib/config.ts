import catalog from '../config/etfs.json'
import type { EtfInfo, TimeRange } from '../types'

export const TARGET_ETFS = ['VOO', 'QQQ', 'QLD', 'TQQQ', 'SMH', 'TLT'] as const
export const MACRO_TICKERS = ['^VIX', '^TNX'] as const
// ratio legs for the divergence and risk-off panels
export const L1_TICKERS = ['QQQ', 'SOXX', 'XLP', 'XLY', 'SMH', 'VOO', 'TLT'] as const

export const ALL_TICKERS: string[] = Array.from(new Set<string>([...TARGET_ETFS, ...MACRO_TICKERS, ...L1_TICKERS])).sort()

export const RSI_ALERT_TICKERS = ['VOO', 'QQQ', 'SMH', 'TLT']
export const TIME_RANGES: TimeRange[] = ['1y', '2y', '5y']

export const THRESHOLDS = {
  rsiAlert: 30,
  fearExtreme: 25,
  greedExtreme: 75,
  vixPanic: 30,
  us10yHigh: 4.5,
  staleDays: 2,
} as const

export const ETF_INFO: Record<string, EtfInfo> = catalog.etfs
export const INDICATOR_INFO: Record<string, string> = catalog.indicators

export function env(name: string, required = true): string | undefined {
  const v = process.env[name]
  if (!v && required) throw new Error(`Missing env: ${name}`)
  return v
}

export function parseIntSafe(v: string | null | undefined, def: number) {
  const n = v != null ? parseInt(v, 10) : NaN
  return Number.isFinite(n) ? n : def
}

export function rangeDays(range: TimeRange) {
  return range === '1y' ? 365 : range === '5y' ? 365 * 5 : 365 * 2
}

export function isoDate(d: Date) {
  return d.toISOString().slice(0, 10)
}

export function addDays(date: string, days: number) {
  const d = new Date(`${date}T00:00:00Z`)
  d.setUTCDate(d.getUTCDate() + days)
  return isoDate(d)
}

export function daysBetween(from: string, to: string) {
  return Math.round((Date.parse(`${to}T00:00:00Z`) - Date.parse(`${from}T00:00:00Z`)) / 86_400_000)
}
