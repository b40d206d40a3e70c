import type { MacroSnapshot } from '../types'
import { THRESHOLDS } from './config'

export type Tone = 'buy' | 'neutral' | 'caution'

export type Reading = {
  value: number | null
  status: string
  tone: Tone
}

export function readFearGreed(score: number | null, rating?: string): Reading {
  if (score == null) return { value: null, status: 'unavailable', tone: 'neutral' }
  if (score < THRESHOLDS.fearExtreme) return { value: score, status: 'Extreme fear (buying opportunity)', tone: 'buy' }
  if (score > THRESHOLDS.greedExtreme) return { value: score, status: 'Extreme greed (risk)', tone: 'caution' }
  return { value: score, status: rating || 'Neutral', tone: 'neutral' }
}

export function readVix(vix: number | null): Reading {
  if (vix == null) return { value: null, status: 'unavailable', tone: 'neutral' }
  if (vix > THRESHOLDS.vixPanic) return { value: vix, status: 'VIX above 30: panic is stretched, possible bottom', tone: 'buy' }
  return { value: vix, status: 'Calm', tone: 'neutral' }
}

export function readUs10y(yieldPct: number | null): Reading {
  if (yieldPct == null) return { value: null, status: 'unavailable', tone: 'neutral' }
  if (yieldPct > THRESHOLDS.us10yHigh) return { value: yieldPct, status: 'High yield weighs on growth valuations', tone: 'caution' }
  return { value: yieldPct, status: 'Normal', tone: 'neutral' }
}

function ratio(num: number | null | undefined, den: number | null | undefined) {
  if (num == null || den == null || !(den > 0)) return null
  return num / den
}

/** Closes keyed by ticker (^VIX, ^TNX, SOXX, QQQ, XLP, XLY) for one date. */
export function buildMacroSnapshot(date: string, closes: Record<string, number | null | undefined>, fearGreed: number | null): MacroSnapshot {
  return {
    date,
    vix_close: closes['^VIX'] ?? null,
    fear_greed_index: fearGreed == null ? null : Math.trunc(fearGreed),
    us10y_yield: closes['^TNX'] ?? null,
    soxx_qqq_ratio: ratio(closes.SOXX, closes.QQQ),
    xlp_xly_ratio: ratio(closes.XLP, closes.XLY),
  }
}

export function latestMacro(rows: MacroSnapshot[]) {
  return rows.length ? rows[rows.length - 1] : null
}
