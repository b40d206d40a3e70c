import type { IndicatorSnapshot, Signal, SignalCode } from '../types'
import { InvalidInputError } from './errors'

export type SignalRule = {
  code: SignalCode
  action: string
  label: string
  when: (rsi: number, ma200DistPct: number) => boolean
}

/**
 * Evaluated top to bottom, first match wins. GREAT_BUY overlaps OVERSOLD_BUY
 * (rsi < 30 below MA200) and SEVERE_OVERBOUGHT overlaps OVERVALUED, so order
 * is part of the contract. Comparison operators are exact: 35, 30 and 75 are
 * excluded, a 20% deviation is included.
 */
export const SIGNAL_RULES: readonly SignalRule[] = [
  { code: 'GREAT_BUY', action: 'double DCA', label: 'Great buy', when: (rsi, dist) => dist < 0 && rsi < 35 },
  { code: 'OVERSOLD_BUY', action: 'normal buy', label: 'Oversold', when: (rsi) => rsi < 30 },
  { code: 'SEVERE_OVERBOUGHT', action: 'pause buying', label: 'Severely overbought', when: (rsi) => rsi > 75 },
  { code: 'OVERVALUED', action: 'reduce DCA', label: 'Overvalued', when: (_rsi, dist) => dist >= 20 },
  { code: 'NORMAL_DCA', action: 'normal DCA', label: 'Normal DCA', when: () => true },
]

function toSignal(rule: SignalRule): Signal {
  return { code: rule.code, action: rule.action, label: rule.label }
}

function checkNumber(name: string, v: unknown): number {
  if (typeof v !== 'number' || !Number.isFinite(v)) throw new InvalidInputError(`${name} must be a finite number, got ${String(v)}`)
  return v
}

export function classify(rsi14: number | null | undefined, ma200DistPct: number | null | undefined): Signal {
  const rsi = checkNumber('rsi_14', rsi14)
  const dist = checkNumber('ma200_dist_pct', ma200DistPct)
  if (rsi < 0 || rsi > 100) throw new InvalidInputError(`rsi_14 must lie in [0, 100], got ${rsi}`)
  for (const rule of SIGNAL_RULES) {
    if (rule.when(rsi, dist)) return toSignal(rule)
  }
  // unreachable: the last rule always matches
  throw new InvalidInputError('no signal rule matched')
}

export function classifySnapshot(s: Pick<IndicatorSnapshot, 'rsi_14' | 'ma200_dist_pct'>): Signal {
  return classify(s.rsi_14, s.ma200_dist_pct)
}

export function isBuySignal(code: SignalCode) {
  return code === 'GREAT_BUY' || code === 'OVERSOLD_BUY'
}
