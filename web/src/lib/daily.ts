import type { IndicatorSnapshot, MacroSnapshot, MarketDailyRow } from '../types'
import { pLimit } from './async'
import { ALL_TICKERS, RSI_ALERT_TICKERS, TARGET_ETFS, THRESHOLDS, addDays } from './config'
import { DataUnavailableError, InsufficientHistoryError } from './errors'
import type { MarketDataGateway } from './gateway'
import { computeIndicators } from './indicators'
import type { Delivery, Notifier } from './notify'
import { classifySnapshot } from './signals'
import type { MetricsStore } from './store'

// ~275 trading days, enough for a full MA200 window
export const DAILY_LOOKBACK_DAYS = 400

export type DailyDeps = {
  gateway: MarketDataGateway
  store: MetricsStore
  notifier: Notifier
  today: string
  tickers?: string[]
  concurrency?: number
}

export type DailyResult = {
  date: string
  stored: number
  macro: MacroSnapshot | null
  skipped: { ticker: string; reason: string }[]
  alerts: string[]
  delivery: Delivery | null
}

type Outcome = { ticker: string; snapshot: IndicatorSnapshot } | { ticker: string; reason: string }

export function snapshotToRow(s: IndicatorSnapshot): MarketDailyRow {
  return { date: s.date, ticker: s.ticker, close: s.close, rsi_14: s.rsi_14, ma200_dist_pct: s.ma200_dist_pct }
}

export function buildAlerts(snapshots: IndicatorSnapshot[]): string[] {
  const alerts: string[] = []
  const targets: readonly string[] = TARGET_ETFS
  for (const s of snapshots) {
    if (RSI_ALERT_TICKERS.includes(s.ticker) && s.rsi_14 < THRESHOLDS.rsiAlert) {
      alerts.push(`${s.ticker} RSI oversold (${s.rsi_14.toFixed(1)})`)
    }
    if (targets.includes(s.ticker)) {
      const signal = classifySnapshot(s)
      if (signal.code === 'GREAT_BUY') {
        alerts.push(`${s.ticker} ${signal.label}: RSI ${s.rsi_14.toFixed(1)}, ${s.ma200_dist_pct.toFixed(1)}% vs MA200 (${signal.action})`)
      }
    }
  }
  return alerts
}

/**
 * Daily close job: latest indicator snapshot per ticker, today's macro row,
 * both upserted, and one combined alert message when any rule fires.
 */
export async function runDaily(deps: DailyDeps): Promise<DailyResult> {
  const { gateway, store, notifier, today } = deps
  const tickers = deps.tickers ?? ALL_TICKERS
  const start = addDays(today, -DAILY_LOOKBACK_DAYS)
  console.info('daily: start', { today, tickers: tickers.length })

  const outcomes = await pLimit<Outcome>(deps.concurrency ?? 4, tickers.map(t => async () => {
    try {
      const bars = await gateway.fetchPriceHistory(t, start, today)
      return { ticker: t, snapshot: computeIndicators(bars) }
    } catch (e) {
      if (e instanceof InsufficientHistoryError || e instanceof DataUnavailableError) {
        console.warn('daily: ticker skipped', { ticker: t, reason: e.message })
        return { ticker: t, reason: e.message }
      }
      throw e
    }
  }))

  const snapshots: IndicatorSnapshot[] = []
  const skipped: DailyResult['skipped'] = []
  for (const o of outcomes) {
    if ('snapshot' in o) snapshots.push(o.snapshot)
    else skipped.push(o)
  }

  let macro: MacroSnapshot | null = null
  try {
    macro = await gateway.fetchMacro(today)
  } catch (e) {
    if (!(e instanceof DataUnavailableError)) throw e
    console.warn('daily: macro skipped', e.message)
    skipped.push({ ticker: 'macro', reason: e.message })
  }

  if (snapshots.length) await store.upsertMarketDaily(snapshots.map(snapshotToRow))
  if (macro) await store.upsertMacro([macro])

  const alerts = buildAlerts(snapshots)
  let delivery: Delivery | null = null
  if (alerts.length) {
    delivery = await notifier.deliver('Daily close monitor', alerts.join('\n'))
  } else {
    console.info('daily: no alerts triggered')
  }

  console.info('daily: done', { stored: snapshots.length, skipped: skipped.length, alerts: alerts.length })
  return { date: today, stored: snapshots.length, macro, skipped, alerts, delivery }
}
