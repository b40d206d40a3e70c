"use client"
import { useCallback, useEffect, useRef, useState } from 'react'
import { RefreshCw } from 'lucide-react'
import type { SignalsResponse, TimeRange } from '../types'
import type { Insights, MacroView } from '../lib/dashboard'
import { TIME_RANGES } from '../lib/config'
import { getJson, requestGate } from './api'
import { AssetHealthTable } from './AssetHealth'
import { InsightsPanel } from './InsightsPanel'
import { MacroPanel } from './MacroPanel'
import { Button } from './ui/button'
import { Card, CardTitle } from './ui/card'

type State<T> = { data: T | null; error: string | null }

const EMPTY = { data: null, error: null }

function settle<T>(res: PromiseSettledResult<T>): State<T> {
  return res.status === 'fulfilled'
    ? { data: res.value, error: null }
    : { data: null, error: res.reason instanceof Error ? res.reason.message : String(res.reason) }
}

export default function Dashboard() {
  const [range, setRange] = useState<TimeRange>('2y')
  const [loading, setLoading] = useState(false)
  const [macro, setMacro] = useState<State<MacroView>>(EMPTY)
  const [signals, setSignals] = useState<State<SignalsResponse>>(EMPTY)
  const [insights, setInsights] = useState<State<Insights>>(EMPTY)

  const gate = useRef(requestGate())

  const load = useCallback(async (r: TimeRange) => {
    const current = gate.current.begin()
    setLoading(true)
    const [m, s, i] = await Promise.allSettled([
      getJson<MacroView>('/macro'),
      getJson<SignalsResponse>(`/signals?range=${r}`),
      getJson<Insights>(`/insights?range=${r}`),
    ])
    if (!current()) return
    setMacro(settle(m))
    setSignals(settle(s))
    setInsights(settle(i))
    setLoading(false)
  }, [])

  useEffect(() => {
    load(range).catch(e => console.error('dashboard load failed', e))
    return () => gate.current.cancel()
  }, [load, range])

  return (
    <section className="grid gap-4">
      <div className="flex flex-wrap items-center justify-between gap-3">
        <div>
          <h1 className="text-xl font-semibold tracking-tight">DCA Cockpit</h1>
          <p className="text-xs text-muted-foreground">
            Data source: {signals.data ? (signals.data.source === 'db' ? 'database' : 'live (Yahoo Finance)') : '—'}
          </p>
        </div>
        <div className="flex items-center gap-2">
          {TIME_RANGES.map(r => (
            <Button key={r} active={range === r} onClick={() => setRange(r)}>{r}</Button>
          ))}
          <Button onClick={() => { load(range).catch(e => console.error('dashboard load failed', e)) }} disabled={loading} aria-label="Refresh">
            <RefreshCw size={14} className={loading ? 'animate-spin' : ''} />
          </Button>
        </div>
      </div>

      {macro.data ? <MacroPanel view={macro.data} /> : <ErrorNote title="Macro" error={macro.error} loading={loading} />}

      <Card>
        <CardTitle>Asset health</CardTitle>
        {signals.data ? <AssetHealthTable rows={signals.data.rows} /> : <ErrorNote error={signals.error} loading={loading} />}
      </Card>

      {insights.data ? <InsightsPanel insights={insights.data} /> : <ErrorNote title="Insights" error={insights.error} loading={loading} />}
    </section>
  )
}

function ErrorNote({ title, error, loading }: { title?: string; error: string | null; loading: boolean }) {
  if (loading && !error) return <p className="text-sm text-muted-foreground">Loading…</p>
  if (!error) return null
  return <p className="text-sm text-sell">{title ? `${title}: ` : ''}{error}</p>
}
