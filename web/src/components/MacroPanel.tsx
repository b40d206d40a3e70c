"use client"
import { Activity, Gauge, Landmark } from 'lucide-react'
import type { ReactNode } from 'react'
import type { MacroView } from '../lib/dashboard'
import type { Reading, Tone } from '../lib/macro'
import { Card } from './ui/card'

const toneClass: Record<Tone, string> = {
  buy: 'text-buy',
  neutral: 'text-muted-foreground',
  caution: 'text-caution',
}

function Metric({ icon, title, reading, digits }: { icon: ReactNode; title: string; reading: Reading; digits: number }) {
  return (
    <Card>
      <div className="flex items-center gap-2 text-xs text-muted-foreground">{icon}{title}</div>
      <div className="mt-1 text-2xl font-semibold tabular-nums">{reading.value == null ? '—' : reading.value.toFixed(digits)}</div>
      <div className={`text-xs ${toneClass[reading.tone]}`}>{reading.status}</div>
    </Card>
  )
}

export function MacroPanel({ view }: { view: MacroView }) {
  return (
    <div className="grid gap-3 sm:grid-cols-3">
      <Metric icon={<Gauge size={14} />} title="Fear & Greed" reading={view.fearGreed} digits={0} />
      <Metric icon={<Activity size={14} />} title="VIX" reading={view.vix} digits={2} />
      <Metric icon={<Landmark size={14} />} title="US 10Y yield (%)" reading={view.us10y} digits={2} />
    </div>
  )
}
