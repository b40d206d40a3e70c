"use client"
import * as Tooltip from '@radix-ui/react-tooltip'
import type { Signal, SignalCode } from '../types'
import { Badge, type BadgeTone } from './ui/badge'

const TONE: Record<SignalCode, BadgeTone> = {
  GREAT_BUY: 'buy',
  OVERSOLD_BUY: 'buy',
  NORMAL_DCA: 'hold',
  OVERVALUED: 'caution',
  SEVERE_OVERBOUGHT: 'sell',
}

export function SignalBadge({ signal }: { signal: Signal | null }) {
  if (!signal) return <Badge>insufficient history</Badge>
  return (
    <Tooltip.Root>
      <Tooltip.Trigger asChild>
        <span className="cursor-help"><Badge tone={TONE[signal.code]}>{signal.label}</Badge></span>
      </Tooltip.Trigger>
      <Tooltip.Portal>
        <Tooltip.Content sideOffset={6} className="rounded-md border bg-card px-2 py-1 text-xs shadow">
          Suggested action: {signal.action}
          <Tooltip.Arrow className="fill-card" />
        </Tooltip.Content>
      </Tooltip.Portal>
    </Tooltip.Root>
  )
}
