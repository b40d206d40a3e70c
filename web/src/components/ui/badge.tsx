import type { ReactNode } from 'react'

export type BadgeTone = 'buy' | 'hold' | 'caution' | 'sell' | 'muted'

const tones: Record<BadgeTone, string> = {
  buy: 'bg-buy/15 text-buy border-buy/40',
  hold: 'bg-hold/15 text-hold border-hold/40',
  caution: 'bg-caution/15 text-caution border-caution/40',
  sell: 'bg-sell/15 text-sell border-sell/40',
  muted: 'bg-muted text-muted-foreground border-transparent',
}

export function Badge({ tone = 'muted', children }: { tone?: BadgeTone; children: ReactNode }) {
  return <span className={`inline-flex items-center rounded-full border px-2 py-0.5 text-xs font-medium ${tones[tone]}`}>{children}</span>
}
