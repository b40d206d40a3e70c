import type { Metadata } from 'next'
import { BASE } from '../../base'
import { ETF_INFO, INDICATOR_INFO } from '../../lib/config'

export const metadata: Metadata = {
  title: 'ETFs - DCA Cockpit',
}

export default function Page() {
  return (
    <section className="grid gap-4">
      <h1 className="text-xl font-semibold tracking-tight">ETF catalog</h1>
      <div className="grid gap-3 md:grid-cols-2">
        {Object.entries(ETF_INFO).map(([ticker, info]) => (
          <a key={ticker} href={`${BASE}/ticker/${ticker}`} className="rounded-lg border bg-card p-4 hover:border-accent">
            <div className="flex items-baseline justify-between gap-2">
              <span className="font-semibold">{ticker}</span>
              <span className="text-xs text-muted-foreground">{info.strategy}</span>
            </div>
            <div className="text-sm">{info.name}</div>
            <p className="mt-1 text-sm text-muted-foreground">{info.desc}</p>
          </a>
        ))}
      </div>
      <h2 className="mt-2 text-lg font-semibold tracking-tight">Reading the charts</h2>
      <dl className="grid gap-2 text-sm">
        {Object.entries(INDICATOR_INFO).map(([name, text]) => (
          <div key={name}>
            <dt className="font-medium">{name}</dt>
            <dd className="text-muted-foreground">{text}</dd>
          </div>
        ))}
      </dl>
    </section>
  )
}
