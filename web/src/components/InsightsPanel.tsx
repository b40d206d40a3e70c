"use client"
import type { Insights } from '../lib/dashboard'
import { DualAxisChart, LineChart } from './Charts'
import { Badge } from './ui/badge'
import { Card, CardTitle } from './ui/card'

const pct = (v: number) => `${(v * 100).toFixed(1)}%`

function corrClass(v: number | null) {
  if (v == null) return 'text-muted-foreground'
  if (v > 0.7) return 'text-sell'
  if (v < 0) return 'text-buy'
  return ''
}

export function InsightsPanel({ insights }: { insights: Insights }) {
  const { relativeStrength: rs, infra, divergence, riskOff, correlation } = insights
  const latest = divergence.latest
  return (
    <div className="grid gap-3 lg:grid-cols-2">
      <Card>
        <CardTitle right={rs?.divergence ? <Badge tone="caution">divergence</Badge> : null}>Relative strength SMH / QQQ</CardTitle>
        {rs ? (
          <div className="h-40">
            <LineChart labels={rs.points.map(p => p.date)} data={rs.points.map(p => p.normalized)} label="SMH/QQQ (normalized)" color="#38bdf8" />
          </div>
        ) : <p className="text-sm text-muted-foreground">Not enough common history.</p>}
      </Card>

      <Card>
        <CardTitle right={infra?.exhaustion ? <Badge tone="caution">hardware momentum exhaustion</Badge> : null}>AI infrastructure: QQQ vs SOXX/QQQ</CardTitle>
        {infra ? (
          <div className="h-40">
            <DualAxisChart
              labels={infra.points.map(p => p.date)}
              left={{ label: 'QQQ', data: infra.points.map(p => p.qqq), color: '#4cc9f0' }}
              right={{ label: 'SOXX/QQQ', data: infra.points.map(p => p.ratio), color: '#f72585' }}
            />
          </div>
        ) : <p className="text-sm text-muted-foreground">Not enough common history.</p>}
      </Card>

      <Card>
        <CardTitle right={latest ? <Badge tone={latest.signal === 'SEVERE' ? 'sell' : latest.signal === 'MILD' ? 'caution' : 'hold'}>{latest.signal}</Badge> : null}>
          Semiconductor divergence (60d)
        </CardTitle>
        {latest ? (
          <>
            <div className="mb-2 flex gap-6 text-sm">
              <span>QQQ drawdown <b className="tabular-nums">{pct(latest.qqq_drawdown)}</b></span>
              <span>SOXX drawdown <b className="tabular-nums">{pct(latest.soxx_drawdown)}</b></span>
            </div>
            <div className="h-32">
              <LineChart labels={divergence.points.map(p => p.date)} data={divergence.points.map(p => p.soxx_drawdown - p.qqq_drawdown)} label="SOXX minus QQQ drawdown" color="#f59e0b" />
            </div>
          </>
        ) : <p className="text-sm text-muted-foreground">Not enough common history.</p>}
      </Card>

      <Card>
        <CardTitle right={riskOff?.warning ? <Badge tone="caution">risk-off</Badge> : null}>Risk-off radar XLP / XLY</CardTitle>
        {riskOff ? (
          <div className="h-40">
            <LineChart labels={riskOff.points.map(p => p.date)} data={riskOff.points.map(p => p.ma20)} label="XLP/XLY MA20" color="#a78bfa" />
          </div>
        ) : <p className="text-sm text-muted-foreground">No data.</p>}
      </Card>

      <Card>
        <CardTitle right={correlation?.liquidityWarning ? <Badge tone="sell">TLT moving with QQQ</Badge> : null}>Correlation (90d)</CardTitle>
        {correlation ? (
          <table className="w-full text-sm">
            <thead>
              <tr>
                <th />
                {correlation.tickers.map(t => <th key={t} className="px-2 py-1 text-right text-xs text-muted-foreground">{t}</th>)}
              </tr>
            </thead>
            <tbody>
              {correlation.tickers.map((t, i) => (
                <tr key={t}>
                  <td className="px-2 py-1 text-xs text-muted-foreground">{t}</td>
                  {correlation.matrix[i].map((v, j) => (
                    <td key={j} className={`px-2 py-1 text-right tabular-nums ${corrClass(v)}`}>{v == null ? '—' : v.toFixed(2)}</td>
                  ))}
                </tr>
              ))}
            </tbody>
          </table>
        ) : <p className="text-sm text-muted-foreground">Not enough common history.</p>}
      </Card>
    </div>
  )
}
