"use client"
import * as Tooltip from '@radix-ui/react-tooltip'
import type { AssetHealthRow } from '../types'
import { BASE } from '../base'
import { ETF_INFO } from '../lib/config'
import { isBuySignal } from '../lib/signals'
import { SignalBadge } from './SignalBadge'
import { Table, TableCell, TableHead } from './ui/table'

function num(v: number | null, digits = 2, suffix = '') {
  return v == null ? '—' : `${v.toFixed(digits)}${suffix}`
}

function rsiClass(v: number | null) {
  if (v == null) return ''
  if (v < 30) return 'text-buy'
  if (v > 70) return 'text-sell'
  return ''
}

export function AssetHealthTable({ rows }: { rows: AssetHealthRow[] }) {
  return (
    <Tooltip.Provider delayDuration={150}>
      <Table>
        <thead>
          <tr>
            <TableHead>Ticker</TableHead>
            <TableHead align="right">Close</TableHead>
            <TableHead align="right">RSI(14)</TableHead>
            <TableHead align="right">vs MA200</TableHead>
            <TableHead>Signal</TableHead>
            <TableHead>As of</TableHead>
          </tr>
        </thead>
        <tbody>
          {rows.map(r => (
            <tr key={r.ticker} className={r.signal && isBuySignal(r.signal.code) ? 'bg-buy/10 hover:bg-buy/20' : 'hover:bg-muted/30'}>
              <TableCell>
                <a href={`${BASE}/ticker/${encodeURIComponent(r.ticker)}`} className="font-medium hover:underline">{r.ticker}</a>
                <div className="text-xs text-muted-foreground">{ETF_INFO[r.ticker]?.name ?? ''}</div>
              </TableCell>
              <TableCell align="right">{num(r.close)}</TableCell>
              <TableCell align="right"><span className={rsiClass(r.rsi_14)}>{num(r.rsi_14, 1)}</span></TableCell>
              <TableCell align="right">{r.ma200_dist_pct == null ? '—' : `${r.ma200_dist_pct > 0 ? '+' : ''}${r.ma200_dist_pct.toFixed(1)}%`}</TableCell>
              <TableCell><SignalBadge signal={r.signal} /></TableCell>
              <TableCell><span className="text-xs text-muted-foreground">{r.date}</span></TableCell>
            </tr>
          ))}
          {!rows.length && (
            <tr><TableCell>No data</TableCell></tr>
          )}
        </tbody>
      </Table>
    </Tooltip.Provider>
  )
}
