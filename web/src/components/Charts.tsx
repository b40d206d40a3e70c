"use client"
import { Chart as ChartJS, BarElement, LineElement, PointElement, LinearScale, CategoryScale, Filler, Legend, Tooltip, type ChartData, type ChartDataset, type ChartOptions } from 'chart.js'
import { Bar, Line } from 'react-chartjs-2'

ChartJS.register(BarElement, LineElement, PointElement, LinearScale, CategoryScale, Filler, Legend, Tooltip)

type Series = (number | null)[]
type LineDataset = ChartDataset<'line', Series>

const fmt = new Intl.NumberFormat(undefined, { maximumFractionDigits: 2 })

const baseOptions: ChartOptions<'line'> = {
  responsive: true,
  maintainAspectRatio: false,
  animation: false,
  elements: { point: { radius: 0 } },
  interaction: { mode: 'index', intersect: false },
  plugins: {
    legend: {
      display: true,
      position: 'top',
      labels: {
        color: '#8b9bb4',
        boxWidth: 12,
        // guide lines stay out of the legend
        filter: (item) => !item.text.startsWith('guide:'),
      },
    },
    tooltip: {
      filter: (item) => !(item.dataset.label ?? '').startsWith('guide:'),
      callbacks: {
        label: (ctx) => {
          const v = ctx.parsed.y
          if (v == null || Number.isNaN(v)) return `${ctx.dataset.label}: —`
          return `${ctx.dataset.label}: ${fmt.format(v)}`
        },
      },
    },
  },
  scales: {
    x: { display: false },
    y: {
      ticks: { maxTicksLimit: 4, color: '#8b9bb4' },
      grid: { color: 'rgba(255,255,255,0.05)' },
    },
  },
  spanGaps: true,
}

function withY(opts: { min?: number; max?: number }): ChartOptions<'line'> {
  return {
    ...baseOptions,
    scales: {
      ...baseOptions.scales,
      y: { ticks: { maxTicksLimit: 4, color: '#8b9bb4' }, grid: { color: 'rgba(255,255,255,0.05)' }, suggestedMin: opts.min, suggestedMax: opts.max },
    },
  }
}

function guide(value: number, n: number, color: string): LineDataset {
  return { label: `guide:${value}`, data: new Array<number>(n).fill(value), borderColor: color, borderDash: [6, 4], borderWidth: 1, pointRadius: 0, tension: 0 }
}

export function PriceChart({ labels, close, sma20, sma200, bbUpper, bbLower }: {
  labels: string[]; close: Series; sma20: Series; sma200: Series; bbUpper: Series; bbLower: Series
}) {
  const data: ChartData<'line', Series, string> = {
    labels,
    datasets: [
      { label: 'BB upper', data: bbUpper, borderColor: 'rgba(148,163,184,0.5)', borderWidth: 1, tension: 0.2 },
      { label: 'BB lower', data: bbLower, borderColor: 'rgba(148,163,184,0.5)', backgroundColor: 'rgba(148,163,184,0.08)', borderWidth: 1, fill: '-1', tension: 0.2 },
      { label: 'Close', data: close, borderColor: '#38bdf8', tension: 0.2 },
      { label: 'SMA20', data: sma20, borderColor: '#22c55e', tension: 0.2 },
      { label: 'SMA200', data: sma200, borderColor: '#f97316', tension: 0.2 },
    ],
  }
  return <Line data={data} options={baseOptions} />
}

/** Single line; `guides` draws dashed horizontal levels such as RSI 30/70. */
export function LineChart({ labels, data: values, label, color, ySuggestedMin, ySuggestedMax, guides = [] }: {
  labels: string[]; data: Series; label: string; color: string; ySuggestedMin?: number; ySuggestedMax?: number; guides?: { value: number; color: string }[]
}) {
  const data: ChartData<'line', Series, string> = {
    labels,
    datasets: [
      { label, data: values, borderColor: color, tension: 0.2 },
      ...guides.map(g => guide(g.value, labels.length, g.color)),
    ],
  }
  return <Line data={data} options={withY({ min: ySuggestedMin, max: ySuggestedMax })} />
}

export function MacdChart({ labels, macd, signal, hist }: { labels: string[]; macd: Series; signal: Series; hist: Series }) {
  const data: ChartData<'line', Series, string> = {
    labels,
    datasets: [
      { label: 'MACD', data: macd, borderColor: '#38bdf8', tension: 0.2 },
      { label: 'Signal', data: signal, borderColor: '#f59e0b', tension: 0.2 },
      { label: 'Histogram', data: hist, borderColor: 'rgba(148,163,184,0.6)', backgroundColor: 'rgba(148,163,184,0.2)', fill: 'origin', borderWidth: 1, tension: 0 },
      guide(0, labels.length, 'rgba(148,163,184,0.4)'),
    ],
  }
  return <Line data={data} options={baseOptions} />
}

const axis = { ticks: { maxTicksLimit: 4, color: '#8b9bb4' }, grid: { color: 'rgba(255,255,255,0.05)' } }

/** Two lines on separate y axes, left and right. */
export function DualAxisChart({ labels, left, right }: {
  labels: string[]
  left: { label: string; data: Series; color: string }
  right: { label: string; data: Series; color: string }
}) {
  const data: ChartData<'line', Series, string> = {
    labels,
    datasets: [
      { label: left.label, data: left.data, borderColor: left.color, tension: 0.2, yAxisID: 'y' },
      { label: right.label, data: right.data, borderColor: right.color, backgroundColor: `${right.color}33`, fill: 'origin', borderWidth: 1, tension: 0.2, yAxisID: 'y1' },
    ],
  }
  const options: ChartOptions<'line'> = {
    ...baseOptions,
    scales: {
      x: { display: false },
      y: { ...axis, position: 'left' },
      y1: { ...axis, position: 'right', grid: { drawOnChartArea: false } },
    },
  }
  return <Line data={data} options={options} />
}

/** Daily volume bars, red on down days. */
export function VolumeChart({ labels, volume, down }: { labels: string[]; volume: Series; down: boolean[] }) {
  const data: ChartData<'bar', Series, string> = {
    labels,
    datasets: [{
      label: 'Volume',
      data: volume,
      backgroundColor: down.map(d => (d ? 'rgba(239,68,68,0.5)' : 'rgba(34,197,94,0.5)')),
    }],
  }
  const options: ChartOptions<'bar'> = {
    responsive: true,
    maintainAspectRatio: false,
    animation: false,
    plugins: { legend: { display: false } },
    scales: { x: { display: false }, y: axis },
  }
  return <Bar data={data} options={options} />
}
