export type PriceBar = {
  date: string // YYYY-MM-DD
  ticker: string
  close: number
  open?: number
  volume?: number
}

export type IndicatorSnapshot = {
  date: string
  ticker: string
  close: number
  rsi_14: number
  ma200_dist_pct: number
}

export type MacroSnapshot = {
  date: string
  vix_close: number | null
  fear_greed_index: number | null
  us10y_yield: number | null
  soxx_qqq_ratio: number | null
  xlp_xly_ratio: number | null
}

export type SignalCode = 'GREAT_BUY' | 'OVERSOLD_BUY' | 'NORMAL_DCA' | 'OVERVALUED' | 'SEVERE_OVERBOUGHT'

export type Signal = {
  code: SignalCode
  action: string
  label: string
}

// Row shape of market_daily_metrics; indicator columns are null during warm-up
export type MarketDailyRow = {
  date: string
  ticker: string
  close: number
  rsi_14: number | null
  ma200_dist_pct: number | null
  created_at?: string
}

export type MetricPoint = {
  date: string
  close: number
  rsi_14: number | null
  ma200_dist_pct: number | null
}

export type TimeRange = '1y' | '2y' | '5y'

export type MarketData = {
  source: 'db' | 'api'
  series: Record<string, MetricPoint[]>
}

export type AssetHealthRow = {
  ticker: string
  date: string
  close: number
  rsi_14: number | null
  ma200_dist_pct: number | null
  signal: Signal | null // null when history is too short to classify
}

export type FearGreedReading = {
  score: number
  rating: string
  source: 'cnn' | 'alternative.me'
}

export type EtfInfo = {
  name: string
  desc: string
  relation: string
  strategy: string
}

export type SignalsResponse = {
  source: MarketData['source']
  range: TimeRange
  rows: AssetHealthRow[]
}
