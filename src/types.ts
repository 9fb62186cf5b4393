// src/types.ts

// parsed numeric field: 0 when absent, null when present but not numeric
export type Metric = number | null

export type TimeWindow = 'm5' | 'h1' | 'h6' | 'h24'

export type WindowMetrics = Record<TimeWindow, Metric>

export interface TokenLink {
  type?: string
  label?: string
  url?: string
}

// one entry of the token-profiles feed
export interface TokenProfile {
  chainId?: string
  tokenAddress?: string
  url?: string
  description?: string
  links: TokenLink[]
}

// one market for a token
export interface TradingPair {
  pairAddress?: string
  dexId?: string
  url?: string
  liquidity: { usd: Metric }
  volume: WindowMetrics
  priceChange: WindowMetrics
}

// normalized pair-detail response
export interface TokenPairs {
  pairs: TradingPair[]
}

export interface RiskAssessment {
  liquidity: number
  volume24h: number
  priceChange24h: number
  riskScore: number
  riskPercentage: number // clamped to [0, 100]
}

export type SkipReason =
  | 'missing-address'
  | 'known'
  | 'excluded'
  | 'details-unavailable'
  | 'no-pair'
  | 'low-liquidity'
  | 'invalid-alert'
  | 'send-failed'
  | 'error'

export interface PassSummary {
  startedAt: number // epoch ms
  finishedAt: number // epoch ms
  profiles: number
  candidates: number
  sent: number
  skipped: Record<SkipReason, number>
}
