// src/services/risk.ts
import { RiskAssessment, TradingPair } from '../types'

/**
 * Heuristic risk score for a pair:
 *
 *   riskScore      = liquidity / 10000 - volume24h / 100000 + |priceChange24h| / 10
 *   riskPercentage = clamp(riskScore * 10, 0, 100)
 *
 * Returns null when one of the three inputs is present but not numeric.
 */
export function calculateRisk(pair: TradingPair): RiskAssessment | null {
  const liquidity = pair.liquidity.usd
  const volume24h = pair.volume.h24
  const priceChange24h = pair.priceChange.h24

  if (liquidity === null || volume24h === null || priceChange24h === null) {
    // eslint-disable-next-line no-console
    console.error('calculateRisk error: non-numeric liquidity, volume or price change')
    return null
  }

  const riskScore = liquidity / 10000 - volume24h / 100000 + Math.abs(priceChange24h) / 10
  const riskPercentage = Math.min(100, Math.max(0, riskScore * 10))

  return { liquidity, volume24h, priceChange24h, riskScore, riskPercentage }
}
