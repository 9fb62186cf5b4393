// src/utils/pairs.ts
import debug from 'debug'
import { isRecord, parseTradingPair, toMetric } from '../schemas'
import { TradingPair } from '../types'

const log = debug('alerts:pairs')

// USD liquidity of a raw or parsed pair; missing or malformed reads as 0
export function liquidityOf(pair: unknown): number {
  if (!isRecord(pair)) return 0
  const section = pair.liquidity
  const usd = toMetric(isRecord(section) ? section.usd : undefined)
  return usd ?? 0
}

// pick the pair with the most USD liquidity.
// ties keep the earlier pair; when nothing has positive liquidity the first
// object entry wins; null when there is no object entry at all
export function selectMainPair(pairs: readonly unknown[]): TradingPair | null {
  let main: Record<string, unknown> | null = null
  let firstValid: Record<string, unknown> | null = null
  let maxLiquidity = 0

  for (const pair of pairs) {
    if (!isRecord(pair)) {
      log('skipping non-object pair entry')
      continue
    }
    if (!firstValid) firstValid = pair

    const liquidity = liquidityOf(pair)
    if (liquidity > maxLiquidity) {
      main = pair
      maxLiquidity = liquidity
    }
  }

  const chosen = main ?? firstValid
  if (!chosen) return null
  if (!main) log('no pair with positive liquidity, using first available pair')
  return parseTradingPair(chosen)
}
