// src/services/formatter.ts
import { CHART_BASE_URL } from '../config'
import { selectMainPair } from '../utils/pairs'
import { calculateRisk } from './risk'
import { toFixedEven } from '../utils/format'
import { TokenLink, TokenPairs, TokenProfile, TradingPair } from '../types'

export const INVALID_TOKEN_MESSAGE = 'Invalid token information'
export const PAIR_UNAVAILABLE_MESSAGE = 'Pair data not available'
export const RISK_UNAVAILABLE_MESSAGE = 'Could not calculate risk'

export interface FormattedAlert {
  message: string
  // null means the message is one of the sentinels above and must not be sent
  pair: TradingPair | null
}

export interface FormatOptions {
  chartBaseUrl?: string
}

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
}

const thousands = (v: number) => `${toFixedEven(v / 1000, 1)}K`

function anchor(url: string, label: string): string {
  return `<a href='${escapeHtml(url)}'>${label}</a>`
}

// every entry keeps its trailing separator, including the last one
export function formatLinks(links: readonly TokenLink[]): string {
  let out = ''
  for (const link of links) {
    const url = link.url ?? ''
    if (link.type === 'twitter') out += `🐦 ${anchor(url, 'Twitter')} | `
    else if (link.type === 'telegram') out += `📢 ${anchor(url, 'Telegram')} | `
    else if (url) out += `🌐 ${anchor(url, 'Site')} | `
  }
  return out
}

export function formatAlert(
  profile: TokenProfile | null | undefined,
  details: TokenPairs | null | undefined,
  options: FormatOptions = {}
): FormattedAlert {
  if (!profile || !details) return { message: INVALID_TOKEN_MESSAGE, pair: null }

  const pair = selectMainPair(details.pairs)
  if (!pair) return { message: PAIR_UNAVAILABLE_MESSAGE, pair: null }

  const risk = calculateRisk(pair)
  if (!risk) return { message: RISK_UNAVAILABLE_MESSAGE, pair: null }

  const address = escapeHtml(profile.tokenAddress ?? 'Unknown')
  const chartBase = (options.chartBaseUrl ?? CHART_BASE_URL).replace(/\/+$/, '')
  const { liquidity, volume24h, priceChange24h, riskScore, riskPercentage } = risk

  const message =
    `<b>✅ New Token Detected!</b>\n\n` +
    `<b>Liquidity:</b> ${thousands(liquidity)}\n` +
    `<b>Volume 24h:</b> ${thousands(volume24h)}\n` +
    `<b>Price Change 24h:</b> ${toFixedEven(priceChange24h, 2)}%\n\n` +
    `<b>Risk Calculation:</b> (${toFixedEven(liquidity, 2)} / 10,000) - (${toFixedEven(volume24h, 2)} / 100,000)` +
    ` + (|${toFixedEven(priceChange24h, 2)}| / 10) = ${toFixedEven(riskScore, 2)}\n` +
    `<b>Risk Percentage:</b> ${toFixedEven(riskPercentage, 0)}%\n\n` +
    `<b>🔗 Links:</b> ${formatLinks(profile.links)}\n` +
    `<b>📊 Chart:</b> <a href='${chartBase}/${address}'>GeckoTerminal</a>\n` +
    `<b>🔍 DexScreener:</b> ${anchor(profile.url ?? '', 'Open')}\n` +
    `<b>🆔 Address:</b> <code>${address}</code>`

  return { message, pair }
}
