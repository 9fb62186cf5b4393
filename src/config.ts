// src/config.ts
import dotenv from 'dotenv'
dotenv.config()

// numeric env with fallback when unset or not a finite number
function envNumber(name: string, fallback: number): number {
  const raw = process.env[name]
  if (raw == null || raw.trim() === '') return fallback
  const n = Number(raw)
  if (!Number.isFinite(n)) {
    // eslint-disable-next-line no-console
    console.warn(`Invalid number for ${name}, using default: ${fallback}`)
    return fallback
  }
  return n
}

export const DEXSCREENER_PROFILES_URL =
  process.env.DEXSCREENER_PROFILES_URL || 'https://api.dexscreener.com/token-profiles/latest/v1'
export const DEXSCREENER_PAIRS_URL = process.env.DEXSCREENER_PAIRS_URL || 'https://api.dexscreener.com/token-pairs/v1'
export const TARGET_CHAIN = process.env.TARGET_CHAIN || 'solana'

export const TELEGRAM_API_URL = process.env.TELEGRAM_API_URL || 'https://api.telegram.org'
export const TELEGRAM_BOT_TOKEN = process.env.TELEGRAM_BOT_TOKEN || ''
export const TELEGRAM_CHAT_ID = process.env.TELEGRAM_CHAT_ID || ''

export const CHECK_INTERVAL_SECONDS = envNumber('CHECK_INTERVAL_SECONDS', 300)
export const LIQUIDITY_THRESHOLD_USD = envNumber('LIQUIDITY_THRESHOLD_USD', 5000)
export const SEND_DELAY_SECONDS = envNumber('SEND_DELAY_SECONDS', 1)
export const RECOVERY_DELAY_SECONDS = envNumber('RECOVERY_DELAY_SECONDS', 10)
export const EXCLUDED_SUFFIX = process.env.EXCLUDED_SUFFIX || 'pump'
export const CHART_BASE_URL = process.env.CHART_BASE_URL || 'https://www.geckoterminal.com/solana/pools'

export const HTTP_TIMEOUT_SECONDS = envNumber('HTTP_TIMEOUT_SECONDS', 15)
export const HTTP_RETRIES = envNumber('HTTP_RETRIES', 2)

// status server is off unless PORT is given
export const PORT = envNumber('PORT', 0)
export const ADMIN_KEY = process.env.ADMIN_KEY || ''
