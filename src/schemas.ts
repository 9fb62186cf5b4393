// src/schemas.ts
import { z } from 'zod'
import { Metric, TokenLink, TokenPairs, TokenProfile, TradingPair } from './types'

// raised when a response body does not have the shape we can work with
export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'MalformedResponseError'
  }
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

// coerce an untrusted value: missing -> 0, numeric -> number, anything else -> null
export function toMetric(v: unknown): Metric {
  if (v === undefined) return 0
  if (typeof v === 'number') return Number.isFinite(v) ? v : null
  if (typeof v === 'boolean') return v ? 1 : 0
  if (typeof v === 'string') {
    const s = v.trim()
    if (s === '') return null
    const n = Number(s)
    return Number.isFinite(n) ? n : null
  }
  return null
}

const metric = z.unknown().transform(toMetric)
const optionalString = z.unknown().transform((v) => (typeof v === 'string' ? v : undefined))

// a section that is missing or not an object reads as empty
function section<T extends z.ZodRawShape>(shape: T) {
  return z.preprocess((v) => (isRecord(v) ? v : {}), z.object(shape))
}

const windowMetrics = section({ m5: metric, h1: metric, h6: metric, h24: metric })

export const TradingPairSchema = z.object({
  pairAddress: optionalString,
  dexId: optionalString,
  url: optionalString,
  liquidity: section({ usd: metric }),
  volume: windowMetrics,
  priceChange: windowMetrics
})

const TokenLinkSchema = z.object({
  type: optionalString,
  label: optionalString,
  url: optionalString
})

export const TokenProfileSchema = z.object({
  chainId: optionalString,
  tokenAddress: optionalString,
  url: optionalString,
  description: optionalString,
  links: z.unknown().transform((v) => (Array.isArray(v) ? v.filter(isRecord).map(parseLink) : []))
})

function parseLink(raw: Record<string, unknown>): TokenLink {
  return TokenLinkSchema.parse(raw)
}

export function parseTradingPair(raw: Record<string, unknown>): TradingPair {
  return TradingPairSchema.parse(raw)
}

export function parseTokenProfile(raw: Record<string, unknown>): TokenProfile {
  return TokenProfileSchema.parse(raw)
}

// the profiles feed must be a list; non-object entries are dropped
export function parseProfileList(data: unknown): TokenProfile[] {
  if (!Array.isArray(data)) {
    throw new MalformedResponseError(`expected a list of token profiles, got ${describeShape(data)}`)
  }
  return data.filter(isRecord).map(parseTokenProfile)
}

// pair details come back as a list, as { pairs: [...] }, or as a single pair object
export function parseTokenPairs(data: unknown): TokenPairs {
  let rawList: unknown[]
  if (Array.isArray(data)) rawList = data
  else if (isRecord(data) && Array.isArray(data.pairs)) rawList = data.pairs
  else if (isRecord(data)) rawList = [data]
  else throw new MalformedResponseError(`expected pair data, got ${describeShape(data)}`)

  return { pairs: rawList.filter(isRecord).map(parseTradingPair) }
}

function describeShape(v: unknown): string {
  if (v === null) return 'null'
  if (Array.isArray(v)) return 'array'
  return typeof v
}
