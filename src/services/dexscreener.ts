// src/services/dexscreener.ts
import { AxiosInstance } from 'axios'
import debug from 'debug'
import defaultClient, { describeError } from '../http/axiosClient'
import { DEXSCREENER_PAIRS_URL, DEXSCREENER_PROFILES_URL, TARGET_CHAIN } from '../config'
import { MalformedResponseError, parseProfileList, parseTokenPairs } from '../schemas'
import { TokenPairs, TokenProfile } from '../types'

const log = debug('alerts:dexscreener')

export interface FeedOptions {
  client?: AxiosInstance
  url?: string
  chain?: string
}

// GET as text so an empty or broken body is reported as such instead of silently passed through
async function getJson(client: AxiosInstance, url: string): Promise<unknown> {
  const res = await client.get<string>(url, { responseType: 'text' })
  log('GET %s -> %d', url, res.status)
  const body = typeof res.data === 'string' ? res.data : ''
  if (body.trim() === '') throw new MalformedResponseError('empty response body')
  try {
    return JSON.parse(body)
  } catch (e) {
    throw new MalformedResponseError(`invalid JSON: ${describeError(e)}`)
  }
}

// latest token profiles for one chain; [] on any failure
export async function fetchTokenProfiles(opts: FeedOptions = {}): Promise<TokenProfile[]> {
  const client = opts.client ?? defaultClient
  const url = opts.url ?? DEXSCREENER_PROFILES_URL
  const chain = opts.chain ?? TARGET_CHAIN
  try {
    const profiles = parseProfileList(await getJson(client, url))
    log('profiles received: %d', profiles.length)

    const onChain = profiles.filter((p) => p.chainId === chain)
    // eslint-disable-next-line no-console
    console.log(`DexScreener: ${onChain.length} ${chain} profiles (of ${profiles.length})`)
    return onChain
  } catch (e: unknown) {
    // eslint-disable-next-line no-console
    console.error('fetchTokenProfiles error', describeError(e))
    return []
  }
}

// pair details for a token, normalized to { pairs }; null on any failure
export async function fetchTokenPairs(tokenAddress: string, opts: FeedOptions = {}): Promise<TokenPairs | null> {
  const client = opts.client ?? defaultClient
  const base = (opts.url ?? DEXSCREENER_PAIRS_URL).replace(/\/+$/, '')
  const chain = opts.chain ?? TARGET_CHAIN
  const url = `${base}/${encodeURIComponent(chain)}/${encodeURIComponent(tokenAddress)}`
  try {
    const details = parseTokenPairs(await getJson(client, url))
    log('pairs for %s: %d', tokenAddress, details.pairs.length)
    return details
  } catch (e: unknown) {
    // eslint-disable-next-line no-console
    console.error(`fetchTokenPairs error for ${tokenAddress}`, describeError(e))
    return null
  }
}
