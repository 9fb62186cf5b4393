// src/services/discovery.ts
import debug from 'debug'
import {
  CHART_BASE_URL,
  CHECK_INTERVAL_SECONDS,
  EXCLUDED_SUFFIX,
  LIQUIDITY_THRESHOLD_USD,
  RECOVERY_DELAY_SECONDS,
  SEND_DELAY_SECONDS
} from '../config'
import { describeError } from '../http/axiosClient'
import { DiscoveryState } from '../state/discoveryState'
import { PassSummary, SkipReason, TokenPairs, TokenProfile, TradingPair } from '../types'
import { liquidityOf, selectMainPair } from '../utils/pairs'
import { renderChart } from './chart'
import { fetchTokenPairs, fetchTokenProfiles } from './dexscreener'
import { formatAlert } from './formatter'
import { sendToTelegram } from './notifier'

const log = debug('alerts:discovery')

export interface Clock {
  now(): number
  // resolves after ms, or early once the signal aborts
  sleep(ms: number, signal?: AbortSignal): Promise<void>
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve) => {
      if (signal?.aborted) return resolve()
      const timer = setTimeout(done, ms)
      function done() {
        clearTimeout(timer)
        signal?.removeEventListener('abort', done)
        resolve()
      }
      signal?.addEventListener('abort', done, { once: true })
    })
}

export interface DiscoveryDeps {
  fetchProfiles: () => Promise<TokenProfile[]>
  fetchPairs: (tokenAddress: string) => Promise<TokenPairs | null>
  renderChart: (pair: TradingPair, tokenName: string) => Promise<Buffer | null>
  send: (message: string, image: Buffer | null) => Promise<boolean>
  clock: Clock
  liquidityThreshold: number
  excludedSuffix: string
  chartBaseUrl: string
  sendDelayMs: number
  intervalMs: number
  recoveryDelayMs: number
}

export function createDiscoveryDeps(overrides: Partial<DiscoveryDeps> = {}): DiscoveryDeps {
  return {
    fetchProfiles: () => fetchTokenProfiles(),
    fetchPairs: (tokenAddress) => fetchTokenPairs(tokenAddress),
    renderChart,
    send: (message, image) => sendToTelegram(message, image),
    clock: systemClock,
    liquidityThreshold: LIQUIDITY_THRESHOLD_USD,
    excludedSuffix: EXCLUDED_SUFFIX,
    chartBaseUrl: CHART_BASE_URL,
    sendDelayMs: SEND_DELAY_SECONDS * 1000,
    intervalMs: CHECK_INTERVAL_SECONDS * 1000,
    recoveryDelayMs: RECOVERY_DELAY_SECONDS * 1000,
    ...overrides
  }
}

export function isExcludedToken(tokenAddress: string, suffix: string): boolean {
  return suffix !== '' && tokenAddress.toLowerCase().endsWith(suffix.toLowerCase())
}

function emptySkipCounts(): Record<SkipReason, number> {
  return {
    'missing-address': 0,
    known: 0,
    excluded: 0,
    'details-unavailable': 0,
    'no-pair': 0,
    'low-liquidity': 0,
    'invalid-alert': 0,
    'send-failed': 0,
    error: 0
  }
}

type CandidateOutcome = 'sent' | SkipReason

async function processCandidate(
  deps: DiscoveryDeps,
  state: DiscoveryState,
  profile: TokenProfile,
  tokenAddress: string,
  signal?: AbortSignal
): Promise<CandidateOutcome> {
  const details = await deps.fetchPairs(tokenAddress)
  if (!details) return 'details-unavailable'

  const mainPair = selectMainPair(details.pairs)
  if (!mainPair) return 'no-pair'

  const liquidity = liquidityOf(mainPair)
  if (liquidity < deps.liquidityThreshold) {
    log('%s below liquidity threshold (%d < %d)', tokenAddress, liquidity, deps.liquidityThreshold)
    return 'low-liquidity'
  }

  const { message, pair } = formatAlert(profile, details, { chartBaseUrl: deps.chartBaseUrl })
  if (!pair) {
    // eslint-disable-next-line no-console
    console.warn(`Skipping ${tokenAddress}: ${message}`)
    return 'invalid-alert'
  }

  const image = await deps.renderChart(pair, tokenAddress)
  if (!image) log('no chart for %s, sending text only', tokenAddress)

  const ok = await deps.send(message, image)
  if (ok) state.knownTokens.add(tokenAddress)

  // spacing between sends
  await deps.clock.sleep(deps.sendDelayMs, signal)
  return ok ? 'sent' : 'send-failed'
}

// one pass over the latest profiles; records the summary on the state
export async function runPass(deps: DiscoveryDeps, state: DiscoveryState, signal?: AbortSignal): Promise<PassSummary> {
  // eslint-disable-next-line no-console
  console.log('Searching for new tokens')
  const startedAt = deps.clock.now()
  const skipped = emptySkipCounts()
  let candidates = 0
  let sent = 0

  const profiles = await deps.fetchProfiles()
  if (profiles.length === 0) {
    // eslint-disable-next-line no-console
    console.warn('No token profiles found')
  }

  for (const profile of profiles) {
    if (signal?.aborted) break

    const tokenAddress = profile.tokenAddress
    if (!tokenAddress) {
      skipped['missing-address']++
      continue
    }
    if (state.knownTokens.has(tokenAddress)) {
      skipped.known++
      continue
    }
    if (isExcludedToken(tokenAddress, deps.excludedSuffix)) {
      skipped.excluded++
      continue
    }

    candidates++
    let outcome: CandidateOutcome
    try {
      outcome = await processCandidate(deps, state, profile, tokenAddress, signal)
    } catch (e: unknown) {
      // eslint-disable-next-line no-console
      console.error(`Error processing ${tokenAddress}`, describeError(e))
      outcome = 'error'
    }
    if (outcome === 'sent') sent++
    else skipped[outcome]++
  }

  const summary: PassSummary = {
    startedAt,
    finishedAt: deps.clock.now(),
    profiles: profiles.length,
    candidates,
    sent,
    skipped
  }
  state.passes++
  state.lastPass = summary

  // eslint-disable-next-line no-console
  console.log(`Pass complete. Tokens sent: ${sent}`)
  return summary
}

// run a pass unless one is already in progress (resolves to null in that case)
export async function runExclusivePass(
  deps: DiscoveryDeps,
  state: DiscoveryState,
  signal?: AbortSignal
): Promise<PassSummary | null> {
  if (state.running) {
    log('pass already running, skipping')
    return null
  }
  state.running = true
  try {
    return await runPass(deps, state, signal)
  } finally {
    state.running = false
  }
}

// pass, wait, repeat until the signal aborts; unexpected errors wait the recovery delay
export async function runDiscoveryLoop(deps: DiscoveryDeps, state: DiscoveryState, signal: AbortSignal): Promise<void> {
  // eslint-disable-next-line no-console
  console.log('Starting token discovery loop')
  while (!signal.aborted) {
    try {
      await runExclusivePass(deps, state, signal)
      await deps.clock.sleep(deps.intervalMs, signal)
    } catch (e: unknown) {
      // eslint-disable-next-line no-console
      console.error('Discovery loop error', describeError(e))
      await deps.clock.sleep(deps.recoveryDelayMs, signal)
    }
  }
  // eslint-disable-next-line no-console
  console.log('Discovery loop stopped')
}

// process-wide loop handling
let loopController: AbortController | null = null
let loopPromise: Promise<void> | null = null

// start the background loop (idempotent)
export function startDiscovery(deps: DiscoveryDeps, state: DiscoveryState): Promise<void> {
  if (loopPromise) return loopPromise
  const controller = new AbortController()
  loopController = controller
  loopPromise = runDiscoveryLoop(deps, state, controller.signal).finally(() => {
    loopController = null
    loopPromise = null
  })
  log('discovery started, intervalMs=%d', deps.intervalMs)
  return loopPromise
}

// stop the background loop and wait for the current step to finish
export async function stopDiscovery(): Promise<void> {
  const running = loopPromise
  loopController?.abort()
  if (running) await running
  log('discovery stopped')
}
