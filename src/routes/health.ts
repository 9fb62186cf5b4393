// src/routes/health.ts
import express from 'express'
import { DiscoveryDeps } from '../services/discovery'
import { DiscoveryState } from '../state/discoveryState'

// a finished pass older than this many intervals means the loop has stalled
const STALE_AFTER_INTERVALS = 3

// Liveness probe for process supervisors: 503 once discovery stops completing passes.
export function createHealthRouter(deps: DiscoveryDeps, state: DiscoveryState) {
  const router = express.Router()

  router.get('/', (_req, res) => {
    const now = deps.clock.now()
    const lastPassAt = state.lastPass?.finishedAt ?? null
    const stale = lastPassAt !== null && now - lastPassAt > STALE_AFTER_INTERVALS * deps.intervalMs

    return res.status(stale ? 503 : 200).json({
      ok: !stale,
      service: 'solana-listing-alerts',
      uptime_seconds: Math.floor(process.uptime()),
      last_pass_at: lastPassAt === null ? null : new Date(lastPassAt).toISOString(),
      passes: state.passes
    })
  })

  return router
}
