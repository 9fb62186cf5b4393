// src/routes/status.ts
import express from 'express'
import { DiscoveryState } from '../state/discoveryState'

// GET /status: what the discovery loop has done so far in this run
export function createStatusRouter(state: DiscoveryState) {
  const router = express.Router()

  router.get('/', (_req, res) => {
    const last = state.lastPass
    return res.json({
      known_tokens: state.knownTokens.size,
      passes: state.passes,
      running: state.running,
      last_pass: last
        ? {
            started_at: last.startedAt,
            finished_at: last.finishedAt,
            profiles: last.profiles,
            candidates: last.candidates,
            sent: last.sent,
            skipped: last.skipped
          }
        : null
    })
  })

  return router
}
