// src/routes/admin.ts
import express, { Request, Response } from 'express'
import debug from 'debug'
import { DiscoveryDeps, runExclusivePass } from '../services/discovery'
import { DiscoveryState } from '../state/discoveryState'

const log = debug('alerts:admin')

export function createAdminRouter(deps: DiscoveryDeps, state: DiscoveryState, adminKey: string) {
  const router = express.Router()

  // POST /admin/scan: run one pass now
  router.post('/scan', async (req: Request, res: Response) => {
    if (adminKey && (req.header('x-admin-key') || '') !== adminKey) {
      return res.status(403).json({ error: 'forbidden' })
    }

    try {
      const summary = await runExclusivePass(deps, state)
      if (!summary) return res.status(409).json({ error: 'pass already running' })
      log('manual pass finished, sent:', summary.sent)
      return res.json({ ok: true, sent: summary.sent })
    } catch (err: unknown) {
      // eslint-disable-next-line no-console
      console.error('admin scan error', err)
      return res.status(500).json({ error: 'scan failed' })
    }
  })

  return router
}
