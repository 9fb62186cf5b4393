// src/app.ts
import express from 'express'
import http from 'http'
import morgan from 'morgan'
import { createHealthRouter } from './routes/health'
import { createStatusRouter } from './routes/status'
import { createAdminRouter } from './routes/admin'
import { DiscoveryDeps } from './services/discovery'
import { DiscoveryState } from './state/discoveryState'

export interface ServerContext {
  deps: DiscoveryDeps
  state: DiscoveryState
  adminKey: string
}

// status surface for the bot: health, loop status, manual scan
export function createApp(ctx: ServerContext) {
  const app = express()
  app.use(express.json())
  app.use(morgan('tiny'))

  app.use('/health', createHealthRouter(ctx.deps, ctx.state))
  app.use('/status', createStatusRouter(ctx.state))
  app.use('/admin', createAdminRouter(ctx.deps, ctx.state, ctx.adminKey))

  return app
}

export function createServer(ctx: ServerContext) {
  const app = createApp(ctx)
  const httpServer = http.createServer(app)
  return { app, httpServer }
}
