// src/index.ts
import debug from 'debug'
import { createServer } from './app'
import { ADMIN_KEY, PORT, TARGET_CHAIN } from './config'
import { createDiscoveryDeps, startDiscovery, stopDiscovery } from './services/discovery'
import { createDiscoveryState } from './state/discoveryState'

const log = debug('alerts:main')

const deps = createDiscoveryDeps()
const state = createDiscoveryState()

// eslint-disable-next-line no-console
console.log(`Starting ${TARGET_CHAIN} token monitoring bot`)

const server = PORT > 0 ? createServer({ deps, state, adminKey: ADMIN_KEY }).httpServer : null
if (server) {
  server.listen(PORT, () => {
    // eslint-disable-next-line no-console
    console.log(`Status server listening on port ${PORT}`)
  })
}

const loop = startDiscovery(deps, state)

let shuttingDown = false
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return
  shuttingDown = true
  // eslint-disable-next-line no-console
  console.log(`Received ${signal}, stopping bot`)
  await stopDiscovery()
  if (server) await new Promise<void>((resolve) => server.close(() => resolve()))
  log('shutdown complete, known tokens: %d', state.knownTokens.size)
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((e: unknown) => {
      // eslint-disable-next-line no-console
      console.error('Shutdown error', e)
      process.exitCode = 1
    })
  })
}

loop.catch((e: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Discovery loop crashed', e)
  process.exitCode = 1
})
