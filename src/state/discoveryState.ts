// src/state/discoveryState.ts
import { PassSummary } from '../types'

// addresses already alerted on during this run; only ever grows
export class KnownTokens {
  private readonly addresses = new Set<string>()

  has(address: string): boolean {
    return this.addresses.has(address)
  }

  add(address: string): void {
    this.addresses.add(address)
  }

  get size(): number {
    return this.addresses.size
  }

  values(): string[] {
    return Array.from(this.addresses)
  }
}

// owned by the discovery loop for the lifetime of the process, never persisted
export interface DiscoveryState {
  knownTokens: KnownTokens
  passes: number
  running: boolean
  lastPass?: PassSummary
}

export function createDiscoveryState(): DiscoveryState {
  return { knownTokens: new KnownTokens(), passes: 0, running: false }
}
