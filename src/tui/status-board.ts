// Session-local connection status overrides written by activation.
// Nothing here opens a socket; the catalog status is the starting point.

import type { ConnectionStatus } from '../data/provider.js'
import { nodeKeyToString } from './expansion-store.js'
import type { ConnectionRef } from './hierarchy-navigator.js'
import type { NodeKey } from './types.js'

export interface ActivationResult {
  status: ConnectionStatus
  message: string
}

export function nextStatus(status: ConnectionStatus): ConnectionStatus {
  return status === 'disconnected' ? 'connected' : 'disconnected'
}

export class ConnectionStatusBoard {
  private overrides = new Map<string, ConnectionStatus>()

  statusOf(key: NodeKey, fallback: ConnectionStatus): ConnectionStatus {
    return this.overrides.get(nodeKeyToString(key)) ?? fallback
  }

  activate(ref: ConnectionRef): ActivationResult {
    const current = this.statusOf(ref.key, ref.connection.status)
    const status = nextStatus(current)
    this.overrides.set(nodeKeyToString(ref.key), status)
    const message = status === 'connected'
      ? `Connected to ${ref.connection.name} (${ref.connection.address})`
      : `Disconnected from ${ref.connection.name}`
    return { status, message }
  }

  snapshot(): ReadonlyMap<string, ConnectionStatus> {
    return new Map(this.overrides)
  }
}
