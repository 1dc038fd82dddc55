// Expansion flags keyed by node identity
// Entries are only ever added or overwritten; the key space is bounded by the catalog.

import type { NodeKey } from './types.js'

/**
 * Serialize a node key, e.g. "mysql/2/0"
 */
export function nodeKeyToString(key: NodeKey): string {
  return [key.moduleId, ...key.path].join('/')
}

export function nodeKey(moduleId: string, path: readonly number[]): NodeKey {
  return { moduleId, path: [...path] }
}

/**
 * Read a flag from a store snapshot (absent = collapsed)
 */
export function isExpanded(flags: ReadonlyMap<string, boolean>, key: NodeKey): boolean {
  return flags.get(nodeKeyToString(key)) ?? false
}

export class ExpansionStore {
  private flags = new Map<string, boolean>()

  get(key: NodeKey): boolean {
    return isExpanded(this.flags, key)
  }

  set(key: NodeKey, expanded: boolean): void {
    this.flags.set(nodeKeyToString(key), expanded)
  }

  /** Flip a flag and return its new value */
  toggle(key: NodeKey): boolean {
    const next = !this.get(key)
    this.set(key, next)
    return next
  }

  get size(): number {
    return this.flags.size
  }

  snapshot(): ReadonlyMap<string, boolean> {
    return new Map(this.flags)
  }
}
