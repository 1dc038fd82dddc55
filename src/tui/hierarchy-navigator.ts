/**
 * Project → environment → connection cursor for one module.
 *
 * Movement and expansion are separate concerns: moving between siblings never
 * touches expansion flags, and only the expand/collapse/toggle operations
 * write to the ExpansionStore. Child lists are re-read from the DataProvider
 * on every operation.
 */

import type { Connection, DataProvider } from '../data/provider.js'
import { nodeKey, type ExpansionStore } from './expansion-store.js'
import { Level, type NavigationCursor, type NodeKey } from './types.js'

export interface ConnectionRef {
  key: NodeKey
  moduleId: string
  connection: Connection
}

export type NavigationEffect =
  | { type: 'none' }
  | { type: 'exit-tree' }
  | { type: 'activate'; target: ConnectionRef }

const NONE: NavigationEffect = { type: 'none' }

function initialCursor(): NavigationCursor {
  return { level: Level.Project, selectedProject: 0, selectedEnv: 0, selectedConn: 0 }
}

export class HierarchyNavigator {
  private moduleId: string
  private cursor: NavigationCursor = initialCursor()

  constructor(
    private readonly provider: DataProvider,
    private readonly expansion: ExpansionStore,
    moduleId: string
  ) {
    this.moduleId = moduleId
  }

  get activeModuleId(): string {
    return this.moduleId
  }

  get level(): Level {
    return this.cursor.level
  }

  getCursor(): NavigationCursor {
    return { ...this.cursor }
  }

  /** Fresh cursor at the first project of `moduleId` */
  reset(moduleId: string): void {
    this.moduleId = moduleId
    this.cursor = initialCursor()
  }

  /** Indices from the project down to the highlighted node */
  highlightedPath(): number[] {
    const { selectedProject, selectedEnv, selectedConn } = this.cursor
    return [selectedProject, selectedEnv, selectedConn].slice(0, this.cursor.level + 1)
  }

  highlightedKey(): NodeKey {
    return nodeKey(this.moduleId, this.highlightedPath())
  }

  moveUp(): boolean {
    const { level } = this.cursor
    const index = this.indexAt(level)
    if (index > 0) {
      this.setIndexAt(level, index - 1)
      return true
    }
    const parent = parentLevel(level)
    if (parent === null) return false
    this.cursor.level = parent
    return true
  }

  moveDown(): boolean {
    const { level } = this.cursor
    const index = this.indexAt(level)
    if (index < this.countAt(level) - 1) {
      this.setIndexAt(level, index + 1)
      return true
    }
    return this.descend()
  }

  collapseOrAscend(): NavigationEffect {
    const parent = parentLevel(this.cursor.level)
    if (parent === null) return { type: 'exit-tree' }
    this.cursor.level = parent
    this.expansion.set(this.highlightedKey(), false)
    return NONE
  }

  expandOrDescend(): boolean {
    if (this.cursor.level === Level.Connection) return false
    this.expansion.set(this.highlightedKey(), true)
    this.descend()
    return true
  }

  /** Flip the highlighted node's flag; returns the new value */
  toggleExpansion(): boolean {
    return this.expansion.toggle(this.highlightedKey())
  }

  /**
   * Leaf action. Hands the highlighted connection to the caller; the cursor
   * does not move.
   */
  activate(): NavigationEffect {
    if (this.cursor.level !== Level.Connection) return NONE
    const { selectedProject, selectedEnv, selectedConn } = this.cursor
    const connection = this.provider.listConnections(this.moduleId, selectedProject, selectedEnv)[selectedConn]
    if (!connection) return NONE
    return {
      type: 'activate',
      target: { key: this.highlightedKey(), moduleId: this.moduleId, connection },
    }
  }

  /** Number of siblings at `level` under the current ancestor path */
  countAt(level: Level): number {
    const { selectedProject, selectedEnv } = this.cursor
    switch (level) {
      case Level.Project:
        return this.provider.listProjects(this.moduleId).length
      case Level.Environment:
        return this.provider.listEnvironments(this.moduleId, selectedProject).length
      case Level.Connection:
        return this.provider.listConnections(this.moduleId, selectedProject, selectedEnv).length
    }
  }

  private descend(): boolean {
    const child = childLevel(this.cursor.level)
    if (child === null || this.countAt(child) === 0) return false
    this.cursor.level = child
    this.setIndexAt(child, 0)
    return true
  }

  private indexAt(level: Level): number {
    switch (level) {
      case Level.Project:
        return this.cursor.selectedProject
      case Level.Environment:
        return this.cursor.selectedEnv
      case Level.Connection:
        return this.cursor.selectedConn
    }
  }

  // Changing an index resets every index below it
  private setIndexAt(level: Level, value: number): void {
    switch (level) {
      case Level.Project:
        this.cursor.selectedProject = value
        this.cursor.selectedEnv = 0
        this.cursor.selectedConn = 0
        break
      case Level.Environment:
        this.cursor.selectedEnv = value
        this.cursor.selectedConn = 0
        break
      case Level.Connection:
        this.cursor.selectedConn = value
        break
    }
  }
}

function parentLevel(level: Level): Level | null {
  switch (level) {
    case Level.Project:
      return null
    case Level.Environment:
      return Level.Project
    case Level.Connection:
      return Level.Environment
  }
}

function childLevel(level: Level): Level | null {
  switch (level) {
    case Level.Project:
      return Level.Environment
    case Level.Environment:
      return Level.Connection
    case Level.Connection:
      return null
  }
}
