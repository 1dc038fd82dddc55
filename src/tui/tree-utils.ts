/**
 * Snapshot → display rows. Pure functions; nothing here mutates its input.
 */

import type { ConnectionStatus, ModuleInfo } from '../data/provider.js'
import type { AppSnapshot } from './context.js'
import { isExpanded, nodeKey, nodeKeyToString } from './expansion-store.js'
import { KEY_HINTS, MODE_LABELS } from './appNavigation.js'
import { padEnd } from './utils/format.js'
import { Level, type Mode, type NavigationCursor } from './types.js'

export interface TreeRow {
  key: string
  level: Level
  depth: number
  label: string
  icon: string
  selected: boolean
  expanded: boolean
  hasChildren: boolean
  status: ConnectionStatus | null
}

export interface ModuleBarItem {
  id: string
  name: string
  hovered: boolean
  current: boolean
}

/** Mode the UI underneath a pending confirmation is showing */
export function visibleMode(mode: Mode): 'browsing' | 'navigating' {
  return mode.kind === 'confirm-pending' ? mode.previous.kind : mode.kind
}

function cursorPath(cursor: NavigationCursor): number[] {
  return [cursor.selectedProject, cursor.selectedEnv, cursor.selectedConn].slice(0, cursor.level + 1)
}

function samePath(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((value, index) => value === b[index])
}

function isPrefix(prefix: readonly number[], path: readonly number[]): boolean {
  return prefix.length < path.length && prefix.every((value, index) => value === path[index])
}

/**
 * Get the icon for a row based on its state
 */
export function getNodeIcon(hasChildren: boolean, expanded: boolean, selected: boolean): string {
  if (selected) {
    return '→'
  }

  if (hasChildren) {
    return expanded ? '▼' : '▶'
  }

  return '•'
}

/**
 * Visible rows of the current module's tree in depth-first order.
 * Children of a node are listed when its flag is set, or, while the tree has
 * focus, when the node is an ancestor of the cursor.
 */
export function buildTreeRows(snapshot: AppSnapshot): TreeRow[] {
  const module = snapshot.modules[snapshot.current]
  if (!module) return []

  const { provider, expansion, statuses } = snapshot
  const focused = visibleMode(snapshot.mode) === 'navigating'
  const selectedPath = focused ? cursorPath(snapshot.cursor) : null
  const rows: TreeRow[] = []

  const opened = (path: number[]): boolean =>
    isExpanded(expansion, nodeKey(module.id, path)) || (selectedPath !== null && isPrefix(path, selectedPath))

  const pushRow = (
    level: Level,
    path: number[],
    label: string,
    childCount: number,
    status: ConnectionStatus | null
  ): void => {
    const expanded = opened(path)
    const selected = selectedPath !== null && samePath(path, selectedPath)
    const hasChildren = childCount > 0
    rows.push({
      key: nodeKeyToString(nodeKey(module.id, path)),
      level,
      depth: level,
      label,
      icon: getNodeIcon(hasChildren, expanded, selected),
      selected,
      expanded,
      hasChildren,
      status,
    })
  }

  provider.listProjects(module.id).forEach((project, p) => {
    const environments = provider.listEnvironments(module.id, p)
    pushRow(Level.Project, [p], project.name, environments.length, null)
    if (!opened([p])) return

    environments.forEach((environment, e) => {
      const connections = provider.listConnections(module.id, p, e)
      pushRow(Level.Environment, [p, e], environment.name, connections.length, null)
      if (!opened([p, e])) return

      connections.forEach((connection, c) => {
        const key = nodeKeyToString(nodeKey(module.id, [p, e, c]))
        const status = statuses.get(key) ?? connection.status
        pushRow(Level.Connection, [p, e, c], `${connection.name} (${connection.address})`, 0, status)
      })
    })
  })

  return rows
}

export function moduleBarItems(snapshot: AppSnapshot): ModuleBarItem[] {
  return snapshot.modules.map((module, index) => ({
    id: module.id,
    name: module.name,
    hovered: index === snapshot.hovered,
    current: index === snapshot.current,
  }))
}

/**
 * Detail panel lines with values aligned after the longest label
 */
export function detailLines(module: ModuleInfo): string[] {
  const width = Math.max(0, ...module.details.map((detail) => detail.label.length)) + 2
  return module.details.map((detail) => `${padEnd(`${detail.label}:`, width)}${detail.value}`)
}

export interface StatusLine {
  mode: string
  module: string
  hints: string
  message: string | null
}

export function statusLine(snapshot: AppSnapshot): StatusLine {
  const module = snapshot.modules[snapshot.current]
  return {
    mode: MODE_LABELS[snapshot.mode.kind],
    module: module?.name ?? '-',
    hints: KEY_HINTS[snapshot.mode.kind],
    message: snapshot.message,
  }
}
