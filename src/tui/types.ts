/**
 * TUI State Management Types
 */

export const Level = {
  Project: 0,
  Environment: 1,
  Connection: 2,
} as const

export type Level = (typeof Level)[keyof typeof Level]

/**
 * Identity of a tree node: the module plus the indices from the project down
 * to the node itself, e.g. { moduleId: 'mysql', path: [2, 0] } for the first
 * environment of the third project. Only ever used as a lookup key.
 */
export interface NodeKey {
  moduleId: string
  path: readonly number[]
}

export interface NavigationCursor {
  level: Level
  selectedProject: number
  selectedEnv: number
  selectedConn: number
}

export type BrowsingMode = { kind: 'browsing' }
export type NavigatingMode = { kind: 'navigating' }

/** Modes a pending quit confirmation can return to */
export type BaseMode = BrowsingMode | NavigatingMode

export type ConfirmPendingMode = { kind: 'confirm-pending'; previous: BaseMode }

export type Mode = BaseMode | ConfirmPendingMode

/** Key press normalized from the terminal host */
export interface KeyPress {
  name: string
  ctrl: boolean
  shift: boolean
}
