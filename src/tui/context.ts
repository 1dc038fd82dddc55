/**
 * The application context: every piece of interactive state, owned by one
 * object that is created once at startup and handed to the dispatcher and the
 * UI. Each handled key ends with `publish()`, which freezes a new snapshot and
 * notifies subscribers (the React tree re-renders from it).
 */

import type { ConnectionStatus, DataProvider, ModuleInfo } from '../data/provider.js'
import { createDebugLogger, type DebugLogger } from '../utils/debug.js'
import { ExpansionStore } from './expansion-store.js'
import { HierarchyNavigator } from './hierarchy-navigator.js'
import { ModuleSelector } from './module-selector.js'
import { ConnectionStatusBoard } from './status-board.js'
import type { Mode, NavigationCursor } from './types.js'

export interface AppSnapshot {
  mode: Mode
  modules: readonly ModuleInfo[]
  hovered: number
  current: number
  activeModuleId: string
  cursor: NavigationCursor
  expansion: ReadonlyMap<string, boolean>
  statuses: ReadonlyMap<string, ConnectionStatus>
  message: string | null
  provider: DataProvider
}

export interface AppContextOptions {
  provider: DataProvider
  /** Module id or display name to select at startup */
  startModule?: string
  logger?: DebugLogger
}

type Listener = () => void

export class AppContext {
  readonly provider: DataProvider
  readonly selector: ModuleSelector
  readonly expansion: ExpansionStore
  readonly navigator: HierarchyNavigator
  readonly statusBoard: ConnectionStatusBoard
  readonly log: DebugLogger

  private mode: Mode = { kind: 'browsing' }
  private message: string | null = null
  private snapshot: AppSnapshot
  private listeners = new Set<Listener>()

  constructor(options: AppContextOptions) {
    this.provider = options.provider
    this.log = options.logger ?? createDebugLogger('tui')
    this.selector = new ModuleSelector(this.provider.listModules())
    this.expansion = new ExpansionStore()
    this.statusBoard = new ConnectionStatusBoard()

    if (options.startModule !== undefined && !this.selector.selectModule(options.startModule)) {
      this.log.warn(`Unknown start module '${options.startModule}', using ${this.selector.currentModule.name}`)
    }
    this.navigator = new HierarchyNavigator(this.provider, this.expansion, this.selector.currentModule.id)
    this.snapshot = this.buildSnapshot()
  }

  getMode(): Mode {
    return this.mode
  }

  setMode(mode: Mode): void {
    if (mode.kind !== this.mode.kind) {
      this.log.state('mode', this.mode.kind, mode.kind)
    }
    this.mode = mode
  }

  setMessage(message: string | null): void {
    this.message = message
  }

  // Arrow properties so they can be passed straight to useSyncExternalStore
  getSnapshot = (): AppSnapshot => this.snapshot

  subscribe = (listener: Listener): (() => void) => {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /** Freeze the current state into a new snapshot and request a redraw */
  publish(): void {
    this.snapshot = this.buildSnapshot()
    for (const listener of this.listeners) {
      listener()
    }
  }

  private buildSnapshot(): AppSnapshot {
    const { hovered, current } = this.selector.snapshot()
    return Object.freeze({
      mode: this.mode,
      modules: this.selector.list(),
      hovered,
      current,
      activeModuleId: this.navigator.activeModuleId,
      cursor: Object.freeze(this.navigator.getCursor()),
      expansion: this.expansion.snapshot(),
      statuses: this.statusBoard.snapshot(),
      message: this.message,
      provider: this.provider,
    })
  }
}
