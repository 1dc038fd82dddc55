// Module bar state: a provisional hover highlight and the committed module

import type { ModuleInfo } from '../data/provider.js'

export interface ModuleSelectorState {
  hovered: number
  current: number
}

export class ModuleSelector {
  private hoveredIndex = 0
  private currentIndex = 0

  constructor(private readonly modules: readonly ModuleInfo[]) {
    if (modules.length === 0) {
      throw new Error('ModuleSelector requires at least one module')
    }
  }

  get hovered(): number {
    return this.hoveredIndex
  }

  get current(): number {
    return this.currentIndex
  }

  get currentModule(): ModuleInfo {
    return this.moduleAt(this.currentIndex)
  }

  get hoveredModule(): ModuleInfo {
    return this.moduleAt(this.hoveredIndex)
  }

  list(): readonly ModuleInfo[] {
    return this.modules
  }

  /** Returns false when already at the first module */
  hoverPrevious(): boolean {
    if (this.hoveredIndex === 0) return false
    this.hoveredIndex -= 1
    return true
  }

  /** Returns false when already at the last module */
  hoverNext(): boolean {
    if (this.hoveredIndex >= this.modules.length - 1) return false
    this.hoveredIndex += 1
    return true
  }

  commit(): ModuleInfo {
    this.currentIndex = this.hoveredIndex
    return this.currentModule
  }

  /**
   * Hover and commit the module matching `idOrName` (case-insensitive).
   * Leaves the selection untouched when nothing matches.
   */
  selectModule(idOrName: string): boolean {
    const needle = idOrName.toLowerCase()
    const index = this.modules.findIndex(
      (module) => module.id === needle || module.name.toLowerCase() === needle
    )
    if (index === -1) return false
    this.hoveredIndex = index
    this.commit()
    return true
  }

  snapshot(): ModuleSelectorState {
    return { hovered: this.hoveredIndex, current: this.currentIndex }
  }

  private moduleAt(index: number): ModuleInfo {
    const module = this.modules[index]
    if (!module) {
      throw new RangeError(`module index ${index} out of range`)
    }
    return module
  }
}
