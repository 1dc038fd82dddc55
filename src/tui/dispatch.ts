/**
 * Input dispatcher.
 *
 * One key press is one transition: the pending quit confirmation consumes it
 * if open, otherwise it goes to the module selector (browsing) or the
 * hierarchy navigator (navigating). Handled keys publish a new snapshot;
 * ignored and swallowed keys leave state and rendering alone.
 */

import {
  mapBrowsingKey,
  mapTreeKey,
  shouldForceQuit,
  type BrowsingCommand,
  type TreeCommand,
} from './appNavigation.js'
import { openConfirmation, resolveConfirmation } from './confirmation-gate.js'
import type { AppContext } from './context.js'
import type { NavigationEffect } from './hierarchy-navigator.js'
import type { BaseMode, ConfirmPendingMode, KeyPress } from './types.js'

export type DispatchOutcome = 'handled' | 'ignored' | 'swallowed' | 'quit'

export function dispatchKey(ctx: AppContext, key: KeyPress): DispatchOutcome {
  if (shouldForceQuit(key)) {
    ctx.log.info('Quit requested with ctrl key')
    return 'quit'
  }

  const mode = ctx.getMode()
  switch (mode.kind) {
    case 'confirm-pending':
      return dispatchConfirmation(ctx, mode, key)
    case 'browsing': {
      const command = mapBrowsingKey(key)
      if (!command) return 'ignored'
      applyBrowsingCommand(ctx, command)
      break
    }
    case 'navigating': {
      const command = mapTreeKey(key)
      if (!command) return 'ignored'
      applyTreeCommand(ctx, command)
      break
    }
  }

  ctx.publish()
  return 'handled'
}

function dispatchConfirmation(ctx: AppContext, mode: ConfirmPendingMode, key: KeyPress): DispatchOutcome {
  const resolution = resolveConfirmation(mode, key)
  switch (resolution.type) {
    case 'quit':
      ctx.log.info('Quit confirmed')
      return 'quit'
    case 'restore':
      ctx.setMode(resolution.mode)
      ctx.publish()
      return 'handled'
    case 'swallow':
      return 'swallowed'
  }
}

export function applyBrowsingCommand(ctx: AppContext, command: BrowsingCommand): void {
  switch (command) {
    case 'hover-previous':
      ctx.selector.hoverPrevious()
      break
    case 'hover-next':
      ctx.selector.hoverNext()
      break
    case 'enter-tree':
      enterTree(ctx)
      break
    case 'request-quit':
      requestQuit(ctx, { kind: 'browsing' })
      break
  }
}

export function applyTreeCommand(ctx: AppContext, command: TreeCommand): void {
  const { navigator } = ctx
  switch (command) {
    case 'move-up':
      navigator.moveUp()
      break
    case 'move-down':
      navigator.moveDown()
      break
    case 'expand':
      navigator.expandOrDescend()
      break
    case 'collapse':
      applyEffect(ctx, navigator.collapseOrAscend())
      break
    case 'toggle':
      navigator.toggleExpansion()
      break
    case 'activate':
      applyEffect(ctx, navigator.activate())
      break
    case 'exit-tree':
      applyEffect(ctx, { type: 'exit-tree' })
      break
    case 'request-quit':
      requestQuit(ctx, { kind: 'navigating' })
      break
  }
}

function enterTree(ctx: AppContext): void {
  const module = ctx.selector.commit()
  ctx.navigator.reset(module.id)
  ctx.setMessage(null)

  if (ctx.provider.listProjects(module.id).length === 0) {
    ctx.setMessage(`${module.name} has no projects`)
    return
  }
  ctx.setMode({ kind: 'navigating' })
}

function requestQuit(ctx: AppContext, previous: BaseMode): void {
  ctx.setMode(openConfirmation(previous))
}

function applyEffect(ctx: AppContext, effect: NavigationEffect): void {
  switch (effect.type) {
    case 'none':
      return
    case 'exit-tree':
      ctx.setMode({ kind: 'browsing' })
      return
    case 'activate': {
      const { status, message } = ctx.statusBoard.activate(effect.target)
      ctx.log.info(message, { connection: effect.target.connection.name, status })
      ctx.setMessage(message)
      return
    }
  }
}
