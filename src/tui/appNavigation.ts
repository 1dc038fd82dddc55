// Key bindings for each mode
// Arrow keys and their vim equivalents; letters are matched case-insensitively.

import type { KeyPress, Mode } from './types.js'

export type BrowsingCommand = 'hover-previous' | 'hover-next' | 'enter-tree' | 'request-quit'

export type TreeCommand =
  | 'move-up'
  | 'move-down'
  | 'expand'
  | 'collapse'
  | 'toggle'
  | 'activate'
  | 'exit-tree'
  | 'request-quit'

/** Subset of ink's Key object that the key map reads */
export interface HostKey {
  upArrow: boolean
  downArrow: boolean
  leftArrow: boolean
  rightArrow: boolean
  return: boolean
  escape: boolean
  tab: boolean
  backspace: boolean
  ctrl: boolean
  shift: boolean
}

/**
 * Normalize an ink `useInput` callback pair into a KeyPress
 */
export function toKeyPress(input: string, key: HostKey): KeyPress {
  const base = { ctrl: key.ctrl, shift: key.shift }
  if (key.upArrow) return { name: 'up', ...base }
  if (key.downArrow) return { name: 'down', ...base }
  if (key.leftArrow) return { name: 'left', ...base }
  if (key.rightArrow) return { name: 'right', ...base }
  if (key.return) return { name: 'return', ...base }
  if (key.escape) return { name: 'escape', ...base }
  if (key.tab) return { name: 'tab', ...base }
  if (key.backspace) return { name: 'backspace', ...base }
  if (input === ' ') return { name: 'space', ...base }

  const lower = input.toLowerCase()
  return { name: lower, ctrl: key.ctrl, shift: key.shift || (input !== lower) }
}

/** Ctrl+C / Ctrl+Q leave immediately, bypassing the confirmation */
export function shouldForceQuit(key: Pick<KeyPress, 'name' | 'ctrl'>): boolean {
  return key.ctrl && (key.name === 'c' || key.name === 'q')
}

export function mapBrowsingKey(key: KeyPress): BrowsingCommand | null {
  if (key.ctrl) return null
  switch (key.name) {
    case 'left':
    case 'h':
      return 'hover-previous'
    case 'right':
    case 'l':
      return 'hover-next'
    case 'return':
    case 'down':
    case 'j':
      return 'enter-tree'
    case 'q':
      return 'request-quit'
    default:
      return null
  }
}

export function mapTreeKey(key: KeyPress): TreeCommand | null {
  if (key.ctrl) return null
  switch (key.name) {
    case 'up':
    case 'k':
      return 'move-up'
    case 'down':
    case 'j':
      return 'move-down'
    case 'right':
    case 'l':
      return 'expand'
    case 'left':
    case 'h':
      return 'collapse'
    case 'space':
      return 'toggle'
    case 'return':
      return 'activate'
    case 'escape':
      return 'exit-tree'
    case 'q':
      return 'request-quit'
    default:
      return null
  }
}

export function isConfirmKey(key: KeyPress): boolean {
  return !key.ctrl && key.name === 'y'
}

export function isCancelKey(key: KeyPress): boolean {
  return !key.ctrl && (key.name === 'n' || key.name === 'escape')
}

export const MODE_LABELS: Record<Mode['kind'], string> = {
  browsing: 'Browsing',
  navigating: 'Navigating',
  'confirm-pending': 'Confirm quit',
}

export const KEY_HINTS: Record<Mode['kind'], string> = {
  browsing: '←→/h/l:module  Enter/j:open  q:quit',
  navigating: '↑↓/j/k:move  →/l:expand  ←/h:collapse  Space:toggle  Enter:connect  Esc:back  q:quit',
  'confirm-pending': 'y:quit  n/Esc:cancel',
}
