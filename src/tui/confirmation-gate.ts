// Quit confirmation overlay
// While pending it consumes every key; it never reads or writes selector,
// navigator or expansion state, so cancelling resumes exactly where the user was.

import { isCancelKey, isConfirmKey } from './appNavigation.js'
import type { BaseMode, ConfirmPendingMode, KeyPress, Mode } from './types.js'

export type GateResolution =
  | { type: 'quit' }
  | { type: 'restore'; mode: BaseMode }
  | { type: 'swallow' }

export function openConfirmation(previous: BaseMode): ConfirmPendingMode {
  return { kind: 'confirm-pending', previous }
}

export function isConfirmPending(mode: Mode): mode is ConfirmPendingMode {
  return mode.kind === 'confirm-pending'
}

export function resolveConfirmation(mode: ConfirmPendingMode, key: KeyPress): GateResolution {
  if (isConfirmKey(key)) return { type: 'quit' }
  if (isCancelKey(key)) return { type: 'restore', mode: mode.previous }
  return { type: 'swallow' }
}
