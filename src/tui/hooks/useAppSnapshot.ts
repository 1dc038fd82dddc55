import { useSyncExternalStore } from 'react'
import type { AppContext, AppSnapshot } from '../context.js'

/**
 * Subscribe a component to the context; re-renders after every publish()
 */
export function useAppSnapshot(context: AppContext): AppSnapshot {
  return useSyncExternalStore(context.subscribe, context.getSnapshot, context.getSnapshot)
}
