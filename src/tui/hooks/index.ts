export { useAppSnapshot } from './useAppSnapshot.js'
export { useTerminalSize, type TerminalSize } from './useTerminalSize.js'
