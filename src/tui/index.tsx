// TUI entry point: mounts the App with ink and resolves when it exits

import { render } from 'ink'
import { configureLogging } from '../utils/debug.js'
import { App } from './App.js'
import type { AppContext } from './context.js'

export interface TUIOptions {
  context: AppContext
}

export async function launchTUI({ context }: TUIOptions): Promise<void> {
  // stderr output would tear the UI; log files are unaffected
  configureLogging({ muted: true })
  context.log.info('TUI started', { module: context.selector.currentModule.id })

  const instance = render(<App context={context} />, { exitOnCtrlC: false })
  try {
    await instance.waitUntilExit()
  } finally {
    configureLogging({ muted: false })
    context.log.info('TUI exited')
  }
}

export { App, AppView, type AppHooks, type AppProps } from './App.js'
export { AppContext, type AppSnapshot } from './context.js'
export { dispatchKey, type DispatchOutcome } from './dispatch.js'
export * from './types.js'
export * from './tree-utils.js'
