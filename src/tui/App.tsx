// Main TUI application: module bar, detail panel with the connection tree,
// status bar, and the quit confirmation overlay

import { Box, Text, useApp, useInput } from 'ink'
import type { AppContext, AppSnapshot } from './context.js'
import { isConfirmPending } from './confirmation-gate.js'
import { dispatchKey } from './dispatch.js'
import { toKeyPress, type HostKey } from './appNavigation.js'
import { Layout, getContentHeight } from './Layout.js'
import { TreeView } from './TreeView.js'
import { Header } from './components/layout/Header.js'
import { ModuleBar } from './components/layout/ModuleBar.js'
import { StatusBar } from './components/layout/StatusBar.js'
import { ConfirmDialog, DetailPanel } from './components/views/index.js'
import { useAppSnapshot, useTerminalSize } from './hooks/index.js'
import { buildTreeRows, moduleBarItems, statusLine, visibleMode } from './tree-utils.js'
import { colors } from './utils/colors.js'

export interface AppHooks {
  useInput?: typeof useInput
  useApp?: typeof useApp
  useTerminalSize?: typeof useTerminalSize
}

export interface AppProps {
  context: AppContext
  hooks?: AppHooks
}

/**
 * Input callback for ink's useInput: one key, one dispatch
 */
export function createInputHandler(context: AppContext, exit: () => void) {
  return (input: string, key: HostKey): void => {
    const outcome = dispatchKey(context, toKeyPress(input, key))
    if (outcome === 'quit') {
      exit()
    }
  }
}

export function App({ context, hooks }: AppProps) {
  const inputHook = hooks?.useInput ?? useInput
  const appHook = hooks?.useApp ?? useApp
  const sizeHook = hooks?.useTerminalSize ?? useTerminalSize

  const { exit } = appHook()
  const { width, height } = sizeHook()
  const snapshot = useAppSnapshot(context)

  inputHook(createInputHandler(context, () => exit()))

  return <AppView snapshot={snapshot} width={width} height={height} />
}

export interface AppViewProps {
  snapshot: AppSnapshot
  width: number
  height: number
}

export function AppView({ snapshot, width, height }: AppViewProps) {
  if (isConfirmPending(snapshot.mode)) {
    return (
      <Box width={width} height={height} justifyContent="center" alignItems="center">
        <ConfirmDialog />
      </Box>
    )
  }

  const mode = visibleMode(snapshot.mode)
  const status = statusLine(snapshot)
  const module = snapshot.modules[snapshot.current]
  const detailRows = module?.details.length ?? 0

  return (
    <Layout
      width={width}
      height={height}
      header={<Header moduleName={status.module} mode={snapshot.mode.kind} modeLabel={status.mode} />}
      moduleBar={<ModuleBar items={moduleBarItems(snapshot)} focused={mode === 'browsing'} />}
      content={module ? (
        <DetailPanel module={module} focused={mode === 'navigating'}>
          <TreeView
            rows={buildTreeRows(snapshot)}
            maxHeight={getContentHeight(height, detailRows)}
            maxWidth={width - 6}
          />
        </DetailPanel>
      ) : (
        <Text color={colors.comment}>No modules</Text>
      )}
      statusBar={<StatusBar status={status} />}
    />
  )
}
