// Main panel: the committed module's settings above its connection tree

import type { ReactNode } from 'react'
import { Box, Text } from 'ink'
import type { ModuleInfo } from '../../../data/provider.js'
import { detailLines } from '../../tree-utils.js'
import { colors } from '../../utils/colors.js'

export interface DetailPanelProps {
  module: ModuleInfo
  focused: boolean
  children?: ReactNode
}

export function DetailPanel({ module, focused, children }: DetailPanelProps) {
  return (
    <Box
      borderStyle="double"
      borderColor={focused ? colors.orange : colors.darker}
      flexDirection="column"
      flexGrow={1}
      paddingX={1}
    >
      <Text color={colors.orange} bold>{`${module.name} connection management`}</Text>
      {module.description ? <Text color={colors.comment}>{module.description}</Text> : null}
      <Box flexDirection="column" marginY={1}>
        {detailLines(module).map((line) => (
          <Text key={line} color={colors.fg}>{line}</Text>
        ))}
      </Box>
      {children}
    </Box>
  )
}
