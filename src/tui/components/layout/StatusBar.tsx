import { Box, Text } from 'ink'
import type { StatusLine } from '../../tree-utils.js'
import { colors } from '../../utils/colors.js'

export interface StatusBarProps {
  status: StatusLine
}

export function StatusBar({ status }: StatusBarProps) {
  return (
    <Box borderStyle="double" borderColor={colors.darker} flexDirection="column" paddingX={1}>
      <Box flexDirection="row">
        <Box marginRight={2}>
          <Text color={colors.orange}>{`State: ${status.mode}`}</Text>
        </Box>
        <Box marginRight={2}>
          <Text color={colors.blue}>{`Module: ${status.module}`}</Text>
        </Box>
        {status.message ? (
          <Text color={colors.teal}>{status.message}</Text>
        ) : null}
      </Box>
      <Text color={colors.comment}>{status.hints}</Text>
    </Box>
  )
}
