// Quit confirmation box, centered in place of the main layout

import { Box, Text } from 'ink'
import { colors } from '../../utils/colors.js'

export interface ConfirmDialogProps {
  title?: string
  question?: string
}

export function ConfirmDialog({
  title = 'Confirm quit',
  question = 'Are you sure you want to quit?',
}: ConfirmDialogProps) {
  return (
    <Box
      borderStyle="double"
      borderColor={colors.orange}
      flexDirection="column"
      alignItems="center"
      width={40}
      paddingX={1}
    >
      <Text color={colors.orange} bold>{title}</Text>
      <Box marginY={1}>
        <Text color={colors.orange}>{question}</Text>
      </Box>
      <Box flexDirection="row">
        <Box marginRight={4}>
          <Text color={colors.green}>Yes (Y)</Text>
        </Box>
        <Text color={colors.red}>No (N)</Text>
      </Box>
    </Box>
  )
}
