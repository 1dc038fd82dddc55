// Header component showing branding, the committed module and the mode

import { Box, Text } from 'ink'
import { colors, getModeColor } from '../../utils/colors.js'

export interface HeaderProps {
  moduleName: string
  mode: string
  modeLabel: string
}

export function Header({ moduleName, mode, modeLabel }: HeaderProps) {
  return (
    <Box width="100%" flexDirection="row" justifyContent="space-between" paddingX={1}>
      <Text color={colors.blue} bold>linkdeck</Text>
      <Box flexDirection="row">
        <Box marginRight={2}>
          <Text color={colors.fg}>{moduleName}</Text>
        </Box>
        <Text color={getModeColor(mode)}>{`[${modeLabel}]`}</Text>
      </Box>
    </Box>
  )
}
