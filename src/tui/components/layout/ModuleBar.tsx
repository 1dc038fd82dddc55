// Module bar: horizontal list of catalog modules
// The hovered module is highlighted; the committed one is marked with a dot.

import { Box, Text } from 'ink'
import type { ModuleBarItem } from '../../tree-utils.js'
import { colors } from '../../utils/colors.js'

export interface ModuleBarProps {
  items: ModuleBarItem[]
  focused: boolean
}

export function ModuleBar({ items, focused }: ModuleBarProps) {
  return (
    <Box
      borderStyle="double"
      borderColor={focused ? colors.orange : colors.darker}
      flexDirection="row"
      paddingX={1}
    >
      {items.map((item) => {
        const highlighted = item.hovered && focused
        return (
          <Box key={item.id} marginRight={2}>
            <Text
              color={highlighted ? colors.fg : item.current ? colors.blue : colors.fgDark}
              backgroundColor={highlighted ? colors.blue : undefined}
              bold={item.current}
            >
              {` ${item.name}${item.current ? ' •' : ''} `}
            </Text>
          </Box>
        )
      })}
    </Box>
  )
}
