/**
 * TreeView Component
 * Renders the project/environment/connection rows of the committed module
 */

import { Box, Text } from 'ink'
import type { TreeRow } from './tree-utils.js'
import { colors, getStatusColor } from './utils/colors.js'
import { truncate } from './utils/format.js'

export interface TreeViewProps {
  rows: TreeRow[]
  maxHeight?: number
  maxWidth?: number
}

/**
 * Slice of rows to show so that the selected row stays in view
 */
export function scrollWindow(rowCount: number, selectedIndex: number, maxHeight?: number): { start: number; end: number } {
  if (!maxHeight || rowCount <= maxHeight) {
    return { start: 0, end: rowCount }
  }

  // Keep selected row in the middle of the visible area
  const targetPosition = Math.floor(maxHeight / 2)
  let start = Math.max(0, selectedIndex - targetPosition)
  let end = Math.min(rowCount, start + maxHeight)

  // Adjust if we're near the end
  if (end === rowCount) {
    start = Math.max(0, rowCount - maxHeight)
    end = rowCount
  }

  return { start, end }
}

export function TreeView({ rows, maxHeight, maxWidth }: TreeViewProps) {
  if (rows.length === 0) {
    return <Text color={colors.comment}>No projects</Text>
  }

  const selectedIndex = rows.findIndex((row) => row.selected)
  const { start, end } = scrollWindow(rows.length, selectedIndex, maxHeight)

  return (
    <Box flexDirection="column">
      {rows.slice(start, end).map((row) => {
        const indent = '  '.repeat(row.depth)
        const text = `${indent}${row.icon} ${row.label}`
        return (
          <Box key={row.key} flexDirection="row">
            <Text
              color={row.selected ? colors.fg : colors.fgDark}
              backgroundColor={row.selected ? colors.bgHighlight : undefined}
              bold={row.selected}
            >
              {maxWidth ? truncate(text, maxWidth) : text}
            </Text>
            {row.status ? (
              <Text color={getStatusColor(row.status)}>{`  [${row.status}]`}</Text>
            ) : null}
          </Box>
        )
      })}
    </Box>
  )
}
