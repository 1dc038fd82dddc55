/**
 * Layout Component
 * Module bar on top, main panel in the middle, status bar at the bottom
 */

import type { ReactNode } from 'react'
import { Box, Text } from 'ink'
import { colors } from './utils/colors.js'

export const MIN_WIDTH = 40
export const MIN_HEIGHT = 10

export interface LayoutProps {
  width: number
  height: number
  header: ReactNode
  moduleBar: ReactNode
  content: ReactNode
  statusBar: ReactNode
}

/** Rows left for the tree once the fixed chrome is drawn */
export function getContentHeight(height: number, detailRows: number): number {
  // header 1, module bar 3, status bar 4, panel borders/title/margins 5
  return Math.max(height - 13 - detailRows, 3)
}

export function Layout({ width, height, header, moduleBar, content, statusBar }: LayoutProps) {
  // Minimum terminal size check
  if (width < MIN_WIDTH || height < MIN_HEIGHT) {
    return (
      <Box flexDirection="column" width="100%" justifyContent="center" alignItems="center">
        <Text color={colors.red}>Terminal too small.</Text>
        <Text color={colors.orange}>{`Resize to at least ${MIN_WIDTH}x${MIN_HEIGHT}.`}</Text>
      </Box>
    )
  }

  return (
    <Box flexDirection="column" width={width} height={height}>
      {header}
      {moduleBar}
      {content}
      {statusBar}
    </Box>
  )
}
