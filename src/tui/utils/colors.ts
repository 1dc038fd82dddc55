// Tokyo Night color palette and status color utilities

import type { ConnectionStatus } from '../../data/provider.js'

export const colors = {
  bg: '#1a1b26',
  bgDark: '#16161e',
  bgHighlight: '#24283b',
  fg: '#c0caf5',
  fgDark: '#a9b1d6',
  blue: '#7aa2f7',
  cyan: '#7dcfff',
  purple: '#bb9af7',
  green: '#9ece6a',
  teal: '#73daca',
  red: '#f7768e',
  orange: '#e0af68',
  comment: '#565f89',
  darker: '#414868',
} as const

export function getStatusColor(status: ConnectionStatus): string {
  switch (status) {
    case 'connected': return colors.green
    case 'disconnected': return colors.red
    case 'connecting': return colors.orange
  }
}

export function getModeColor(mode: string): string {
  switch (mode) {
    case 'navigating': return colors.teal
    case 'confirm-pending': return colors.orange
    default: return colors.blue
  }
}
