/**
 * Tests for src/tui/TreeView.tsx
 */

import { describe, test, expect } from 'vitest'
import { TreeView, scrollWindow } from './TreeView.js'
import type { TreeRow } from './tree-utils.js'
import { Level } from './types.js'
import { colors } from './utils/colors.js'

function row(overrides: Partial<TreeRow> = {}): TreeRow {
  return {
    key: 'mysql/0',
    level: Level.Project,
    depth: 0,
    label: 'storefront',
    icon: '▶',
    selected: false,
    expanded: false,
    hasChildren: true,
    status: null,
    ...overrides,
  }
}

describe('tui/TreeView', () => {
  describe('scrollWindow', () => {
    test('shows everything when it fits', () => {
      expect(scrollWindow(5, 4, 10)).toEqual({ start: 0, end: 5 })
      expect(scrollWindow(5, 4)).toEqual({ start: 0, end: 5 })
    })

    test('centers the selected row', () => {
      expect(scrollWindow(10, 5, 4)).toEqual({ start: 3, end: 7 })
    })

    test('pins the window to the ends', () => {
      expect(scrollWindow(10, 0, 4)).toEqual({ start: 0, end: 4 })
      expect(scrollWindow(10, 9, 4)).toEqual({ start: 6, end: 10 })
    })

    test('starts at the top without a selection', () => {
      expect(scrollWindow(10, -1, 4)).toEqual({ start: 0, end: 4 })
    })
  })

  test('shows a placeholder without rows', () => {
    const element = TreeView({ rows: [] })
    expect(element.props.children).toBe('No projects')
  })

  test('indents rows by depth behind their icon', () => {
    const element = TreeView({
      rows: [
        row(),
        row({ key: 'mysql/0/0', level: Level.Environment, depth: 1, label: 'production', icon: '▼' }),
      ],
    })
    const texts = element.props.children.map(
      (entry: { props: { children: Array<{ props: { children: string } } | null> } }) =>
        entry.props.children[0]?.props.children
    )
    expect(texts).toEqual(['▶ storefront', '  ▼ production'])
  })

  test('appends the connection status in its color', () => {
    const element = TreeView({
      rows: [
        row({
          key: 'mysql/0/0/0',
          level: Level.Connection,
          depth: 2,
          label: 'db-01 (10.1.0.5:3306)',
          icon: '→',
          selected: true,
          hasChildren: false,
          status: 'connected',
        }),
      ],
    })
    const [label, status] = element.props.children[0].props.children
    expect(label.props.children).toBe('    → db-01 (10.1.0.5:3306)')
    expect(label.props.bold).toBe(true)
    expect(status.props.children).toBe('  [connected]')
    expect(status.props.color).toBe(colors.green)
  })

  test('truncates long labels to the width', () => {
    const element = TreeView({ rows: [row({ label: 'a-very-long-project-name' })], maxWidth: 12 })
    expect(element.props.children[0].props.children[0].props.children).toBe('▶ a-very-...')
  })
})
