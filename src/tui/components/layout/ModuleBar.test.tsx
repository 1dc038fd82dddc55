/**
 * Tests for src/tui/components/layout/ModuleBar.tsx
 */

import { describe, test, expect } from 'vitest'
import { ModuleBar } from './ModuleBar.js'
import type { ModuleBarItem } from '../../tree-utils.js'
import { colors } from '../../utils/colors.js'

const items: ModuleBarItem[] = [
  { id: 'ssh', name: 'SSH', hovered: false, current: true },
  { id: 'mysql', name: 'MySQL', hovered: true, current: false },
]

describe('tui/components/layout/ModuleBar', () => {
  test('renders one entry per module and marks the committed one', () => {
    const element = ModuleBar({ items, focused: true })
    const labels = element.props.children.map(
      (entry: { props: { children: { props: { children: string } } } }) => entry.props.children.props.children
    )
    expect(labels).toEqual([' SSH • ', ' MySQL '])
  })

  test('highlights the hovered module while focused', () => {
    const element = ModuleBar({ items, focused: true })
    const hoveredText = element.props.children[1].props.children
    expect(hoveredText.props.backgroundColor).toBe(colors.blue)
    expect(element.props.borderColor).toBe(colors.orange)
  })

  test('drops the hover highlight when the tree has focus', () => {
    const element = ModuleBar({ items, focused: false })
    const hoveredText = element.props.children[1].props.children
    expect(hoveredText.props.backgroundColor).toBeUndefined()
    expect(element.props.borderColor).toBe(colors.darker)
  })
})
