/**
 * Tests for src/tui/Layout.tsx
 */

import { describe, test, expect } from 'vitest'
import { Layout, getContentHeight } from './Layout.js'

describe('tui/Layout', () => {
  test('getContentHeight subtracts chrome and detail rows', () => {
    expect(getContentHeight(24, 2)).toBe(9)
  })

  test('getContentHeight never drops below three rows', () => {
    expect(getContentHeight(12, 4)).toBe(3)
  })

  test('renders a warning when the terminal is too small', () => {
    const element = Layout({ width: 30, height: 24, header: null, moduleBar: null, content: null, statusBar: null })
    expect(element.props.children[0].props.children).toBe('Terminal too small.')
    expect(element.props.children[1].props.children).toBe('Resize to at least 40x10.')
  })

  test('stacks the sections in order', () => {
    const element = Layout({ width: 80, height: 24, header: 'h', moduleBar: 'm', content: 'c', statusBar: 's' })
    expect(element.props.children).toEqual(['h', 'm', 'c', 's'])
  })
})
