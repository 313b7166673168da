import { describe, it, expect } from 'vitest'
import { followSelection, moveSelection } from '../useListNavigation.js'

const at = (selectedIndex: number, viewportStart = 0) => ({ selectedIndex, viewportStart })

describe('moveSelection', () => {
  it('moves one row at a time within bounds', () => {
    expect(moveSelection(at(0), { type: 'down' }, 3, 20)).toEqual(at(1))
    expect(moveSelection(at(2), { type: 'down' }, 3, 20)).toEqual(at(2))
    expect(moveSelection(at(0), { type: 'up' }, 3, 20)).toEqual(at(0))
  })

  it('jumps to the end and scrolls the viewport', () => {
    expect(moveSelection(at(0), { type: 'end' }, 50, 20)).toEqual(at(49, 30))
  })

  it('jumps back to the start', () => {
    expect(moveSelection(at(49, 30), { type: 'start' }, 50, 20)).toEqual(at(0, 0))
  })

  it('moves by half and full pages', () => {
    expect(moveSelection(at(0), { type: 'halfPageDown' }, 50, 20)).toEqual(at(10))
    expect(moveSelection(at(10), { type: 'pageDown' }, 50, 20)).toEqual(at(30, 11))
    expect(moveSelection(at(30, 11), { type: 'halfPageUp' }, 50, 20)).toEqual(at(20, 11))
    expect(moveSelection(at(20, 11), { type: 'pageUp' }, 50, 20)).toEqual(at(0, 0))
  })

  it('resets for an empty list', () => {
    expect(moveSelection(at(5, 3), { type: 'down' }, 0, 20)).toEqual(at(0, 0))
  })

  it('pulls a stale selection back into range', () => {
    expect(moveSelection(at(40, 30), { type: 'up' }, 10, 20)).toEqual(at(8, 8))
  })
})

describe('followSelection', () => {
  it('keeps the viewport when the selection is visible', () => {
    expect(followSelection(5, 10, 20)).toBe(5)
  })

  it('scrolls up or down just enough', () => {
    expect(followSelection(5, 2, 20)).toBe(2)
    expect(followSelection(0, 25, 20)).toBe(6)
  })
})
