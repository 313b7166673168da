import { describe, it, expect } from 'vitest'
import { tailLines } from '../logs.js'

describe('tailLines', () => {
  const text = 'one\ntwo\n\nthree\nfour\n'

  it('returns the last lines', () => {
    expect(tailLines(text, 2)).toEqual(['three', 'four'])
  })

  it('returns everything when asked for more than there is', () => {
    expect(tailLines(text, 10)).toEqual(['one', 'two', 'three', 'four'])
  })

  it('handles an empty log', () => {
    expect(tailLines('', 5)).toEqual([])
  })
})
