import { useState, useEffect, useCallback } from 'react'
import { useInput } from 'ink'

export interface ListPosition {
  selectedIndex: number
  /** First visible row */
  viewportStart: number
}

export type ListMove =
  | { type: 'down' }
  | { type: 'up' }
  | { type: 'pageDown' }
  | { type: 'pageUp' }
  | { type: 'halfPageDown' }
  | { type: 'halfPageUp' }
  | { type: 'start' }
  | { type: 'end' }

const clamp = (value: number, min: number, max: number) => Math.max(min, Math.min(value, max))

/**
 * Applies a move and scrolls the viewport just enough to keep the
 * selection visible.
 *
 * @example
 * moveSelection({ selectedIndex: 0, viewportStart: 0 }, { type: 'end' }, 50, 20)
 * // => { selectedIndex: 49, viewportStart: 30 }
 */
export const moveSelection = (
  position: ListPosition,
  move: ListMove,
  itemCount: number,
  pageSize: number
): ListPosition => {
  if (itemCount === 0) return { selectedIndex: 0, viewportStart: 0 }

  const last = itemCount - 1
  const page = Math.max(1, Math.min(pageSize, itemCount))
  const halfPage = Math.max(1, Math.floor(page / 2))
  const current = clamp(position.selectedIndex, 0, last)

  const target = {
    down: current + 1,
    up: current - 1,
    pageDown: current + page,
    pageUp: current - page,
    halfPageDown: current + halfPage,
    halfPageUp: current - halfPage,
    start: 0,
    end: last,
  }[move.type]

  const selectedIndex = clamp(target, 0, last)
  return { selectedIndex, viewportStart: followSelection(position.viewportStart, selectedIndex, page) }
}

/**
 * Viewport start that keeps `selectedIndex` inside a window of `pageSize` rows.
 */
export const followSelection = (viewportStart: number, selectedIndex: number, pageSize: number) => {
  if (selectedIndex < viewportStart) return selectedIndex
  if (selectedIndex >= viewportStart + pageSize) return selectedIndex - pageSize + 1
  return viewportStart
}

interface UseListNavigationOptions {
  itemCount: number
  /** Number of visible rows */
  pageSize?: number
  /** Resets the selection to the top whenever it changes, e.g. a search query */
  resetKey?: string
  /** Whether navigation keys are handled */
  enabled?: boolean
}

interface UseListNavigationResult extends ListPosition {
  /** Slice indices of the rows to render */
  visibleRange: { start: number; end: number }
  /** Position display string like "12/45" */
  positionDisplay: string
}

/**
 * List navigation with vim keys: j/k, G, gg, Ctrl+d/u, PgUp/PgDn.
 *
 * @example
 * const { selectedIndex, visibleRange } = useListNavigation({ itemCount: rows.length, pageSize: 20 })
 */
export const useListNavigation = ({
  itemCount,
  pageSize = 20,
  resetKey = '',
  enabled = true,
}: UseListNavigationOptions): UseListNavigationResult => {
  const [position, setPosition] = useState<ListPosition>({ selectedIndex: 0, viewportStart: 0 })
  const [waitingForG, setWaitingForG] = useState(false)

  const move = useCallback(
    (next: ListMove) => setPosition((prev) => moveSelection(prev, next, itemCount, pageSize)),
    [itemCount, pageSize]
  )

  useEffect(() => {
    setPosition({ selectedIndex: 0, viewportStart: 0 })
  }, [resetKey])

  // Keep selection in bounds when rows disappear, e.g. after a reload
  useEffect(() => {
    setPosition((prev) =>
      prev.selectedIndex < itemCount ? prev : moveSelection(prev, { type: 'end' }, itemCount, pageSize)
    )
  }, [itemCount, pageSize])

  useInput(
    (input, key) => {
      // Handle gg command (two g presses)
      if (waitingForG) {
        setWaitingForG(false)
        if (input === 'g') {
          move({ type: 'start' })
          return
        }
      }

      if (input === 'G') return move({ type: 'end' })
      if (input === 'g') return setWaitingForG(true)
      if (key.ctrl && input === 'd') return move({ type: 'halfPageDown' })
      if (key.ctrl && input === 'u') return move({ type: 'halfPageUp' })
      if (input === 'j' || key.downArrow) return move({ type: 'down' })
      if (input === 'k' || key.upArrow) return move({ type: 'up' })
      if (key.pageDown) return move({ type: 'pageDown' })
      if (key.pageUp) return move({ type: 'pageUp' })
    },
    { isActive: enabled }
  )

  const selectedIndex = Math.min(position.selectedIndex, Math.max(0, itemCount - 1))

  return {
    selectedIndex,
    viewportStart: position.viewportStart,
    visibleRange: {
      start: position.viewportStart,
      end: Math.min(position.viewportStart + pageSize, itemCount),
    },
    positionDisplay: itemCount > 0 ? `${selectedIndex + 1}/${itemCount}` : '0/0',
  }
}
