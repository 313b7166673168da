/**
 * Formats cents for display with thousands separators.
 *
 * @example
 * formatMoney(297300) // => '2,973.00'
 * formatMoney(-1200) // => '-12.00'
 */
export const formatMoney = (cents: number): string =>
  (cents / 100).toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })

/**
 * Short form for narrow columns: thousands become `k`.
 *
 * @example
 * formatCompact(297300) // => '3.0k'
 * formatCompact(-1500) // => '-15.00'
 */
export const formatCompact = (cents: number): string => {
  const units = Math.abs(cents) / 100
  if (units >= 1000) {
    return `${cents < 0 ? '-' : ''}${(units / 1000).toFixed(1)}k`
  }
  return formatMoney(cents)
}

/**
 * Prefixes positive amounts with `+`, for trend columns.
 */
export const formatSigned = (cents: number): string =>
  cents > 0 ? `+${formatMoney(cents)}` : formatMoney(cents)

export const UNCATEGORIZED_LABEL = '(none)'

export const displayCategory = (category: string): string =>
  category.length > 0 ? category : UNCATEGORIZED_LABEL

/**
 * Bar length in cells for `value` on a scale where `max` fills `width`.
 * Any non-zero value gets at least one cell.
 */
export const barLength = (value: number, max: number, width: number): number => {
  if (value <= 0 || max <= 0 || width <= 0) return 0
  return Math.max(1, Math.min(width, Math.round((value / max) * width)))
}

/**
 * Text bar used by the text summary.
 *
 * @example
 * progressBar(50, 100, 10) // => '[=====     ]'
 */
export const progressBar = (value: number, max: number, width = 10): string => {
  const filled = barLength(value, max, width)
  return `[${'='.repeat(filled)}${' '.repeat(width - filled)}]`
}

export const truncate = (value: string, width: number): string =>
  value.length > width ? `${value.slice(0, Math.max(0, width - 1))}…` : value
