import type { Row } from './types'
import {
  constant,
  times,
} from 'lodash-es'

export const ELLIPSIS = '...'

export interface RowSplit {
  head: number
  tail: number
}

export function ellipsisRow(columnCount: number): Row {
  return times(columnCount, constant(ELLIPSIS))
}

/**
 * How many leading and trailing rows survive a cap of `maxRows` body
 * lines, or `undefined` when every row fits.
 *
 * The ellipsis line takes one of the `maxRows` slots. The rest is
 * halved; an odd remainder goes to the tail so the latest rows stay
 * visible.
 */
export function splitRows(rowCount: number, maxRows: number | undefined): RowSplit | undefined {
  if (typeof maxRows === 'undefined' || rowCount <= maxRows)
    return undefined

  const visible = Math.max(maxRows - 1, 0)
  const head = Math.floor(visible / 2)

  return {
    head,
    tail: visible - head,
  }
}

export function applyMaxRows(rows: readonly Row[], maxRows: number | undefined, columnCount: number): readonly Row[] {
  const split = splitRows(rows.length, maxRows)

  if (!split)
    return rows

  return [
    ...rows.slice(0, split.head),
    ellipsisRow(columnCount),
    ...rows.slice(rows.length - split.tail),
  ]
}
