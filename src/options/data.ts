import type { Row } from '../types'
import { times } from 'lodash-es'
import {
  isArray,
  isString,
} from 'radash'
import { TableError } from '../errors'

export function assertCells(cells: readonly unknown[], label: string): void {
  cells.forEach((cell, index) => {
    if (!isString(cell))
      throw new TableError('INVALID_CELL', `${label} cell ${index} must be a string, received ${typeof cell}`, cell)
  })
}

export function assertRows(data: readonly unknown[]): void {
  data.forEach((row, index) => {
    if (!isArray(row))
      throw new TableError('INVALID_ROW', `row ${index} must be an array of strings`, row)

    assertCells(row, `row ${index}`)
  })
}

/**
 * Fits every row to the column count: missing cells become empty
 * strings, cells past the last column are dropped.
 */
export default function normalizeData(data: readonly Row[], columnCount: number): readonly Row[] {
  return data.map(row => times(columnCount, index => index < row.length ? row[index] : ''))
}
