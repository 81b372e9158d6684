import {
  isInt,
  isNumber,
} from 'radash'
import { TableError } from '../errors'

export default function normalizeMaxRows(maxRows: number | null | undefined): number | undefined {
  if (maxRows === undefined || maxRows === null || maxRows === Number.POSITIVE_INFINITY)
    return undefined

  if (!isNumber(maxRows) || !isInt(maxRows) || maxRows < 1)
    throw new TableError('INVALID_MAX_ROWS', `max rows must be a positive integer, received ${String(maxRows)}`, maxRows)

  return maxRows
}
