import { isString } from 'radash'
import { TableError } from '../errors'

export const DEFAULT_COLUMN_SEPARATOR = '  '

export default function normalizeColumnSeparator(separator: string | undefined): string {
  if (typeof separator === 'undefined')
    return DEFAULT_COLUMN_SEPARATOR

  if (!isString(separator))
    throw new TableError('INVALID_CELL', `column separator must be a string, received ${typeof separator}`, separator)

  return separator
}
