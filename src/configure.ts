import type {
  TableConfiguration,
  TableOptions,
} from './types'
import {
  isEmpty,
  max,
} from 'lodash-es'
import { TableError } from './errors'
import normalizeAlignments from './options/alignments'
import normalizeColumnSeparator from './options/columnSeparator'
import normalizeData, { assertRows } from './options/data'
import normalizeHeaders from './options/headers'
import normalizeMaxRows from './options/maxRows'

function countColumns(headers: readonly string[] | undefined, data: readonly (readonly string[])[]): number {
  if (typeof headers !== 'undefined')
    return headers.length

  return max(data.map(row => row.length)) ?? 0
}

/**
 * Turns a possibly partial set of options into a ready-to-render
 * configuration. Every row, the header row and the alignment list come
 * out with exactly `columnCount` entries.
 */
export function configure(options: TableOptions = {}): TableConfiguration {
  const {
    headers,
    data = [],
  } = options

  if (typeof headers === 'undefined' && data.length === 0)
    throw new TableError('EMPTY_TABLE', 'headers and data cannot both be empty')

  if (typeof headers !== 'undefined' && headers.length === 0 && data.length > 0)
    throw new TableError('NO_COLUMNS', `an empty header list cannot describe ${data.length} data row(s)`, data.length)

  assertRows(data)

  const columnCount = countColumns(headers, data)
  const normalizedHeaders = normalizeHeaders(headers, columnCount)

  return Object.freeze({
    headers: normalizedHeaders,
    alignments: normalizeAlignments(options.alignments, columnCount),
    data: normalizeData(data, columnCount),
    maxRows: normalizeMaxRows(options.maxRows),
    columnSeparator: normalizeColumnSeparator(options.columnSeparator),
    columnCount,
    showHeaders: typeof headers !== 'undefined' && (data.length === 0 || !normalizedHeaders.every(isEmpty)),
  })
}
