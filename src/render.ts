import type {
  Row,
  TableConfiguration,
} from './types'
import {
  columnWidths,
  padCell,
} from './helpers'
import { DEFAULT_ALIGNMENT } from './options/alignments'
import { applyMaxRows } from './truncate'

/**
 * Lines of the rendered table, header first, without line breaks.
 */
export function renderLines(config: TableConfiguration): string[] {
  const rows = applyMaxRows(config.data, config.maxRows, config.columnCount)
  const widths = columnWidths(config.headers, rows)
  const lastColumn = widths.length - 1

  const formatRow = (row: Row): string => widths
    .map((width, index) => padCell(row[index] ?? '', width, config.alignments[index] ?? DEFAULT_ALIGNMENT, index === lastColumn))
    .join(config.columnSeparator)

  return [
    ...(config.showHeaders ? [config.headers] : []),
    ...rows,
  ].map(formatRow)
}

export function render(config: TableConfiguration): string {
  return renderLines(config).map(line => `${line}\n`).join('')
}
