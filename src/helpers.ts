import type {
  Alignment,
  Row,
} from './types'
import {
  max,
  repeat,
} from 'lodash-es'
import {
  charNotIn,
  createRegExp,
  exactly,
  maybe,
} from 'magic-regexp'

/* `\x1B[` opens a sequence, the first `m` or the end of the string closes it; nothing is validated in between */
const ansiColorSequence = createRegExp(exactly('\x1B['), charNotIn('m').times.any(), maybe('m'), ['g'])

export function stripAnsiColors(value: string): string {
  return value.replace(ansiColorSequence, '')
}

/**
 * Number of code points a cell occupies on screen once colour
 * sequences are removed.
 */
export function visibleLength(value: string): number {
  return Array.from(stripAnsiColors(value)).length
}

/**
 * Pads `cell` with spaces up to `width` visible characters.
 *
 * `center` puts the smaller half of the padding on the left. In the
 * last column no padding is written after the text, so a `center` cell
 * there keeps its left half only and is not symmetric with the cells
 * above and below it in earlier columns.
 */
export function padCell(cell: string, width: number, alignment: Alignment, isLastColumn = false): string {
  const padding = width - visibleLength(cell)

  if (padding <= 0)
    return cell

  switch (alignment) {
    case 'right':
      return `${repeat(' ', padding)}${cell}`
    case 'center': {
      const left = Math.floor(padding / 2)

      return `${repeat(' ', left)}${cell}${isLastColumn ? '' : repeat(' ', padding - left)}`
    }
    default:
      return isLastColumn ? cell : `${cell}${repeat(' ', padding)}`
  }
}

export function columnWidths(headers: Row, rows: readonly Row[]): number[] {
  return headers.map((header, index) => {
    const cells = [header, ...rows.map(row => row[index] ?? '')]

    return max(cells.map(visibleLength)) ?? 0
  })
}
