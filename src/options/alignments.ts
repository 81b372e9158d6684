import { times } from 'lodash-es'
import { TableError } from '../errors'
import { Alignment } from '../types'

export const DEFAULT_ALIGNMENT: Alignment = Alignment.Left

const alignments: readonly unknown[] = Object.values(Alignment)

export function isAlignment(value: unknown): value is Alignment {
  return alignments.includes(value)
}

/**
 * Pads the list with `left` up to the column count and drops alignments
 * past it.
 */
export default function normalizeAlignments(values: readonly Alignment[] | undefined, columnCount: number): readonly Alignment[] {
  const given = values ?? []

  return times(columnCount, (index) => {
    if (index >= given.length)
      return DEFAULT_ALIGNMENT

    const alignment = given[index]

    if (!isAlignment(alignment))
      throw new TableError('INVALID_ALIGNMENT', `alignment of column ${index} must be one of ${alignments.join(', ')}, received ${String(alignment)}`, alignment)

    return alignment
  })
}
