import type {
  Simplify,
  ValueOf,
} from 'type-fest'

export const Alignment = {
  Left: 'left',
  Right: 'right',
  Center: 'center',
} as const

export type Alignment = ValueOf<typeof Alignment>

export type Row = readonly string[]

export interface TableOptions {
  /**
   * Column names. When omitted the table has no header line and its
   * column count comes from the longest data row.
   */
  headers?: readonly string[]
  /**
   * One alignment per column, `left` for any column left out.
   */
  alignments?: readonly Alignment[]
  data?: readonly Row[]
  /**
   * Cap on the number of body lines, the ellipsis line included.
   * `undefined`, `null` and `Infinity` leave the body unbounded.
   * @default undefined
   */
  maxRows?: number | null
  /**
   * @default '  '
   */
  columnSeparator?: string
}

export interface TableConfiguration {
  readonly headers: Row
  readonly alignments: readonly Alignment[]
  readonly data: readonly Row[]
  readonly maxRows: number | undefined
  readonly columnSeparator: string
  readonly columnCount: number
  readonly showHeaders: boolean
}

export type TableSnapshot = Simplify<Readonly<TableOptions>>
