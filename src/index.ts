export { configure } from './configure'
export {
  isTableError,
  TableError,
} from './errors'
export type { TableErrorCode } from './errors'
export {
  columnWidths,
  padCell,
  stripAnsiColors,
  visibleLength,
} from './helpers'
export { DEFAULT_ALIGNMENT } from './options/alignments'
export { DEFAULT_COLUMN_SEPARATOR } from './options/columnSeparator'
export {
  render,
  renderLines,
} from './render'
export { Table } from './table'
export {
  applyMaxRows,
  ELLIPSIS,
  splitRows,
} from './truncate'
export type { RowSplit } from './truncate'
export { Alignment } from './types'
export type {
  Row,
  TableConfiguration,
  TableOptions,
  TableSnapshot,
} from './types'
