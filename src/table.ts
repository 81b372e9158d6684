import type {
  Alignment,
  Row,
  TableConfiguration,
  TableOptions,
  TableSnapshot,
} from './types'
import { configure } from './configure'
import normalizeMaxRows from './options/maxRows'
import { render } from './render'

/**
 * Immutable table builder. Every setter returns a new `Table`, so a
 * partly configured table can be shared and extended freely.
 *
 * @example
 * const table = new Table()
 *   .headers(['COMMAND', 'PID'])
 *   .alignments([Alignment.Left, Alignment.Right])
 *   .data([['node', '4242']])
 *   .toString()
 */
export class Table {
  private readonly snapshot: TableSnapshot

  constructor(options: TableOptions = {}) {
    this.snapshot = Object.freeze({ ...options })
  }

  static create(options?: TableOptions): Table {
    return new Table(options)
  }

  headers(headers: readonly string[]): Table {
    return this.with({ headers })
  }

  alignments(alignments: readonly Alignment[]): Table {
    return this.with({ alignments })
  }

  data(data: readonly Row[]): Table {
    return this.with({ data })
  }

  /**
   * Throws a `TableError` right away for anything but a positive
   * integer, `null` or `Infinity`.
   */
  maxRows(maxRows: number | null): Table {
    normalizeMaxRows(maxRows)

    return this.with({ maxRows })
  }

  columnSeparator(columnSeparator: string): Table {
    return this.with({ columnSeparator })
  }

  options(): TableSnapshot {
    return this.snapshot
  }

  configure(): TableConfiguration {
    return configure(this.snapshot)
  }

  render(): string {
    return render(this.configure())
  }

  toString(): string {
    return this.render()
  }

  private with(patch: TableOptions): Table {
    return new Table({
      ...this.snapshot,
      ...patch,
    })
  }
}
