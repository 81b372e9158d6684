import type { Alignment as AlignmentValue } from '../src'
import {
  describe,
  expect,
  it,
} from 'vitest'
import {
  Alignment,
  configure,
  DEFAULT_COLUMN_SEPARATOR,
  isTableError,
  TableError,
} from '../src'

const { Left, Right, Center } = Alignment

function captureError(fn: () => unknown): TableError {
  try {
    fn()
  }
  catch (error) {
    if (isTableError(error))
      return error

    throw error
  }

  throw new Error('expected a TableError')
}

describe('configure', () => {
  it('pads missing alignments with left and drops extra ones', () => {
    expect(configure({
      headers: ['A', 'B', 'C'],
      alignments: [Right],
    }).alignments).toEqual([Right, Left, Left])

    expect(configure({
      headers: ['A'],
      alignments: [Center, Right, Right],
    }).alignments).toEqual([Center])
  })

  it('fits every row to the header count', () => {
    const config = configure({
      headers: ['A', 'B'],
      data: [['1'], ['1', '2', '3'], []],
    })

    expect(config.columnCount).toBe(2)
    expect(config.data).toEqual([['1', ''], ['1', '2'], ['', '']])
  })

  it('takes the column count of a headerless table from its longest row', () => {
    const config = configure({ data: [['a'], ['b', 'c', 'd'], ['e', 'f']] })

    expect(config.columnCount).toBe(3)
    expect(config.headers).toEqual(['', '', ''])
    expect(config.showHeaders).toBe(false)
    expect(config.data).toEqual([['a', '', ''], ['b', 'c', 'd'], ['e', 'f', '']])
  })

  it('applies defaults for the cap and the separator', () => {
    const config = configure({ headers: ['A'] })

    expect(config.maxRows).toBeUndefined()
    expect(config.columnSeparator).toBe(DEFAULT_COLUMN_SEPARATOR)
    expect(config.data).toEqual([])
    expect(config.showHeaders).toBe(true)
  })

  it('copies its input instead of holding on to it', () => {
    const headers = ['A']
    const row = ['1']
    const config = configure({
      headers,
      data: [row],
    })

    headers[0] = 'changed'
    row[0] = 'changed'

    expect(config.headers).toEqual(['A'])
    expect(config.data).toEqual([['1']])
  })

  it('rejects a table without headers or data', () => {
    expect(captureError(() => configure()).code).toBe('EMPTY_TABLE')
    expect(captureError(() => configure({ data: [] })).code).toBe('EMPTY_TABLE')
  })

  it('rejects data under an empty header list', () => {
    const error = captureError(() => configure({
      headers: [],
      data: [['a']],
    }))

    expect(error.code).toBe('NO_COLUMNS')
    expect(error.value).toBe(1)
  })

  it.each([0, -3, 1.5, Number.NaN])('rejects %s as a row cap', (maxRows) => {
    const error = captureError(() => configure({
      headers: ['A'],
      maxRows,
    }))

    expect(error).toBeInstanceOf(TableError)
    expect(error.code).toBe('INVALID_MAX_ROWS')
  })

  it('rejects an unknown alignment', () => {
    const alignments: AlignmentValue[] = JSON.parse('["left", "justify"]')
    const error = captureError(() => configure({
      headers: ['A', 'B'],
      alignments,
    }))

    expect(error.code).toBe('INVALID_ALIGNMENT')
    expect(error.value).toBe('justify')
  })

  it('rejects rows that are not arrays and cells that are not strings', () => {
    const notRows: string[][] = JSON.parse('["abc"]')
    const notCells: string[][] = JSON.parse('[["a", 1]]')
    const notHeaders: string[] = JSON.parse('["A", null]')

    expect(captureError(() => configure({ headers: ['A'], data: notRows })).code).toBe('INVALID_ROW')
    expect(captureError(() => configure({ headers: ['A', 'B'], data: notCells })).message).toBe('row 0 cell 1 must be a string, received number')
    expect(captureError(() => configure({ headers: notHeaders })).code).toBe('INVALID_CELL')
  })
})
