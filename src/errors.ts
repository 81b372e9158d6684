export type TableErrorCode =
  | 'EMPTY_TABLE'
  | 'NO_COLUMNS'
  | 'INVALID_MAX_ROWS'
  | 'INVALID_ALIGNMENT'
  | 'INVALID_ROW'
  | 'INVALID_CELL'

export class TableError extends Error {
  readonly code: TableErrorCode
  readonly value: unknown

  constructor(code: TableErrorCode, message: string, value?: unknown) {
    super(message)
    this.name = 'TableError'
    this.code = code
    this.value = value
  }
}

export function isTableError(error: unknown): error is TableError {
  return error instanceof TableError
}
