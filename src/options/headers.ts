import type { Row } from '../types'
import {
  constant,
  times,
} from 'lodash-es'
import { assertCells } from './data'

export default function normalizeHeaders(headers: readonly string[] | undefined, columnCount: number): Row {
  if (typeof headers === 'undefined')
    return times(columnCount, constant(''))

  assertCells(headers, 'header')

  return [...headers]
}
