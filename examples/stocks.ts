import chalk from 'chalk'
import ora from 'ora'
import { tryit } from 'radash'
import {
  Alignment,
  Table,
} from '../src'

const { Left, Right } = Alignment

const spinner = ora({ discardStdin: false })

const up = (value: string): string => chalk.greenBright(value)

const down = (value: string): string => chalk.redBright(value)

const markets = [
  ['DOW', 'United States', up('42,313.00'), up('+ 137.89'), up('0.33%')],
  ['S&P 500', 'United States', down('5,738.17'), down('- 7.20'), down('0.13%')],
  ['NASDAQ', 'United States', down('18,119.59'), down('- 70.70'), down('0.39%')],
  ['CAC 40', 'France', up('7,791.79'), up('+ 49.70'), up('0.64%')],
  ['FTSE 100', 'United Kingdom', up('8,320.76'), up('+ 35.85'), up('0.43%')],
  ['DAX', 'Germany', up('19,473.63'), up('+ 235.27'), up('1.22%')],
]

const [error, table] = tryit(() => new Table()
  .headers(['MARKET', '', 'PRICE', 'CHANGE', '%CHANGE'])
  .alignments([Left, Left, Right, Right, Right])
  .data(markets)
  .columnSeparator(' | ')
  .render())()

if (typeof table === 'string') {
  process.stdout.write(table)
}
else {
  spinner.fail(chalk.redBright(error?.message))
  process.exitCode = 1
}
